/**
 * @coffer/engine — Runtime shared by every service.
 *
 * Owns the store, the clock, id generation, the trackers configured
 * from the engine options, and `run`: the one path by which a service
 * mutates state.
 *
 * Rules:
 * - A unit body is synchronous; nothing slow happens while locks are held
 * - Invariants are verified inside the unit, before commit
 * - A unit that loses a version race is re-run from scratch
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import { parsePositiveAmount } from "@coffer/ledger";
import { InMemoryStore, runInTransaction } from "@coffer/store";
import type { RetryConfig } from "@coffer/store";
import { DomainError } from "@coffer/types";
import {
  BudgetTracker,
  DEFAULT_PRICE_LOOKUP_TIMEOUT_MS,
  DEFAULT_SYNC_EXCLUDED_ASSET_KINDS,
  LiabilityTracker,
} from "@coffer/vault";
import { CofferUnit } from "./unit.js";
import type { CofferStore, CofferTables, EngineOptions, EngineSettings } from "./types.js";
import { EngineError, TABLE_NAMES } from "./types.js";

/** Widest scale accepted anywhere; used to sign-check amounts before the account is known. */
const MAX_INPUT_DECIMALS = 18;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function createStore(lockTimeoutMs?: number): CofferStore {
  return new InMemoryStore<CofferTables>(TABLE_NAMES, { lockTimeoutMs });
}

export class EngineRuntime {
  readonly store: CofferStore;
  readonly settings: EngineSettings;
  readonly logger: Logger;
  readonly budgets: BudgetTracker;
  readonly liabilities: LiabilityTracker;

  private readonly _clock: () => Date;
  private readonly _ids: () => string;
  private readonly _retry: RetryConfig | undefined;

  constructor(options: EngineOptions = {}) {
    this.settings = {
      defaultCurrency: options.defaultCurrency ?? "CNY",
      defaultDecimals: options.defaultDecimals ?? 2,
      overspendPolicy: options.overspendPolicy ?? "allow",
      overpaymentPolicy: options.overpaymentPolicy ?? "reject",
      terminalUnlinkPolicy: options.terminalUnlinkPolicy ?? "adjust",
      syncExcludedAssetKinds: options.syncExcludedAssetKinds ?? DEFAULT_SYNC_EXCLUDED_ASSET_KINDS,
      priceLookupTimeoutMs: options.priceLookupTimeoutMs ?? DEFAULT_PRICE_LOOKUP_TIMEOUT_MS,
      lockTimeoutMs: options.lockTimeoutMs ?? 5000,
    };
    this.store = options.store ?? createStore(this.settings.lockTimeoutMs);
    this.logger = options.logger ?? pino({ level: "silent" });
    this.budgets = new BudgetTracker({
      overspend: this.settings.overspendPolicy,
      terminalUnlink: this.settings.terminalUnlinkPolicy,
    });
    this.liabilities = new LiabilityTracker(this.settings.overpaymentPolicy);
    this._clock = options.clock ?? (() => new Date());
    this._ids = options.ids ?? randomUUID;
    this._retry = options.retry;
  }

  now(): string {
    return this._clock().toISOString();
  }

  // ─── Units of work ──────────────────────────────────────────────────

  /**
   * Execute `fn` as one atomic unit holding `lockKeys`.
   *
   * @param operation - Name used in log lines
   */
  async run<R>(
    operation: string,
    lockKeys: readonly string[],
    fn: (unit: CofferUnit) => R,
  ): Promise<R> {
    try {
      const { value, unit } = await runInTransaction(
        this.store,
        (uow) => {
          const unit = new CofferUnit(uow, this._ids, this._clock());
          const value = fn(unit);
          unit.verify();
          return { value, unit };
        },
        {
          lockKeys,
          lockTimeoutMs: this.settings.lockTimeoutMs,
          ...(this._retry !== undefined ? { retry: this._retry } : {}),
        },
      );
      this.logger.info({ operation, touched: unit.touched }, "operation committed");
      return value;
    } catch (err: unknown) {
      if (err instanceof DomainError && err.category === "integrity") {
        this.logger.error({ operation, err }, "integrity violation, unit of work aborted");
      } else if (err instanceof DomainError) {
        this.logger.debug({ operation, code: err.code }, "operation rejected");
      }
      throw err;
    }
  }

  // ─── Input checks ───────────────────────────────────────────────────

  /**
   * Sign check that runs before anything is loaded, so a bad amount is
   * reported ahead of a missing account.
   */
  assertPositive(amount: string, label = "Amount"): void {
    parsePositiveAmount(amount, MAX_INPUT_DECIMALS, label);
  }

  /** Defaults to today, per the engine clock. */
  isoDate(value: string | undefined, label: string): string {
    if (value === undefined) return this.now().slice(0, 10);
    if (!ISO_DATE.test(value) || Number.isNaN(Date.parse(value))) {
      throw new EngineError("INVALID_INPUT", `${label} must be a YYYY-MM-DD date, got '${value}'`, {
        [label]: value,
      });
    }
    return value;
  }

  /**
   * One scale per currency: the scale already in use wins, then the
   * requested one, then the configured default.
   *
   * @throws EngineError CURRENCY_MISMATCH when `requested` differs from
   *   the scale in use
   */
  currencyScale(unit: CofferUnit, currency: string, requested?: number): number {
    const known = unit.currencyScale(currency);
    if (known !== undefined && requested !== undefined && requested !== known) {
      throw new EngineError(
        "CURRENCY_MISMATCH",
        `${currency} amounts carry ${String(known)} decimals, got ${String(requested)}`,
        { currency, decimals: known, requested },
      );
    }
    return known ?? requested ?? this.settings.defaultDecimals;
  }

  requireText(value: string, label: string): string {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      throw new EngineError("INVALID_INPUT", `${label} must not be empty`);
    }
    return trimmed;
  }
}
