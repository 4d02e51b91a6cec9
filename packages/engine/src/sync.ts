/**
 * @coffer/engine — Market value sync.
 *
 * 1. Read the active holdings in scope from committed state
 * 2. Ask the oracle for each distinct (symbol, asset kind, market),
 *    time-bounded and outside of any lock
 * 3. Reprice each holding in its own unit under the holding lock, so a
 *    concurrent trade on that holding is serialized with the write
 * 4. Recompute the cached holdingsValue of every account in scope,
 *    including accounts whose last position was sold out
 * 5. Record a MarketSyncLog
 *
 * Only price fields and holdingsValue are written. A failing symbol,
 * or a holding whose lock cannot be taken in time, is logged and
 * counted, never fatal to the batch.
 */

import { holdingsValueOf, parseAmount } from "@coffer/ledger";
import { DomainError } from "@coffer/types";
import type { MarketSyncLog, SyncFailure, SyncStatus, SyncedAccountValue } from "@coffer/types";
import {
  fetchPrices,
  holdingKey,
  planSync,
  priceRequestKey,
  repriceHolding,
  uniquePriceRequests,
} from "@coffer/vault";
import type { EngineRuntime } from "./runtime.js";
import { byCreation } from "./rows.js";
import { accountLock, holdingLock } from "./unit.js";
import type { SyncOptions } from "./types.js";
import { EngineError } from "./types.js";

export class SyncService {
  private readonly rt: EngineRuntime;

  constructor(runtime: EngineRuntime) {
    this.rt = runtime;
  }

  async syncHoldingsValue(options: SyncOptions): Promise<MarketSyncLog> {
    const startedAt = this.rt.now();
    const { accountId } = options;
    if (accountId !== undefined && this.rt.store.get("accounts", accountId) === undefined) {
      throw new EngineError("ACCOUNT_NOT_FOUND", `Account '${accountId}' not found`, { id: accountId });
    }

    const holdings = this.rt.store.list("holdings", (h) =>
      h.isActive && (accountId === undefined || h.accountId === accountId));
    const plan = planSync(holdings, this.rt.settings.syncExcludedAssetKinds);
    const prices = await fetchPrices(
      options.lookup,
      uniquePriceRequests(plan.eligible),
      this.rt.settings.priceLookupTimeoutMs,
    );

    const failures: SyncFailure[] = [];
    let updated = 0;

    for (const holding of plan.eligible) {
      const result = prices.get(priceRequestKey(holding));
      if (result === undefined || !result.ok) {
        const failure: SyncFailure = {
          holdingId: holding.id,
          accountId: holding.accountId,
          symbol: holding.symbol,
          code: result?.code ?? "PRICE_LOOKUP_FAILED",
          reason: result?.reason ?? "No price returned",
        };
        failures.push(failure);
        this.rt.logger.warn(failure, "price lookup failed, holding left unchanged");
        continue;
      }

      const account = this.rt.store.get("accounts", holding.accountId);
      if (account === undefined) continue;

      let repriced: boolean;
      try {
        repriced = await this.rt.run(
          "syncHolding",
          [holdingLock(holdingKey(holding.accountId, holding.symbol, holding.assetKind, holding.market))],
          (unit) => {
            const current = unit.holding(holding.id);
            // sold out while the oracle was answering
            if (!current.isActive) return false;
            unit.put("holdings", repriceHolding(current, result.price, account.decimals, unit.now));
            return true;
          },
        );
      } catch (err: unknown) {
        if (!(err instanceof DomainError) || err.code !== "LOCK_TIMEOUT") throw err;
        const failure: SyncFailure = {
          holdingId: holding.id,
          accountId: holding.accountId,
          symbol: holding.symbol,
          code: err.code,
          reason: err.message,
        };
        failures.push(failure);
        this.rt.logger.warn(failure, "holding busy, left unchanged");
        continue;
      }
      if (repriced) updated += 1;
    }

    const accountIds = accountId !== undefined ? [accountId] : this.cachedAccountIds();
    const accountValues: SyncedAccountValue[] = [];
    for (const id of accountIds) {
      accountValues.push(await this.refreshHoldingsValue(id));
    }

    const finishedAt = this.rt.now();
    return this.rt.run("recordSyncLog", [], (unit) => {
      const log: MarketSyncLog = {
        id: unit.nextId(),
        accountId: accountId ?? null,
        status: syncStatus(updated, failures.length),
        holdingsUpdated: updated,
        holdingsFailed: failures.length,
        holdingsSkipped: plan.skipped.length,
        failures,
        accountValues,
        startedAt,
        finishedAt,
      };
      unit.put("syncLogs", log);
      return log;
    });
  }

  /**
   * Recompute and cache Σ current value of the account's active,
   * non-liquid holdings.
   */
  async refreshHoldingsValue(accountId: string): Promise<SyncedAccountValue> {
    return this.rt.run("refreshHoldingsValue", [accountLock(accountId)], (unit) => {
      const account = unit.account(accountId);
      const holdingsValue = holdingsValueOf(
        account,
        unit.list("holdings", (h) => h.accountId === accountId),
      );
      if (holdingsValue !== account.holdingsValue) {
        unit.put("accounts", { ...account, holdingsValue, updatedAt: unit.now });
      }
      return { accountId, currency: account.currency, holdingsValue };
    });
  }

  /**
   * Accounts whose cached holdingsValue a global sync refreshes: any
   * with a holding, active or not, or with a non-zero cached value.
   */
  private cachedAccountIds(): string[] {
    const withHoldings = new Set(this.rt.store.list("holdings").map((h) => h.accountId));
    const accounts = this.rt.store.list("accounts", (a) =>
      withHoldings.has(a.id) || parseAmount(a.holdingsValue, a.decimals) !== 0n);
    return [...accounts].sort(byCreation).map((a) => a.id);
  }

  /** Newest first. */
  listSyncLogs(limit?: number): readonly MarketSyncLog[] {
    const rows = [...this.rt.store.list("syncLogs")].sort(
      (a, b) => b.startedAt.localeCompare(a.startedAt) || b.id.localeCompare(a.id),
    );
    return limit !== undefined ? rows.slice(0, limit) : rows;
  }
}

/**
 * success: no failures. failed: failures and nothing updated.
 * partial: some of each.
 */
export function syncStatus(updated: number, failed: number): SyncStatus {
  if (failed === 0) return "success";
  return updated === 0 ? "failed" : "partial";
}
