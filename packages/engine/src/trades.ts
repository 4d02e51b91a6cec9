/**
 * @coffer/engine — Investment trades.
 *
 * A trade moves cash on an investment account and, for buys and sells,
 * the quantity / average cost of one holding. Every trade stores the
 * holding position it started from.
 *
 * Deleting a trade restores the position it started from and replays
 * every later buy/sell of the same holding on top of it, rewriting the
 * stored starting positions of those later trades. A deletion that
 * would make a later sell exceed the replayed quantity is rejected
 * with INSUFFICIENT_HOLDING_QUANTITY and changes nothing.
 */

import {
  PRICE_DECIMALS,
  QUANTITY_DECIMALS,
  applyDelta,
  formatAmount,
  parseAmount,
} from "@coffer/ledger";
import { isAssetKind, isTradeKind } from "@coffer/types";
import type { Holding, HoldingPosition, InvestmentTrade } from "@coffer/types";
import {
  applyTrade,
  holdingKey,
  normalizeSymbol,
  openHolding,
  positionOf,
  replayTrades,
  summarizePortfolio,
  withPosition,
} from "@coffer/vault";
import type { PortfolioSummary, TradeRequest } from "@coffer/vault";
import type { EngineRuntime } from "./runtime.js";
import { byCreation, negate } from "./rows.js";
import { accountLock, holdingLock } from "./unit.js";
import type { CofferUnit } from "./unit.js";
import type { HoldingFilter, RecordTradeInput } from "./types.js";
import { EngineError } from "./types.js";

const DEFAULT_MARKET = "default";

function movesQuantity(trade: Pick<InvestmentTrade, "kind">): boolean {
  return trade.kind === "buy" || trade.kind === "sell";
}

function requestOf(trade: InvestmentTrade): TradeRequest {
  return { kind: trade.kind, quantity: trade.quantity, price: trade.price, fees: trade.fees };
}

export class TradeService {
  private readonly rt: EngineRuntime;

  constructor(runtime: EngineRuntime) {
    this.rt = runtime;
  }

  // ─── Recording ──────────────────────────────────────────────────────

  /**
   * @throws EngineError INVALID_ACCOUNT_KIND on a cash account
   * @throws VaultError INSUFFICIENT_HOLDING_QUANTITY when selling more than held
   * @throws LedgerError INSUFFICIENT_FUNDS when a buy exceeds the cash balance
   */
  async recordTrade(input: RecordTradeInput): Promise<InvestmentTrade> {
    if (!isTradeKind(input.kind)) {
      throw new EngineError("INVALID_INPUT", `Unknown trade kind '${String(input.kind)}'`);
    }
    if (!isAssetKind(input.assetKind)) {
      throw new EngineError("INVALID_INPUT", `Unknown asset kind '${String(input.assetKind)}'`);
    }
    const symbol = normalizeSymbol(this.rt.requireText(input.symbol, "symbol"));
    const market = input.market !== undefined ? this.rt.requireText(input.market, "market") : DEFAULT_MARKET;
    const tradeDate = this.rt.isoDate(input.tradeDate, "tradeDate");
    const key = holdingKey(input.accountId, symbol, input.assetKind, market);

    return this.rt.run(
      "recordTrade",
      [accountLock(input.accountId), holdingLock(key)],
      (unit) => {
        const source = unit.activeAccount(input.accountId);
        if (source.kind !== "investment") {
          throw new EngineError(
            "INVALID_ACCOUNT_KIND",
            `Account '${source.id}' is a ${source.kind} account; trades need an investment account`,
            { accountId: source.id, kind: source.kind },
          );
        }

        const existing = this.findHolding(unit, key);
        const before = existing !== undefined ? positionOf(existing) : null;
        const request: TradeRequest = {
          kind: input.kind,
          quantity: input.quantity,
          price: input.price,
          fees: input.fees ?? "0",
        };
        const effect = applyTrade(before, request, source.decimals);
        const account = applyDelta(source, effect.cashAmount);
        const id = unit.nextId();

        let holdingId = existing?.id ?? null;
        if (movesQuantity(request)) {
          const holding = existing ?? openHolding(
            {
              id: unit.nextId(),
              accountId: account.id,
              symbol,
              assetKind: input.assetKind,
              market,
              name: input.name,
              isLiquid: input.isLiquid,
              price: input.price,
              now: unit.now,
            },
            account.decimals,
          );
          holdingId = holding.id;
          unit.put("holdings", withPosition(holding, effect.position, account.decimals, unit.now));
        }

        unit.put("accounts", { ...account, updatedAt: unit.now });
        const entry = unit.journal(account, {
          kind: "investment",
          amount: effect.cashAmount,
          description: `${input.kind} ${symbol}`,
          link: { type: "trade", id },
        });

        const trade: InvestmentTrade = {
          id,
          accountId: account.id,
          holdingId,
          symbol,
          assetKind: input.assetKind,
          market,
          kind: input.kind,
          quantity: rescaled(input.quantity, QUANTITY_DECIMALS),
          price: rescaled(input.price, PRICE_DECIMALS),
          fees: rescaled(request.fees, account.decimals),
          cashAmount: effect.cashAmount,
          tradeDate,
          sequence: this.nextSequence(unit, account.id),
          before,
          cashFlowId: entry.id,
          ...(input.notes !== undefined ? { notes: input.notes } : {}),
          createdAt: unit.now,
        };
        unit.put("trades", trade);
        return trade;
      },
    );
  }

  // ─── Deletion ───────────────────────────────────────────────────────

  async deleteTrade(id: string): Promise<void> {
    const committed = this.rt.store.get("trades", id);
    const locks = committed !== undefined
      ? [
          accountLock(committed.accountId),
          holdingLock(holdingKey(committed.accountId, committed.symbol, committed.assetKind, committed.market)),
        ]
      : [];

    await this.rt.run("deleteTrade", locks, (unit) => {
      const trade = unit.trade(id);
      const source = unit.account(trade.accountId);

      if (movesQuantity(trade)) {
        if (trade.holdingId === null) {
          throw new EngineError("HOLDING_NOT_FOUND", `Trade '${id}' has no holding to restore`, { tradeId: id });
        }
        const holding = unit.holding(trade.holdingId);
        const position = this.replayWithout(unit, trade, source.decimals);
        unit.put("holdings", withPosition(holding, position, source.decimals, unit.now));
      }

      const account = applyDelta(source, negate(trade.cashAmount, source.decimals));
      unit.put("accounts", { ...account, updatedAt: unit.now });
      unit.journal(account, {
        kind: "investment",
        amount: negate(trade.cashAmount, source.decimals),
        description: `Reversal of ${trade.kind} ${trade.symbol}`,
        link: { type: "trade", id },
        reversalOf: trade.cashFlowId,
      });
      unit.remove("trades", id);
    });
  }

  /**
   * Replays the holding's later buys/sells from the deleted trade's
   * starting position and rewrites their stored starting positions.
   *
   * @returns the holding's position without the deleted trade
   */
  private replayWithout(
    unit: CofferUnit,
    trade: InvestmentTrade,
    decimals: number,
  ): HoldingPosition {
    const later = [
      ...unit.list("trades", (t) =>
        t.holdingId === trade.holdingId && movesQuantity(t) && t.sequence > trade.sequence),
    ].sort((a, b) => a.sequence - b.sequence);

    const { befores, final } = replayTrades(trade.before, later.map(requestOf), decimals);

    later.forEach((t, index) => {
      const before = befores[index];
      if (before === undefined) return;
      // the first later trade inherits the deleted one's start, null included
      unit.put("trades", { ...t, before: index === 0 ? trade.before : before });
    });

    return final;
  }

  // ─── Queries ────────────────────────────────────────────────────────

  listTrades(accountId?: string): readonly InvestmentTrade[] {
    const rows = this.rt.store.list("trades", (t) => accountId === undefined || t.accountId === accountId);
    return [...rows].sort((a, b) => a.accountId.localeCompare(b.accountId) || a.sequence - b.sequence);
  }

  listHoldings(filter: HoldingFilter = {}): readonly Holding[] {
    const rows = this.rt.store.list("holdings", (h) =>
      (filter.accountId === undefined || h.accountId === filter.accountId) &&
      (filter.includeInactive === true || h.isActive));
    return [...rows].sort(byCreation);
  }

  portfolio(accountId: string): PortfolioSummary {
    const account = this.rt.store.get("accounts", accountId);
    if (account === undefined) {
      throw new EngineError("ACCOUNT_NOT_FOUND", `Account '${accountId}' not found`, { id: accountId });
    }
    return summarizePortfolio(account, this.rt.store.list("holdings", (h) => h.accountId === accountId));
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private findHolding(unit: CofferUnit, key: string): Holding | undefined {
    return unit
      .list("holdings", (h) => holdingKey(h.accountId, h.symbol, h.assetKind, h.market) === key)
      .at(0);
  }

  private nextSequence(unit: CofferUnit, accountId: string): number {
    let max = 0;
    for (const t of unit.list("trades", (row) => row.accountId === accountId)) {
      if (t.sequence > max) max = t.sequence;
    }
    return max + 1;
  }
}

function rescaled(value: string, decimals: number): string {
  return formatAmount(parseAmount(value, decimals), decimals);
}
