/**
 * @coffer/engine — Read-side reports.
 *
 * Dashboard totals grouped by currency (no FX conversion) and journal
 * verification. Everything here reads committed state only.
 */

import { formatAmount, parseAmount, projectedValues, reconcileAll, rescale } from "@coffer/ledger";
import type { Account, Currency } from "@coffer/types";
import type { EngineRuntime } from "./runtime.js";
import type { CurrencyTotals, Dashboard, JournalReport } from "./types.js";
import { EngineError } from "./types.js";

interface Bucket {
  decimals: number;
  total: bigint;
  available: bigint;
  invested: bigint;
  owed: bigint;
}

export class ReportService {
  private readonly rt: EngineRuntime;

  constructor(runtime: EngineRuntime) {
    this.rt = runtime;
  }

  dashboard(): Dashboard {
    const { store } = this.rt;
    const accounts = store.list("accounts", (a) => a.isActive);
    const holdings = store.list("holdings");
    const buckets = new Map<Currency, Bucket>();

    const bucketFor = (currency: Currency, decimals: number): Bucket => {
      let bucket = buckets.get(currency);
      if (bucket === undefined) {
        bucket = { decimals, total: 0n, available: 0n, invested: 0n, owed: 0n };
        buckets.set(currency, bucket);
      } else if (decimals > bucket.decimals) {
        const from = bucket.decimals;
        bucket.total = rescale(bucket.total, from, decimals);
        bucket.available = rescale(bucket.available, from, decimals);
        bucket.invested = rescale(bucket.invested, from, decimals);
        bucket.owed = rescale(bucket.owed, from, decimals);
        bucket.decimals = decimals;
      }
      return bucket;
    };

    for (const account of accounts) {
      const values = projectedValues(account, holdings);
      const bucket = bucketFor(account.currency, account.decimals);
      const add = (amount: string): bigint =>
        rescale(parseAmount(amount, account.decimals), account.decimals, bucket.decimals);
      bucket.total += add(values.totalValue);
      bucket.available += add(values.availableCash);
      bucket.invested += add(values.investmentValue);
    }

    for (const liability of store.list("liabilities")) {
      const bucket = bucketFor(liability.currency, liability.decimals);
      bucket.owed += rescale(
        parseAmount(liability.outstanding, liability.decimals),
        liability.decimals,
        bucket.decimals,
      );
    }

    const totals: CurrencyTotals[] = [...buckets.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([currency, b]) => ({
        currency,
        totalAssets: formatAmount(b.total, b.decimals),
        availableCash: formatAmount(b.available, b.decimals),
        investmentValue: formatAmount(b.invested, b.decimals),
        liabilitiesOutstanding: formatAmount(b.owed, b.decimals),
        netWorth: formatAmount(b.total - b.owed, b.decimals),
      }));

    const activeBudgets = [...store.list("budgets", (b) => b.status === "active")].sort(
      (a, b) => a.periodEnd.localeCompare(b.periodEnd) || a.name.localeCompare(b.name),
    );

    return {
      asOf: this.rt.now(),
      accountCount: accounts.length,
      totals,
      activeBudgets,
    };
  }

  /**
   * Replay every account's journal (or one account's) and compare it
   * with the stored balance.
   */
  verifyJournal(accountId?: string): JournalReport {
    const { store } = this.rt;
    let accounts: readonly Account[] = store.list("accounts");
    if (accountId !== undefined) {
      const account = store.get("accounts", accountId);
      if (account === undefined) {
        throw new EngineError("ACCOUNT_NOT_FOUND", `Account '${accountId}' not found`, { id: accountId });
      }
      accounts = [account];
    }

    const entries = store.list("cashFlows", (e) => accountId === undefined || e.accountId === accountId);
    const results = reconcileAll(accounts, entries);
    const valid = results.every((r) => r.reconciled);
    if (!valid) {
      this.rt.logger.error(
        { accounts: results.filter((r) => !r.reconciled).map((r) => r.accountId) },
        "journal does not reconcile",
      );
    }

    return { checkedAt: this.rt.now(), valid, accounts: results };
  }
}
