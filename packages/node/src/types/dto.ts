/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation. Amounts stay
 * decimal strings here; the engine checks their scale.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z.string().trim().min(1).max(40);

export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

const IdSchema = z.string().min(1).max(128);
const NameSchema = z.string().min(1).max(200);
const NotesSchema = z.string().max(2000);

export const AccountKindSchema = z.enum(["cash", "investment"]);
export const AssetKindSchema = z.enum(["stock", "fund", "bond", "crypto", "money_market"]);
export const TradeKindSchema = z.enum(["buy", "sell", "dividend", "interest"]);
export const BudgetKindSchema = z.enum(["periodic", "project"]);
export const BudgetStatusSchema = z.enum(["active", "completed", "cancelled"]);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

/** Query flags arrive as strings; only "true" turns one on. */
const QueryFlagSchema = z
  .enum(["true", "false"])
  .optional()
  .transform((v) => v === "true");

// =============================================================================
// Accounts
// =============================================================================

export const CreateAccountSchema = z.object({
  name: NameSchema,
  kind: AccountKindSchema,
  currency: z.string().min(1).max(10).optional(),
  decimals: z.number().int().min(0).max(8).optional(),
  openingBalance: AmountSchema.optional(),
  balanceEnforced: z.boolean().optional(),
  institution: z.string().max(200).optional(),
  notes: NotesSchema.optional(),
});

export type CreateAccountDto = z.infer<typeof CreateAccountSchema>;

/** Descriptive fields only; null clears institution or notes. */
export const UpdateAccountSchema = z
  .object({
    name: NameSchema.optional(),
    institution: z.string().max(200).nullable().optional(),
    notes: NotesSchema.nullable().optional(),
  })
  .strict()
  .refine((v) => v.name !== undefined || v.institution !== undefined || v.notes !== undefined, {
    message: "Nothing to update",
  });

export type UpdateAccountDto = z.infer<typeof UpdateAccountSchema>;

export const ListAccountsQuerySchema = PaginationQuerySchema.extend({
  kind: AccountKindSchema.optional(),
  includeInactive: QueryFlagSchema,
});

export type ListAccountsQuery = z.infer<typeof ListAccountsQuerySchema>;

// =============================================================================
// Incomes
// =============================================================================

export const RecordIncomeSchema = z.object({
  accountId: IdSchema,
  amount: AmountSchema,
  source: NameSchema,
  receivedAt: IsoDateSchema.optional(),
  notes: NotesSchema.optional(),
});

export type RecordIncomeDto = z.infer<typeof RecordIncomeSchema>;

export const AccountScopedQuerySchema = PaginationQuerySchema.extend({
  accountId: IdSchema.optional(),
});

export type AccountScopedQuery = z.infer<typeof AccountScopedQuerySchema>;

// =============================================================================
// Expenses
// =============================================================================

export const RecordExpenseSchema = z.object({
  accountId: IdSchema,
  amount: AmountSchema,
  category: z.string().min(1).max(50),
  budgetId: IdSchema.optional(),
  subcategory: z.string().min(1).max(50).optional(),
  expenseDate: IsoDateSchema.optional(),
  merchant: z.string().max(200).optional(),
  paymentMethod: z.string().max(50).optional(),
  isShared: z.boolean().optional(),
  participants: z.array(z.string().min(1).max(100)).max(50).optional(),
  tags: z.array(z.string().min(1).max(50)).max(50).optional(),
  notes: NotesSchema.optional(),
});

export type RecordExpenseDto = z.infer<typeof RecordExpenseSchema>;

export const ListExpensesQuerySchema = PaginationQuerySchema.extend({
  accountId: IdSchema.optional(),
  budgetId: IdSchema.optional(),
  category: z.string().min(1).optional(),
  from: IsoDateSchema.optional(),
  to: IsoDateSchema.optional(),
});

export type ListExpensesQuery = z.infer<typeof ListExpensesQuerySchema>;

// =============================================================================
// Transfers
// =============================================================================

export const CreateTransferSchema = z.object({
  fromAccountId: IdSchema,
  toAccountId: IdSchema,
  amount: AmountSchema,
  transferDate: IsoDateSchema.optional(),
  notes: NotesSchema.optional(),
});

export type CreateTransferDto = z.infer<typeof CreateTransferSchema>;

// =============================================================================
// Trades & holdings
// =============================================================================

export const RecordTradeSchema = z.object({
  accountId: IdSchema,
  symbol: z.string().trim().min(1).max(32),
  assetKind: AssetKindSchema,
  market: z.string().min(1).max(32).optional(),
  kind: TradeKindSchema,
  quantity: AmountSchema,
  price: AmountSchema,
  fees: AmountSchema.optional(),
  tradeDate: IsoDateSchema.optional(),
  name: z.string().max(200).optional(),
  isLiquid: z.boolean().optional(),
  notes: NotesSchema.optional(),
});

export type RecordTradeDto = z.infer<typeof RecordTradeSchema>;

export const ListHoldingsQuerySchema = AccountScopedQuerySchema.extend({
  includeInactive: QueryFlagSchema,
});

export type ListHoldingsQuery = z.infer<typeof ListHoldingsQuerySchema>;

// =============================================================================
// Budgets
// =============================================================================

export const CreateBudgetSchema = z.object({
  name: NameSchema,
  kind: BudgetKindSchema,
  allocated: AmountSchema,
  periodStart: IsoDateSchema,
  periodEnd: IsoDateSchema,
  currency: z.string().min(1).max(10).optional(),
  eligibleAccountIds: z.array(IdSchema).max(100).optional(),
  category: z.string().min(1).max(50).optional(),
});

export type CreateBudgetDto = z.infer<typeof CreateBudgetSchema>;

export const ReallocateBudgetSchema = z.object({
  allocated: AmountSchema,
});

export type ReallocateBudgetDto = z.infer<typeof ReallocateBudgetSchema>;

export const ListBudgetsQuerySchema = PaginationQuerySchema.extend({
  status: BudgetStatusSchema.optional(),
});

export type ListBudgetsQuery = z.infer<typeof ListBudgetsQuerySchema>;

// =============================================================================
// Liabilities
// =============================================================================

export const CreateLiabilitySchema = z.object({
  name: NameSchema,
  principal: AmountSchema,
  currency: z.string().min(1).max(10).optional(),
  notes: NotesSchema.optional(),
});

export type CreateLiabilityDto = z.infer<typeof CreateLiabilitySchema>;

export const RecordPaymentSchema = z.object({
  accountId: IdSchema,
  amount: AmountSchema,
  paidAt: IsoDateSchema.optional(),
  notes: NotesSchema.optional(),
});

export type RecordPaymentDto = z.infer<typeof RecordPaymentSchema>;

// =============================================================================
// Sync
// =============================================================================

export const SyncSchema = z.object({
  /** Symbol → price. Without it the configured price feed is asked. */
  prices: z.record(z.union([z.string().min(1), z.number()])).optional(),
  accountId: IdSchema.optional(),
});

export type SyncDto = z.infer<typeof SyncSchema>;

// =============================================================================
// Journal
// =============================================================================

export const VerifyJournalQuerySchema = z.object({
  accountId: IdSchema.optional(),
});

export type VerifyJournalQuery = z.infer<typeof VerifyJournalQuerySchema>;
