/**
 * Type barrel — re-exports all public types from @coffer/node.
 */

// DTOs
export {
  AmountSchema,
  IsoDateSchema,
  PaginationQuerySchema,
  CreateAccountSchema,
  UpdateAccountSchema,
  ListAccountsQuerySchema,
  RecordIncomeSchema,
  AccountScopedQuerySchema,
  RecordExpenseSchema,
  ListExpensesQuerySchema,
  CreateTransferSchema,
  RecordTradeSchema,
  ListHoldingsQuerySchema,
  CreateBudgetSchema,
  ReallocateBudgetSchema,
  ListBudgetsQuerySchema,
  CreateLiabilitySchema,
  RecordPaymentSchema,
  SyncSchema,
  VerifyJournalQuerySchema,
} from "./dto.js";
export type {
  CreateAccountDto,
  UpdateAccountDto,
  ListAccountsQuery,
  RecordIncomeDto,
  AccountScopedQuery,
  RecordExpenseDto,
  ListExpensesQuery,
  CreateTransferDto,
  RecordTradeDto,
  ListHoldingsQuery,
  CreateBudgetDto,
  ReallocateBudgetDto,
  ListBudgetsQuery,
  CreateLiabilityDto,
  RecordPaymentDto,
  SyncDto,
  VerifyJournalQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export {
  encodeCursor,
  decodeCursor,
  paginate,
  timestampKey,
  sequenceKey,
} from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv, AppVariables, BodyEnv, QueryEnv } from "./api-contract.js";
