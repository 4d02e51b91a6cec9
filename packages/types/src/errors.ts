/**
 * Error taxonomy shared by every package.
 *
 * Each package throws its own subclass of DomainError; the category is
 * derived from the code so callers (and the HTTP layer) can decide how
 * to surface a failure without knowing which package raised it.
 *
 * Rules:
 * - Validation / NotFound / StateConflict are expected and leave no partial state
 * - ExternalDependency is recovered per item where a batch allows it
 * - Integrity always aborts the enclosing unit of work
 */

export type ErrorCategory =
  | "validation"
  | "not_found"
  | "state_conflict"
  | "external_dependency"
  | "integrity";

export const ERROR_CATEGORIES = {
  // Validation
  INVALID_AMOUNT: "validation",
  CURRENCY_MISMATCH: "validation",
  INVALID_ACCOUNT_KIND: "validation",
  INVALID_TRANSFER: "validation",
  INVALID_INPUT: "validation",

  // Not found
  ACCOUNT_NOT_FOUND: "not_found",
  BUDGET_NOT_FOUND: "not_found",
  EXPENSE_NOT_FOUND: "not_found",
  INCOME_NOT_FOUND: "not_found",
  TRADE_NOT_FOUND: "not_found",
  TRANSFER_NOT_FOUND: "not_found",
  LIABILITY_NOT_FOUND: "not_found",
  PAYMENT_NOT_FOUND: "not_found",
  HOLDING_NOT_FOUND: "not_found",

  // State conflict
  INSUFFICIENT_FUNDS: "state_conflict",
  INSUFFICIENT_HOLDING_QUANTITY: "state_conflict",
  BUDGET_NOT_ACTIVE: "state_conflict",
  BUDGET_NOT_ELIGIBLE: "state_conflict",
  UNDERFUNDED_BUDGET: "state_conflict",
  BUDGET_IN_USE: "state_conflict",
  LIABILITY_IN_USE: "state_conflict",
  INVALID_TRANSITION: "state_conflict",
  OVERPAYMENT_REJECTED: "state_conflict",
  CONCURRENCY_CONFLICT: "state_conflict",
  LOCK_TIMEOUT: "state_conflict",
  TRANSACTION_CLOSED: "state_conflict",

  // External dependency
  PRICE_LOOKUP_FAILED: "external_dependency",
  PRICE_LOOKUP_TIMEOUT: "external_dependency",

  // Integrity
  INTEGRITY_VIOLATION: "integrity",
  DUPLICATE_ROW: "integrity",
  ROW_NOT_FOUND: "integrity",
  SNAPSHOT_CORRUPT: "integrity",
} as const satisfies Record<string, ErrorCategory>;

export type ErrorCode = keyof typeof ERROR_CATEGORIES;

export type ErrorDetails = Readonly<Record<string, unknown>>;

/**
 * Base class for every structured error in the stack.
 * Always thrown — never returned as a value.
 */
export class DomainError<C extends ErrorCode = ErrorCode> extends Error {
  public readonly code: C;
  public readonly category: ErrorCategory;
  public readonly details: ErrorDetails | undefined;

  constructor(code: C, message: string, details?: ErrorDetails) {
    super(message);
    this.name = "DomainError";
    this.code = code;
    this.category = ERROR_CATEGORIES[code];
    this.details = details;
  }
}

export function categoryOf(code: ErrorCode): ErrorCategory {
  return ERROR_CATEGORIES[code];
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === "string" && Object.hasOwn(ERROR_CATEGORIES, value);
}

export function isDomainError(value: unknown): value is DomainError {
  return value instanceof DomainError;
}
