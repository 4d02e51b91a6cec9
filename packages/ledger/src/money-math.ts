/**
 * @coffer/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Currency must match for all Money operations
 * - Caller input must fit the target scale exactly (no silent rounding)
 * - Products, quotients and oracle values round half away from zero
 */

import type { Money } from "@coffer/types";
import { LedgerError } from "./types.js";

// ─── Scaling ─────────────────────────────────────────────────────────────

const POWERS = new Map<number, bigint>();

/** 10^exponent as a bigint (cached). */
export function pow10(exponent: number): bigint {
  let value = POWERS.get(exponent);
  if (value === undefined) {
    value = 10n ** BigInt(exponent);
    POWERS.set(exponent, value);
  }
  return value;
}

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=8 → 10000000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  // Validate format: optional minus, digits, optional decimal point + digits
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
      { amount: trimmed, decimals },
    );
  }

  const paddedFrac = fracPart.padEnd(decimals, "0");
  const value = BigInt(intPart + paddedFrac);

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=8 → "1.00000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Re-parse an amount and print it at the given scale.
 * "200" at 2 → "200.00". Rejects more precision than the scale holds.
 */
export function normalizeAmount(amount: string, decimals: number): string {
  return formatAmount(parseAmount(amount, decimals), decimals);
}

// ─── Rounding ────────────────────────────────────────────────────────────

/**
 * Integer division rounding half away from zero.
 *
 * 5n / 2n → 3n, -5n / 2n → -3n, 4n / 3n → 1n
 */
export function divRoundHalfUp(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Division by zero");
  }
  const negative = (numerator < 0n) !== (denominator < 0n);
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;
  const quotient = n / d;
  const remainder = n % d;
  const rounded = remainder * 2n >= d ? quotient + 1n : quotient;
  return negative ? -rounded : rounded;
}

/**
 * Move a scaled value from one scale to another.
 * Widening is exact; narrowing rounds half-up.
 */
export function rescale(scaled: bigint, from: number, to: number): bigint {
  if (to === from) return scaled;
  if (to > from) return scaled * pow10(to - from);
  return divRoundHalfUp(scaled, pow10(from - to));
}

/**
 * a × b, each at its own scale, rounded to `outDecimals`.
 *
 * multiplyScaled(150n, 2, 300000000n, 8, 2) → 450n  (1.50 × 3 = 4.50)
 */
export function multiplyScaled(
  a: bigint,
  aDecimals: number,
  b: bigint,
  bDecimals: number,
  outDecimals: number,
): bigint {
  return rescale(a * b, aDecimals + bDecimals, outDecimals);
}

/**
 * a ÷ b, each at its own scale, rounded to `outDecimals`.
 * Throws INVALID_AMOUNT when b is zero.
 */
export function divideScaled(
  a: bigint,
  aDecimals: number,
  b: bigint,
  bDecimals: number,
  outDecimals: number,
): bigint {
  // a/10^ad ÷ b/10^bd = (a × 10^bd) / (b × 10^ad); scale up by 10^out
  const shift = outDecimals + bDecimals - aDecimals;
  if (shift >= 0) {
    return divRoundHalfUp(a * pow10(shift), b);
  }
  return divRoundHalfUp(a, b * pow10(-shift));
}

// ─── Canonicalization ────────────────────────────────────────────────────

const LOOSE_DECIMAL = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/**
 * Convert an external value (oracle output, JSON number) into the
 * canonical scaled form, rounding half-up to `decimals`.
 *
 * Accepts strings of any precision and exponent notation
 * ("1.5e-3", "190.123456789") as well as finite numbers.
 */
export function canonicalizeDecimal(value: string | number, decimals: number): bigint {
  let text: string;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new LedgerError("INVALID_AMOUNT", `Non-finite value: ${String(value)}`);
    }
    text = value.toString();
  } else {
    text = value.trim();
  }

  const match = LOOSE_DECIMAL.exec(text);
  const intDigits = match?.[2] ?? "";
  const fracDigits = match?.[3] ?? "";
  if (match === null || (intDigits === "" && fracDigits === "")) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid decimal value: "${text}"`);
  }

  const sign = match[1] === "-" ? -1n : 1n;
  const exponent = Number(match[4] ?? "0");
  const digits = BigInt((intDigits + fracDigits) || "0");
  // value = digits × 10^(exponent − fracDigits.length)
  const scale = fracDigits.length - exponent;

  const scaled = scale >= 0
    ? rescale(digits, scale, decimals)
    : digits * pow10(decimals - scale);
  return sign * scaled;
}

// ─── Money API ───────────────────────────────────────────────────────────

/**
 * Validate that a Money object is well-formed.
 * Throws LedgerError if invalid.
 */
export function validateMoney(money: Money): void {
  if (typeof money.currency !== "string" || money.currency.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Money currency must be a non-empty string, got: "${String(money.currency)}"`);
  }

  if (typeof money.decimals !== "number" || !Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new LedgerError("INVALID_AMOUNT", `Money decimals must be a non-negative integer, got: ${String(money.decimals)}`);
  }

  parseAmount(money.amount, money.decimals);
}

/**
 * Assert two Money values have the same currency and decimals.
 */
export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
      { left: a.currency, right: b.currency },
    );
  }
  if (a.decimals !== b.decimals) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Decimal mismatch for currency "${a.currency}": ${String(a.decimals)} vs ${String(b.decimals)}`,
    );
  }
}

export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  const sum = parseAmount(a.amount, a.decimals) + parseAmount(b.amount, b.decimals);
  return { amount: formatAmount(sum, a.decimals), currency: a.currency, decimals: a.decimals };
}

export function subtractMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  const diff = parseAmount(a.amount, a.decimals) - parseAmount(b.amount, b.decimals);
  return { amount: formatAmount(diff, a.decimals), currency: a.currency, decimals: a.decimals };
}

export function isZero(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) === 0n;
}

export function isPositive(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) > 0n;
}

export function isNegative(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) < 0n;
}

export function zeroMoney(currency: string, decimals: number): Money {
  return { amount: formatAmount(0n, decimals), currency, decimals };
}

/**
 * Compare two Money values. Returns -1, 0, or 1.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameCurrency(a, b);
  const va = parseAmount(a.amount, a.decimals);
  const vb = parseAmount(b.amount, b.decimals);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

export function absMoney(money: Money): Money {
  const scaled = parseAmount(money.amount, money.decimals);
  const abs = scaled < 0n ? -scaled : scaled;
  return { amount: formatAmount(abs, money.decimals), currency: money.currency, decimals: money.decimals };
}

/**
 * Parse a caller-supplied amount that must be strictly positive.
 */
export function parsePositiveAmount(amount: string, decimals: number, label = "Amount"): bigint {
  const scaled = parseAmount(amount, decimals);
  if (scaled <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be positive, got "${amount}"`, {
      amount,
    });
  }
  return scaled;
}
