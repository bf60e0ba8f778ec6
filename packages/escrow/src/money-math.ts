/**
 * @circulate/escrow — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Currency must match for all operations
 * - Amounts must be valid decimal strings
 */

import type { Currency, Money } from "@circulate/types";
import { EscrowError } from "./types.js";

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "12.50" with decimals=2 → 1250n
 * "5" with decimals=2 → 500n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new EscrowError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }

  const negative = trimmed.startsWith("-");
  const [intPart = "0", fracPart = ""] = (negative ? trimmed.slice(1) : trimmed).split(".");

  if (fracPart.length > decimals) {
    throw new EscrowError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${fracPart.length} decimal places, but currency allows ${decimals}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 1250n with decimals=2 → "12.50"
 * -5n with decimals=2 → "-0.05"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const str = (negative ? -scaled : scaled).toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
  return negative ? `-${result}` : result;
}

// ─── Money Values ────────────────────────────────────────────────────────

export function toMoney(scaled: bigint, currency: Currency, decimals: number): Money {
  return { amount: formatAmount(scaled, decimals), currency, decimals };
}

export function zeroMoney(currency: Currency, decimals: number): Money {
  return toMoney(0n, currency, decimals);
}

/**
 * Assert a Money value is in the given currency and scale.
 */
export function assertCurrency(money: Money, currency: Currency, decimals: number): void {
  if (money.currency !== currency || money.decimals !== decimals) {
    throw new EscrowError(
      "CURRENCY_MISMATCH",
      `Expected ${currency}/${decimals}, got ${money.currency}/${money.decimals}`,
    );
  }
}

/**
 * Rewrite a Money value in its canonical scale: "6" with decimals=2 → "6.00".
 */
export function normalizeMoney(money: Money): Money {
  return toMoney(parseAmount(money.amount, money.decimals), money.currency, money.decimals);
}

/**
 * Compare two Money values. Returns -1, 0, or 1.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertCurrency(b, a.currency, a.decimals);
  const va = parseAmount(a.amount, a.decimals);
  const vb = parseAmount(b.amount, b.decimals);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

/**
 * Validate a Money value as a strictly positive amount in the given currency.
 */
export function assertPositiveAmount(money: Money, currency: Currency, decimals: number): bigint {
  assertCurrency(money, currency, decimals);
  const scaled = parseAmount(money.amount, decimals);
  if (scaled <= 0n) {
    throw new EscrowError("INVALID_AMOUNT", `Amount must be positive, got "${money.amount}"`);
  }
  return scaled;
}
