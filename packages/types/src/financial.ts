/**
 * Financial Types
 *
 * Monetary primitives for deposit escrow.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit (no implicit default)
 * - Arithmetic happens in bigint, never on these strings directly
 */

/**
 * Currency identifier (ISO 4217 code or token symbol).
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 */
export interface Money {
  /** String representation of the amount (e.g., "25.00", "10") */
  readonly amount: string;

  /** Currency code or symbol (e.g., "EUR", "USDC") */
  readonly currency: Currency;

  /** Number of decimal places for this currency. */
  readonly decimals: number;
}
