/**
 * Lending Types
 *
 * Identifiers shared by the catalog, escrow and lending packages.
 *
 * Rules:
 * - Account identifiers are opaque non-empty strings
 * - Item identifiers are positive integers, assigned once and never reused
 * - Timestamps and durations are whole seconds
 */

/** Opaque account identifier (member, custodian, steward, curator). */
export type AccountId = string;

/** Catalog item identifier (1, 2, 3, ...). */
export type ItemId = number;

/** Unix time in whole seconds. */
export type Timestamp = number;

/** A duration in whole seconds. */
export type Seconds = number;

/**
 * Composite key of a loan claim.
 * At most one active loan exists per key.
 */
export interface LoanKeyParts {
  readonly borrower: AccountId;
  readonly itemId: ItemId;
}

/** String form of a loan key, used to index maps. */
export type LoanKey = `${string}#${number}`;

/**
 * Build the map key for a (borrower, item) claim.
 */
export function loanKey(borrower: AccountId, itemId: ItemId): LoanKey {
  return `${borrower}#${itemId}`;
}
