/**
 * @circulate/escrow — Types for deposit escrow and value transfer.
 *
 * Rules:
 * - One currency per vault; mixing currencies is an error
 * - Amounts are Money strings, arithmetic happens in bigint
 * - Outbound transfers are the last effect of an operation
 */

import type { AccountId, LoanKey, Money } from "@circulate/types";

// ─── Value Transfer ──────────────────────────────────────────────────────

/**
 * Where deposit value enters and leaves the engine.
 *
 * Both calls either complete or throw. A throwing call aborts the
 * surrounding operation, which then rolls back its own mutations.
 */
export interface FundsSink {
  /** Credit the engine with value sent by `from`. */
  received(from: AccountId, amount: Money): void;

  /** Pay value out of the engine to `to`. */
  payOut(to: AccountId, amount: Money): void;
}

// ─── Escrow ──────────────────────────────────────────────────────────────

export interface EscrowedDeposit {
  readonly key: LoanKey;
  readonly amount: Money;
}

export interface PoolWithdrawal {
  readonly to: AccountId;
  readonly amount: Money;
  /** Pool balance after the withdrawal */
  readonly poolBalance: Money;
}

export interface EscrowSnapshot {
  readonly deposits: readonly EscrowedDeposit[];
  readonly totalEscrowed: Money;
  readonly poolBalance: Money;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type EscrowErrorCode =
  | "NOT_STEWARD"
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT"
  | "CURRENCY_MISMATCH"
  | "ACTIVE_LOAN_EXISTS"
  | "NO_SUCH_LOAN"
  | "INSUFFICIENT_POOL"
  | "INSUFFICIENT_FUNDS";

export class EscrowError extends Error {
  public readonly code: EscrowErrorCode;

  constructor(code: EscrowErrorCode, message: string) {
    super(message);
    this.name = "EscrowError";
    this.code = code;
  }
}
