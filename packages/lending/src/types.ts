/**
 * @circulate/lending — Types for the loan lifecycle and lending policy.
 *
 * Rules:
 * - All types are readonly
 * - Timestamps and durations are whole seconds
 * - A missing loan is `undefined`, never a zeroed record
 */

import type { AccountId, ItemId, Money, Seconds, Timestamp } from "@circulate/types";

// ─── Policy ──────────────────────────────────────────────────────────────

export interface LendingPolicy {
  /** Seconds from borrow to due date. Non-zero. */
  readonly loanDuration: Seconds;

  /** Minimum deposit escrowed per loan. Positive, in the engine currency. */
  readonly depositAmount: Money;

  /** Seconds after the due date during which a return still counts as on time. */
  readonly gracePeriod: Seconds;

  /** Seconds added to the due date per extension. Non-zero. */
  readonly extensionDuration: Seconds;

  /** Extensions allowed per loan. Zero disables extensions. */
  readonly maxExtensions: number;
}

export type NumericPolicySetting =
  | "loanDuration"
  | "gracePeriod"
  | "extensionDuration"
  | "maxExtensions";

export type PolicySetting = NumericPolicySetting | "depositAmount";

export type PolicyUpdate =
  | { readonly setting: NumericPolicySetting; readonly value: number }
  | { readonly setting: "depositAmount"; readonly value: Money };

/** Audit record of a policy change. */
export interface PolicyChange {
  readonly setting: PolicySetting;
  readonly oldValue: number | Money;
  readonly newValue: number | Money;
}

export interface CustodianChange {
  readonly oldCustodian: AccountId | null;
  readonly newCustodian: AccountId;
}

export interface StewardChange {
  readonly oldSteward: AccountId;
  readonly newSteward: AccountId | null;
}

export interface PolicySnapshot {
  readonly policy: LendingPolicy;
  readonly custodian: AccountId | null;
  readonly steward: AccountId | null;
  readonly curators: readonly AccountId[];
}

// ─── Loans ───────────────────────────────────────────────────────────────

export interface Loan {
  readonly borrower: AccountId;
  readonly itemId: ItemId;

  /** Account the unit came from and returns to */
  readonly custodian: AccountId;

  readonly openedAt: Timestamp;
  readonly dueDate: Timestamp;

  /** Amount actually escrowed at borrow time; refunded or forfeited in full */
  readonly deposit: Money;

  readonly extensionsUsed: number;
}

export interface BorrowResult {
  readonly loan: Loan;
  readonly dueDate: Timestamp;
}

export interface ReturnResult {
  readonly loan: Loan;
  readonly returnedAt: Timestamp;
  readonly late: boolean;
  /** Deposit paid back to the borrower (on time) or moved into the pool (late) */
  readonly deposit: Money;
}

export interface ExtensionResult {
  readonly loan: Loan;
  readonly previousDueDate: Timestamp;
  readonly dueDate: Timestamp;
  readonly extensionsUsed: number;
}

export interface LoanFilter {
  readonly borrower?: AccountId | undefined;
  readonly itemId?: ItemId | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type LendingErrorCode =
  | "NOT_STEWARD"
  | "NOT_MEMBER"
  | "NO_SUCH_ITEM"
  | "NO_SUCH_LOAN"
  | "ACTIVE_LOAN_EXISTS"
  | "NO_ACTIVE_LOAN"
  | "MAX_EXTENSIONS_REACHED"
  | "NOT_HOLDER"
  | "ITEM_PAUSED"
  | "UNAVAILABLE"
  | "REENTRANT_CALL"
  | "STEWARD_RENOUNCED"
  | "DEPOSIT_TOO_LOW"
  | "INVALID_POLICY_VALUE"
  | "BRANCH_UNSET"
  | "INVALID_ACCOUNT"
  | "CURRENCY_MISMATCH";

/**
 * Structured error from the loan ledger, policy store and lending desk.
 */
export class LendingError extends Error {
  public readonly code: LendingErrorCode;

  constructor(code: LendingErrorCode, message: string) {
    super(message);
    this.name = "LendingError";
    this.code = code;
  }
}
