/**
 * @circulate/lending
 *
 * Loan lifecycle, lending policy and the audited lending desk.
 */

export type {
  LendingPolicy,
  NumericPolicySetting,
  PolicySetting,
  PolicyUpdate,
  PolicyChange,
  CustodianChange,
  StewardChange,
  PolicySnapshot,
  Loan,
  BorrowResult,
  ReturnResult,
  ExtensionResult,
  LoanFilter,
  LendingErrorCode,
} from "./types.js";
export { LendingError } from "./types.js";

export type { ErrorKind } from "./errors.js";
export { errorKindOf, domainErrorCode } from "./errors.js";

export type { Clock } from "./clock.js";
export { SystemClock, ManualClock } from "./clock.js";

export { SerialRegion } from "./serial-region.js";
export { UndoJournal, atomically } from "./undo-journal.js";

export { PostCommitReporter } from "./post-commit.js";
export type { PostCommitFailure, PostCommitErrorHandler } from "./post-commit.js";

export { PolicyStore } from "./policy-store.js";
export type { PolicyStoreOptions } from "./policy-store.js";

export { LoanLedger } from "./loan-ledger.js";
export type { LoanLedgerDeps, LoanObserver, ItemDirectory } from "./loan-ledger.js";

export { LendingDesk } from "./lending-desk.js";
export type { LendingDeskOptions, ItemAvailability, DeskSnapshot } from "./lending-desk.js";

export { createLendingDesk } from "./create-desk.js";
export type { LendingDeskConfig, LendingEngine } from "./create-desk.js";
