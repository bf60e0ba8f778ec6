/**
 * @circulate/lending — Loan ledger.
 *
 * One record per outstanding (borrower, item) claim.
 *
 *   Available ──borrow──▶ Borrowed ──return──▶ Available
 *                          │    ▲
 *                          └────┘ extend (dueDate shifted)
 *
 * Rules:
 * - At most one active loan per key
 * - Preconditions are checked in a fixed order; the first failure wins
 * - Each transition runs inside the serialized region of its key
 * - Mutations are journaled; the external value transfer runs last and a
 *   failure there rolls everything back
 * - Observers run after commit, still inside the region; their errors go
 *   to the post-commit reporter and the transition still returns its result
 * - A return is late only when now > dueDate + gracePeriod
 * - The deposit refunded or forfeited is the one captured at borrow time,
 *   stored in the currency's scale
 * - A due date must stay a safe integer; a policy that would push it past
 *   that fails with INVALID_POLICY_VALUE before anything changes
 */

import type { AccountId, ItemId, LoanKey, Money, Timestamp } from "@circulate/types";
import { loanKey } from "@circulate/types";
import type { CatalogItem, MembershipOracle, UnitCustody } from "@circulate/catalog";
import type { EscrowVault, FundsSink } from "@circulate/escrow";
import { compareMoney, normalizeMoney, zeroMoney } from "@circulate/escrow";
import type { PolicyStore } from "./policy-store.js";
import { PostCommitReporter } from "./post-commit.js";
import type { PostCommitFailure } from "./post-commit.js";
import { SerialRegion } from "./serial-region.js";
import type {
  BorrowResult,
  ExtensionResult,
  Loan,
  LoanFilter,
  ReturnResult,
} from "./types.js";
import { LendingError } from "./types.js";
import { atomically } from "./undo-journal.js";

/** The slice of the catalog the ledger reads. */
export interface ItemDirectory {
  getItem(itemId: ItemId): CatalogItem | undefined;
}

/**
 * Notified inside the key's region right after a transition commits.
 * Errors thrown here are reported, never rethrown.
 */
export interface LoanObserver {
  loanOpened(result: BorrowResult): void;
  loanReturned(result: ReturnResult): void;
  loanExtended(result: ExtensionResult): void;
}

export interface LoanLedgerDeps {
  readonly items: ItemDirectory;
  readonly inventory: UnitCustody;
  readonly membership: MembershipOracle;
  readonly policy: PolicyStore;
  readonly vault: EscrowVault;
  readonly sink: FundsSink;
  readonly region?: SerialRegion | undefined;
  readonly observer?: LoanObserver | undefined;
  /** Receives observer errors. Default: a reporter that keeps them. */
  readonly reporter?: PostCommitReporter | undefined;
}

export class LoanLedger {
  private readonly _loans: Map<LoanKey, Loan> = new Map();
  private readonly _deps: LoanLedgerDeps;
  private readonly _region: SerialRegion;
  private readonly _reporter: PostCommitReporter;

  constructor(deps: LoanLedgerDeps) {
    this._deps = deps;
    this._region = deps.region ?? new SerialRegion();
    this._reporter = deps.reporter ?? new PostCommitReporter();
  }

  // ─── Transitions ───────────────────────────────────────────────────────

  /**
   * Open a loan. The whole of `paidDeposit` is escrowed, surplus included.
   *
   * @throws LendingError NOT_MEMBER, NO_SUCH_ITEM, BRANCH_UNSET, ITEM_PAUSED,
   *   ACTIVE_LOAN_EXISTS, DEPOSIT_TOO_LOW, UNAVAILABLE, INVALID_POLICY_VALUE
   */
  borrow(borrower: AccountId, itemId: ItemId, paidDeposit: Money, now: Timestamp): BorrowResult {
    const key = loanKey(borrower, itemId);
    return this._region.run(key, () => {
      const { inventory, membership, policy, vault, sink } = this._deps;

      if (!membership.isMember(borrower)) {
        throw new LendingError("NOT_MEMBER", `"${borrower}" does not hold borrowing rights`);
      }
      const item = this._deps.items.getItem(itemId);
      if (item === undefined) {
        throw new LendingError("NO_SUCH_ITEM", `Unknown catalog item: ${itemId}`);
      }
      const custodian = policy.custodian();
      if (custodian === null) {
        throw new LendingError("BRANCH_UNSET", "No custodian account is configured");
      }
      if (item.paused) {
        throw new LendingError("ITEM_PAUSED", `Item ${itemId} is paused`);
      }
      if (this._loans.has(key)) {
        throw new LendingError("ACTIVE_LOAN_EXISTS", `"${borrower}" already has item ${itemId} on loan`);
      }
      const required = policy.getPolicy().depositAmount;
      if (paidDeposit.currency !== required.currency || paidDeposit.decimals !== required.decimals) {
        throw new LendingError(
          "CURRENCY_MISMATCH",
          `Deposit must be in ${required.currency}, got ${paidDeposit.currency}`,
        );
      }
      if (compareMoney(paidDeposit, required) < 0) {
        throw new LendingError(
          "DEPOSIT_TOO_LOW",
          `Deposit ${paidDeposit.amount} is below the required ${required.amount}`,
        );
      }
      if (inventory.balanceOf(custodian, itemId) < 1) {
        throw new LendingError("UNAVAILABLE", `No units of item ${itemId} are available`);
      }

      const deposit = normalizeMoney(paidDeposit);
      const loan: Loan = {
        borrower,
        itemId,
        custodian,
        openedAt: now,
        dueDate: shiftDueDate(now, policy.getPolicy().loanDuration, "loanDuration"),
        deposit,
        extensionsUsed: 0,
      };

      atomically((journal) => {
        this._loans.set(key, loan);
        journal.record(() => this._loans.delete(key));

        inventory.transfer(custodian, borrower, itemId, 1);
        journal.record(() => inventory.transfer(borrower, custodian, itemId, 1));

        vault.lock(key, deposit);
        journal.record(() => vault.release(key));

        sink.received(borrower, deposit);
      });

      const result: BorrowResult = { loan, dueDate: loan.dueDate };
      this.notify("borrow", key, (observer) => observer.loanOpened(result));
      return result;
    });
  }

  /**
   * Close a loan. On time: the deposit is paid back in full. Late: it is
   * forfeited into the pool.
   *
   * @throws LendingError NO_SUCH_LOAN, NOT_HOLDER
   */
  returnItem(borrower: AccountId, itemId: ItemId, now: Timestamp): ReturnResult {
    const key = loanKey(borrower, itemId);
    return this._region.run(key, () => {
      const { inventory, policy, vault, sink } = this._deps;

      const loan = this._loans.get(key);
      if (loan === undefined) {
        throw new LendingError("NO_SUCH_LOAN", `"${borrower}" has no loan of item ${itemId}`);
      }
      if (inventory.balanceOf(borrower, itemId) < 1) {
        throw new LendingError("NOT_HOLDER", `"${borrower}" no longer holds a unit of item ${itemId}`);
      }

      const late = now > loan.dueDate + policy.getPolicy().gracePeriod;

      atomically((journal) => {
        inventory.transfer(borrower, loan.custodian, itemId, 1);
        journal.record(() => inventory.transfer(loan.custodian, borrower, itemId, 1));

        this._loans.delete(key);
        journal.record(() => this._loans.set(key, loan));

        if (late) {
          vault.forfeit(key);
          return;
        }
        const refund = vault.release(key);
        journal.record(() => vault.lock(key, refund));

        sink.payOut(borrower, refund);
      });

      const result: ReturnResult = { loan, returnedAt: now, late, deposit: loan.deposit };
      this.notify("return", key, (observer) => observer.loanReturned(result));
      return result;
    });
  }

  /**
   * Push the due date out by the current extension duration.
   *
   * @throws LendingError NO_ACTIVE_LOAN (no loan, or already past due),
   *   MAX_EXTENSIONS_REACHED, INVALID_POLICY_VALUE
   */
  requestExtension(borrower: AccountId, itemId: ItemId, now: Timestamp): ExtensionResult {
    const key = loanKey(borrower, itemId);
    return this._region.run(key, () => {
      const policy = this._deps.policy.getPolicy();

      const loan = this._loans.get(key);
      if (loan === undefined) {
        throw new LendingError("NO_ACTIVE_LOAN", `"${borrower}" has no loan of item ${itemId}`);
      }
      if (now > loan.dueDate) {
        throw new LendingError(
          "NO_ACTIVE_LOAN",
          `Loan of item ${itemId} to "${borrower}" was due at ${loan.dueDate} and can no longer be extended`,
        );
      }
      if (loan.extensionsUsed >= policy.maxExtensions) {
        throw new LendingError(
          "MAX_EXTENSIONS_REACHED",
          `Loan of item ${itemId} to "${borrower}" has used all ${policy.maxExtensions} extension(s)`,
        );
      }

      const extended: Loan = {
        ...loan,
        dueDate: shiftDueDate(loan.dueDate, policy.extensionDuration, "extensionDuration"),
        extensionsUsed: loan.extensionsUsed + 1,
      };
      this._loans.set(key, extended);

      const result: ExtensionResult = {
        loan: extended,
        previousDueDate: loan.dueDate,
        dueDate: extended.dueDate,
        extensionsUsed: extended.extensionsUsed,
      };
      this.notify("extend", key, (observer) => observer.loanExtended(result));
      return result;
    });
  }

  // ─── Queries ───────────────────────────────────────────────────────────

  getLoan(borrower: AccountId, itemId: ItemId): Loan | undefined {
    return this._loans.get(loanKey(borrower, itemId));
  }

  /** Due date of the active loan, or 0 when there is none. */
  loanDueDate(borrower: AccountId, itemId: ItemId): Timestamp {
    return this.getLoan(borrower, itemId)?.dueDate ?? 0;
  }

  /** Deposit held for the active loan, or zero when there is none. */
  loanDeposit(borrower: AccountId, itemId: ItemId): Money {
    const policy = this._deps.policy;
    return this.getLoan(borrower, itemId)?.deposit ?? zeroMoney(policy.currency, policy.decimals);
  }

  listLoans(filter: LoanFilter = {}): readonly Loan[] {
    return [...this._loans.values()]
      .filter((loan) => filter.borrower === undefined || loan.borrower === filter.borrower)
      .filter((loan) => filter.itemId === undefined || loan.itemId === filter.itemId)
      .sort(byOpenedThenKey);
  }

  /**
   * Loans that would be late if returned at `now`.
   */
  overdueLoans(now: Timestamp): readonly Loan[] {
    const grace = this._deps.policy.getPolicy().gracePeriod;
    return this.listLoans().filter((loan) => now > loan.dueDate + grace);
  }

  get activeCount(): number {
    return this._loans.size;
  }

  /** Observer errors kept by the default reporter. */
  observerFailures(): readonly PostCommitFailure[] {
    return this._reporter.failures();
  }

  private notify(operation: string, key: LoanKey, call: (observer: LoanObserver) => void): void {
    const observer = this._deps.observer;
    if (observer !== undefined) {
      this._reporter.guard(operation, key, () => call(observer));
    }
  }
}

function byOpenedThenKey(a: Loan, b: Loan): number {
  if (a.openedAt !== b.openedAt) return a.openedAt - b.openedAt;
  return loanKey(a.borrower, a.itemId).localeCompare(loanKey(b.borrower, b.itemId));
}

function shiftDueDate(from: Timestamp, by: number, setting: "loanDuration" | "extensionDuration"): Timestamp {
  const dueDate = from + by;
  if (!Number.isSafeInteger(dueDate)) {
    throw new LendingError(
      "INVALID_POLICY_VALUE",
      `${setting} of ${by} moves the due date past the largest representable timestamp`,
    );
  }
  return dueDate;
}
