/**
 * @circulate/lending — Lending desk.
 *
 * Composes the catalog, inventory, membership, policy, escrow and loan
 * ledger into one engine addressed by actor ids, and writes every
 * committed change to the event store.
 *
 * Rules:
 * - Authorization comes from PolicyStore.accessFor(actor), never ambient state
 * - `now` is read from the Clock once per operation
 * - Events are appended only after the change has committed
 * - Loan events are appended inside the loan's serialized region
 * - Every payload is checked against the event catalog before append
 * - A failure to record or deliver events never undoes or hides a
 *   committed change; it goes to `onPostCommitError`
 */

import { randomUUID } from "node:crypto";
import type {
  AccessPolicy,
  AccountId,
  DomainEvent,
  EventSource,
  ItemId,
  Money,
  Timestamp,
} from "@circulate/types";
import { loanKey } from "@circulate/types";
import type {
  CatalogItem,
  CatalogRegistry,
  InventoryLedger,
  ItemMetadata,
  Membership,
  MembershipRegistry,
  MetadataPatch,
} from "@circulate/catalog";
import type { EscrowSnapshot, EscrowVault, FundsSink, PoolWithdrawal } from "@circulate/escrow";
import type {
  CirculateEventType,
  EventCatalog,
  EventStore,
} from "@circulate/event-store";
import { CIRCULATE_EVENTS, createCirculateCatalog } from "@circulate/event-store";
import type { Clock } from "./clock.js";
import { LoanLedger } from "./loan-ledger.js";
import type { LoanObserver } from "./loan-ledger.js";
import type { PolicyStore } from "./policy-store.js";
import { PostCommitReporter } from "./post-commit.js";
import type { PostCommitErrorHandler, PostCommitFailure } from "./post-commit.js";
import { SerialRegion } from "./serial-region.js";
import type {
  BorrowResult,
  CustodianChange,
  ExtensionResult,
  LendingPolicy,
  Loan,
  LoanFilter,
  PolicyChange,
  PolicySnapshot,
  PolicyUpdate,
  ReturnResult,
  StewardChange,
} from "./types.js";
import { LendingError } from "./types.js";

// ─── Types ───────────────────────────────────────────────────────────────

export interface LendingDeskOptions {
  readonly policy: PolicyStore;
  readonly catalog: CatalogRegistry;
  readonly inventory: InventoryLedger;
  readonly membership: MembershipRegistry;
  readonly vault: EscrowVault;
  readonly sink: FundsSink;
  readonly store: EventStore;
  readonly clock: Clock;
  readonly eventCatalog?: EventCatalog | undefined;
  /** Event and correlation id source. Default: random UUIDs. */
  readonly newId?: (() => string) | undefined;
  /**
   * Receives errors raised after an operation committed (event append,
   * subscribers). Default: kept and listed by `postCommitFailures()`.
   */
  readonly onPostCommitError?: PostCommitErrorHandler | undefined;
}

export interface ItemAvailability {
  readonly item: CatalogItem;
  readonly availableUnits: number;
  readonly totalUnits: number;
}

export interface DeskSnapshot {
  readonly takenAt: Timestamp;
  readonly policy: PolicySnapshot;
  readonly items: readonly ItemAvailability[];
  readonly loans: readonly Loan[];
  readonly escrow: EscrowSnapshot;
  readonly members: number;
  readonly eventCount: number;
}

interface PendingEvent {
  readonly type: CirculateEventType;
  readonly source: EventSource;
  readonly payload: Readonly<Record<string, unknown>>;
}

const POOL_REGION = "escrow:pool";

// ─── Desk ────────────────────────────────────────────────────────────────

export class LendingDesk {
  private readonly _opts: LendingDeskOptions;
  private readonly _ledger: LoanLedger;
  private readonly _region = new SerialRegion();
  private readonly _eventCatalog: EventCatalog;
  private readonly _newId: () => string;
  private readonly _reporter: PostCommitReporter;

  constructor(options: LendingDeskOptions) {
    this._opts = options;
    this._eventCatalog = options.eventCatalog ?? createCirculateCatalog();
    this._newId = options.newId ?? randomUUID;
    this._reporter = new PostCommitReporter(options.onPostCommitError);
    this._ledger = new LoanLedger({
      items: options.catalog,
      inventory: options.inventory,
      membership: options.membership,
      policy: options.policy,
      vault: options.vault,
      sink: options.sink,
      region: this._region,
      observer: this.loanObserver(),
      reporter: this._reporter,
    });
  }

  get store(): EventStore {
    return this._opts.store;
  }

  get clock(): Clock {
    return this._opts.clock;
  }

  // ─── Loans ─────────────────────────────────────────────────────────────

  /**
   * Borrow one unit. `deposit` defaults to the policy deposit.
   */
  borrow(borrower: AccountId, itemId: ItemId, deposit?: Money): BorrowResult {
    const paid = deposit ?? this._opts.policy.getPolicy().depositAmount;
    return this._ledger.borrow(borrower, itemId, paid, this.now());
  }

  returnItem(borrower: AccountId, itemId: ItemId): ReturnResult {
    return this._ledger.returnItem(borrower, itemId, this.now());
  }

  requestExtension(borrower: AccountId, itemId: ItemId): ExtensionResult {
    return this._ledger.requestExtension(borrower, itemId, this.now());
  }

  getLoan(borrower: AccountId, itemId: ItemId): Loan | undefined {
    return this._ledger.getLoan(borrower, itemId);
  }

  loanDueDate(borrower: AccountId, itemId: ItemId): Timestamp {
    return this._ledger.loanDueDate(borrower, itemId);
  }

  loanDeposit(borrower: AccountId, itemId: ItemId): Money {
    return this._ledger.loanDeposit(borrower, itemId);
  }

  listLoans(filter?: LoanFilter): readonly Loan[] {
    return this._ledger.listLoans(filter);
  }

  overdueLoans(now: Timestamp = this.now()): readonly Loan[] {
    return this._ledger.overdueLoans(now);
  }

  // ─── Catalog ───────────────────────────────────────────────────────────

  createItem(actor: AccountId, metadata: ItemMetadata): CatalogItem {
    const now = this.now();
    const item = this._opts.catalog.createItem(this.access(actor), metadata, now);
    this.publish(itemStream(item.id), actor, now, [
      {
        type: CIRCULATE_EVENTS.ITEM_CREATED,
        source: "catalog",
        payload: { itemId: item.id, title: item.metadata.title, createdBy: actor },
      },
    ]);
    return item;
  }

  updateMetadata(actor: AccountId, itemId: ItemId, patch: MetadataPatch): CatalogItem {
    const now = this.now();
    const { item, fields } = this._opts.catalog.updateMetadata(this.access(actor), itemId, patch, now);
    this.publish(itemStream(itemId), actor, now, [
      {
        type: CIRCULATE_EVENTS.ITEM_UPDATED,
        source: "catalog",
        payload: { itemId, fields: [...fields], updatedBy: actor },
      },
    ]);
    return item;
  }

  setPaused(actor: AccountId, itemId: ItemId, paused: boolean): CatalogItem {
    const now = this.now();
    const item = this._opts.catalog.setPaused(this.access(actor), itemId, paused, now);
    this.publish(itemStream(itemId), actor, now, [
      {
        type: CIRCULATE_EVENTS.ITEM_PAUSED,
        source: "catalog",
        payload: { itemId, paused, changedBy: actor },
      },
    ]);
    return item;
  }

  /**
   * Mint units to `to`, or to the custodian when `to` is omitted.
   * Returns the recipient's new balance.
   */
  mint(actor: AccountId, itemId: ItemId, quantity: number, to?: AccountId): number {
    const recipient = to ?? this._opts.policy.custodian();
    if (recipient === null) {
      throw new LendingError("BRANCH_UNSET", "No recipient given and no custodian account is configured");
    }
    const now = this.now();
    const balance = this._opts.inventory.mint(this.access(actor), itemId, recipient, quantity);
    this.publish(itemStream(itemId), actor, now, [
      {
        type: CIRCULATE_EVENTS.UNITS_MINTED,
        source: "catalog",
        payload: { itemId, to: recipient, quantity, balance },
      },
    ]);
    return balance;
  }

  getItem(itemId: ItemId): CatalogItem | undefined {
    return this._opts.catalog.getItem(itemId);
  }

  /** Units the custodian can lend right now. */
  availableUnits(itemId: ItemId): number {
    const custodian = this._opts.policy.custodian();
    return custodian === null ? 0 : this._opts.inventory.balanceOf(custodian, itemId);
  }

  // ─── Membership ────────────────────────────────────────────────────────

  grantMembership(actor: AccountId, account: AccountId, tier: string | null = null): Membership {
    const now = this.now();
    const membership = this._opts.membership.grant(this.access(actor), account, tier, now);
    this.publish("membership", actor, now, [
      {
        type: CIRCULATE_EVENTS.MEMBERSHIP_GRANTED,
        source: "membership",
        payload: { account, tier, grantedBy: actor },
      },
    ]);
    return membership;
  }

  /**
   * Returns false (and records nothing) when the account was not a member.
   */
  revokeMembership(actor: AccountId, account: AccountId): boolean {
    const now = this.now();
    const revoked = this._opts.membership.revoke(this.access(actor), account);
    if (revoked) {
      this.publish("membership", actor, now, [
        {
          type: CIRCULATE_EVENTS.MEMBERSHIP_REVOKED,
          source: "membership",
          payload: { account, revokedBy: actor },
        },
      ]);
    }
    return revoked;
  }

  isMember(account: AccountId): boolean {
    return this._opts.membership.isMember(account);
  }

  // ─── Policy & Roles ────────────────────────────────────────────────────

  updatePolicy(actor: AccountId, update: PolicyUpdate): PolicyChange {
    const now = this.now();
    const change = this._opts.policy.update(this.access(actor), update);
    this.publish("policy", actor, now, [
      {
        type: CIRCULATE_EVENTS.POLICY_SETTING_CHANGED,
        source: "policy",
        payload: {
          setting: change.setting,
          oldValue: policyValue(change.oldValue),
          newValue: policyValue(change.newValue),
          changedBy: actor,
        },
      },
    ]);
    return change;
  }

  setCustodian(actor: AccountId, account: AccountId): CustodianChange {
    const now = this.now();
    const change = this._opts.policy.setCustodian(this.access(actor), account);
    this.publish("policy", actor, now, [
      {
        type: CIRCULATE_EVENTS.CUSTODIAN_CHANGED,
        source: "policy",
        payload: { ...change, changedBy: actor },
      },
    ]);
    return change;
  }

  grantCurator(actor: AccountId, account: AccountId): boolean {
    return this.changeCurator(actor, account, true);
  }

  revokeCurator(actor: AccountId, account: AccountId): boolean {
    return this.changeCurator(actor, account, false);
  }

  transferStewardship(actor: AccountId, next: AccountId): StewardChange {
    const now = this.now();
    const change = this._opts.policy.transferStewardship(this.access(actor), next);
    this.publish("policy", actor, now, [
      {
        type: CIRCULATE_EVENTS.STEWARD_TRANSFERRED,
        source: "policy",
        payload: { oldSteward: change.oldSteward, newSteward: next },
      },
    ]);
    return change;
  }

  renounceStewardship(actor: AccountId): StewardChange {
    const now = this.now();
    const change = this._opts.policy.renounceStewardship(this.access(actor));
    this.publish("policy", actor, now, [
      {
        type: CIRCULATE_EVENTS.STEWARD_RENOUNCED,
        source: "policy",
        payload: { oldSteward: change.oldSteward },
      },
    ]);
    return change;
  }

  getPolicy(): LendingPolicy {
    return this._opts.policy.getPolicy();
  }

  policySnapshot(): PolicySnapshot {
    return this._opts.policy.snapshot();
  }

  // ─── Escrow ────────────────────────────────────────────────────────────

  withdrawPool(actor: AccountId, to: AccountId, amount: Money): PoolWithdrawal {
    return this._region.run(POOL_REGION, () => {
      const now = this.now();
      const withdrawal = this._opts.vault.withdrawPool(this.access(actor), to, amount, this._opts.sink);
      this.publish("escrow", actor, now, [
        {
          type: CIRCULATE_EVENTS.POOL_WITHDRAWN,
          source: "escrow",
          payload: {
            to,
            amount: withdrawal.amount.amount,
            currency: withdrawal.amount.currency,
            poolBalance: withdrawal.poolBalance.amount,
            withdrawnBy: actor,
          },
        },
      ]);
      return withdrawal;
    });
  }

  escrowedFor(borrower: AccountId, itemId: ItemId): Money | undefined {
    return this._opts.vault.escrowedFor(loanKey(borrower, itemId));
  }

  poolBalance(): Money {
    return this._opts.vault.poolBalance();
  }

  totalEscrowed(): Money {
    return this._opts.vault.totalEscrowed();
  }

  // ─── Diagnostics ───────────────────────────────────────────────────────

  /** Post-commit failures kept because no handler took them. */
  postCommitFailures(): readonly PostCommitFailure[] {
    return this._reporter.failures();
  }

  snapshot(): DeskSnapshot {
    const custodian = this._opts.policy.custodian();
    return {
      takenAt: this.now(),
      policy: this._opts.policy.snapshot(),
      items: this._opts.catalog.listItems().map((item) => ({
        item,
        availableUnits: custodian === null ? 0 : this._opts.inventory.balanceOf(custodian, item.id),
        totalUnits: this._opts.inventory.totalUnits(item.id),
      })),
      loans: this._ledger.listLoans(),
      escrow: this._opts.vault.snapshot(),
      members: this._opts.membership.count,
      eventCount: this._opts.store.globalPosition(),
    };
  }

  // ─── Internals ─────────────────────────────────────────────────────────

  private now(): Timestamp {
    return this._opts.clock.now();
  }

  private access(actor: AccountId): AccessPolicy {
    return this._opts.policy.accessFor(actor);
  }

  private changeCurator(actor: AccountId, account: AccountId, granted: boolean): boolean {
    const now = this.now();
    const access = this.access(actor);
    const changed = granted
      ? this._opts.policy.grantCurator(access, account)
      : this._opts.policy.revokeCurator(access, account);
    if (changed) {
      this.publish("policy", actor, now, [
        {
          type: CIRCULATE_EVENTS.CURATOR_CHANGED,
          source: "policy",
          payload: { account, granted, changedBy: actor },
        },
      ]);
    }
    return changed;
  }

  private loanObserver(): LoanObserver {
    return {
      loanOpened: ({ loan }) => {
        this.publish(loanStream(loan), loan.borrower, loan.openedAt, [
          {
            type: CIRCULATE_EVENTS.LOAN_OPENED,
            source: "lending",
            payload: {
              borrower: loan.borrower,
              itemId: loan.itemId,
              custodian: loan.custodian,
              openedAt: loan.openedAt,
              dueDate: loan.dueDate,
              deposit: loan.deposit.amount,
              currency: loan.deposit.currency,
            },
          },
        ]);
      },
      loanExtended: ({ loan, previousDueDate }) => {
        this.publish(loanStream(loan), loan.borrower, this.now(), [
          {
            type: CIRCULATE_EVENTS.LOAN_EXTENDED,
            source: "lending",
            payload: {
              borrower: loan.borrower,
              itemId: loan.itemId,
              previousDueDate,
              dueDate: loan.dueDate,
              extensionsUsed: loan.extensionsUsed,
            },
          },
        ]);
      },
      loanReturned: ({ loan, returnedAt, late, deposit }) => {
        const settlement: PendingEvent = late
          ? {
              type: CIRCULATE_EVENTS.DEPOSIT_FORFEITED,
              source: "escrow",
              payload: {
                borrower: loan.borrower,
                itemId: loan.itemId,
                amount: deposit.amount,
                currency: deposit.currency,
                poolBalance: this._opts.vault.poolBalance().amount,
              },
            }
          : {
              type: CIRCULATE_EVENTS.DEPOSIT_RELEASED,
              source: "escrow",
              payload: {
                borrower: loan.borrower,
                itemId: loan.itemId,
                amount: deposit.amount,
                currency: deposit.currency,
              },
            };
        this.publish(loanStream(loan), loan.borrower, returnedAt, [
          {
            type: CIRCULATE_EVENTS.LOAN_RETURNED,
            source: "lending",
            payload: {
              borrower: loan.borrower,
              itemId: loan.itemId,
              returnedAt,
              dueDate: loan.dueDate,
              late,
            },
          },
          settlement,
        ]);
      },
    };
  }

  /**
   * Validate and append one operation's events. All events of the
   * operation share a correlation id; later ones name the first as cause.
   * Runs after the operation committed, so failures are reported.
   */
  private publish(
    streamId: string,
    actor: AccountId,
    now: Timestamp,
    pending: readonly PendingEvent[],
  ): void {
    const operation = pending[0]?.type ?? "publish";
    this._reporter.guard(operation, streamId, () => {
      for (const { type, payload } of pending) {
        this._eventCatalog.assertValid(type, payload);
      }

      const correlationId = this._newId();
      const timestamp = new Date(now * 1000).toISOString();
      let causationId: string | undefined;
      const events: DomainEvent[] = pending.map(({ type, source, payload }) => {
        const eventId = this._newId();
        const event: DomainEvent = {
          type,
          metadata: {
            eventId,
            timestamp,
            actor,
            correlationId,
            source,
            ...(causationId !== undefined ? { causationId } : {}),
          },
          payload,
        };
        if (causationId === undefined) causationId = eventId;
        return event;
      });

      this._opts.store.append(streamId, events);
    });
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

function itemStream(itemId: ItemId): string {
  return `item:${itemId}`;
}

function loanStream(loan: Loan): string {
  return `loan:${loan.borrower}:${loan.itemId}`;
}

function policyValue(value: number | Money): string | number {
  return typeof value === "number" ? value : value.amount;
}
