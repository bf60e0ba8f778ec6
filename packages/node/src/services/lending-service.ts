/**
 * LendingService — the lending engine as one HTTP-facing unit.
 *
 * Owns the desk, the in-memory funds sink and the audit log for a
 * single process. Routes call the desk directly; this class adds the
 * conversions and checks that only make sense at the HTTP edge.
 */

import type { AccountId, Money } from "@circulate/types";
import { InMemoryFundsSink } from "@circulate/escrow";
import { InMemoryEventStore } from "@circulate/event-store";
import type { EventStoreIntegrityResult, StoredEvent } from "@circulate/event-store";
import type { Clock, LendingDesk, LendingEngine, PostCommitErrorHandler } from "@circulate/lending";
import { createLendingDesk, LendingError } from "@circulate/lending";

// =============================================================================
// Config
// =============================================================================

export interface LendingServiceConfig {
  readonly steward: AccountId;
  readonly custodian?: AccountId | undefined;
  readonly curators?: readonly AccountId[] | undefined;
  readonly currency: string;
  readonly decimals: number;
  readonly loanDuration: number;
  readonly depositAmount: string;
  readonly gracePeriod: number;
  readonly extensionDuration: number;
  readonly maxExtensions: number;
  readonly clock?: Clock | undefined;
  /** Receives errors thrown by event subscribers. */
  readonly onSubscriberError?: ((error: unknown, event: StoredEvent) => void) | undefined;
  /** Receives errors raised after a change committed, e.g. a failed append. */
  readonly onPostCommitError?: PostCommitErrorHandler | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class LendingService {
  readonly desk: LendingDesk;
  readonly engine: LendingEngine;
  readonly funds: InMemoryFundsSink;
  readonly store: InMemoryEventStore;
  private readonly _currency: string;
  private readonly _decimals: number;

  constructor(config: LendingServiceConfig) {
    this._currency = config.currency;
    this._decimals = config.decimals;
    this.funds = new InMemoryFundsSink(config.currency, config.decimals);
    this.store = new InMemoryEventStore({ onHandlerError: config.onSubscriberError });
    this.engine = createLendingDesk({
      steward: config.steward,
      custodian: config.custodian,
      curators: config.curators,
      policy: {
        loanDuration: config.loanDuration,
        depositAmount: this.money(config.depositAmount),
        gracePeriod: config.gracePeriod,
        extensionDuration: config.extensionDuration,
        maxExtensions: config.maxExtensions,
      },
      clock: config.clock,
      sink: this.funds,
      store: this.store,
      onPostCommitError: config.onPostCommitError,
    });
    this.desk = this.engine.desk;
  }

  /** A Money value in the engine currency. */
  money(amount: string): Money {
    return { amount, currency: this._currency, decimals: this._decimals };
  }

  // ─── Wallets ─────────────────────────────────────────────────────────

  /**
   * Credit an account's wallet from outside the engine. Steward only.
   */
  fundWallet(actor: AccountId, account: AccountId, amount: string): Money {
    const steward = this.desk.policySnapshot().steward;
    if (steward === null || actor !== steward) {
      throw new LendingError("NOT_STEWARD", `Only the steward may fund wallets; "${actor}" is not`);
    }
    return this.funds.fund(account, this.money(amount));
  }

  wallet(account: AccountId): Money {
    return this.funds.balanceOf(account);
  }

  // ─── Health ──────────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.store.verifyIntegrity();
  }
}
