import type { AccountId, Money } from "@circulate/types";
import type { ItemMetadata } from "@circulate/catalog";
import type { FundsSink } from "@circulate/escrow";
import { InMemoryFundsSink } from "@circulate/escrow";
import { InMemoryEventStore } from "@circulate/event-store";
import { ManualClock } from "../src/clock.js";
import { createLendingDesk } from "../src/create-desk.js";
import type { LendingEngine } from "../src/create-desk.js";
import { domainErrorCode } from "../src/errors.js";
import type { PostCommitErrorHandler } from "../src/post-commit.js";
import type { LendingPolicy } from "../src/types.js";

export const STEWARD = "steward";
export const BRANCH = "branch";
export const ALICE = "alice";
export const BOB = "bob";
export const T0 = 1_000_000;

export const eur = (amount: string): Money => ({ amount, currency: "EUR", decimals: 2 });

export const POLICY: LendingPolicy = {
  loanDuration: 1_000,
  depositAmount: eur("5.00"),
  gracePeriod: 100,
  extensionDuration: 500,
  maxExtensions: 2,
};

export const BOOK: ItemMetadata = {
  title: "Tide Tables",
  author: "Test Author",
  contentPointer: "ipfs://tide-tables",
  license: "CC0",
  contributors: [],
};

/**
 * Funds sink whose calls can be made to fail or to run a hook first.
 */
export class ScriptedSink implements FundsSink {
  readonly inner = new InMemoryFundsSink("EUR", 2);
  failReceived = false;
  failPayOut = false;
  beforeReceived: (() => void) | undefined;

  received(from: AccountId, amount: Money): void {
    this.beforeReceived?.();
    if (this.failReceived) throw new Error("deposit rail offline");
    this.inner.received(from, amount);
  }

  payOut(to: AccountId, amount: Money): void {
    if (this.failPayOut) throw new Error("payout rail offline");
    this.inner.payOut(to, amount);
  }
}

export interface Fixture extends LendingEngine {
  readonly clock: ManualClock;
  readonly funds: ScriptedSink;
  readonly events: InMemoryEventStore;
}

/**
 * A desk with one item (id 1) holding two units at the branch, and
 * alice as a member holding 50.00 EUR.
 */
export function setup(
  overrides: Partial<LendingPolicy> = {},
  custodian: string | undefined = BRANCH,
  onPostCommitError?: PostCommitErrorHandler,
): Fixture {
  const clock = new ManualClock(T0);
  const funds = new ScriptedSink();
  const events = new InMemoryEventStore();
  let seq = 0;
  const engine = createLendingDesk({
    steward: STEWARD,
    custodian,
    policy: { ...POLICY, ...overrides },
    clock,
    sink: funds,
    store: events,
    newId: () => `id-${++seq}`,
    onPostCommitError,
  });
  engine.desk.createItem(STEWARD, BOOK);
  engine.desk.mint(STEWARD, 1, 2, BRANCH);
  engine.desk.grantMembership(STEWARD, ALICE);
  funds.inner.fund(ALICE, eur("50.00"));
  return { ...engine, clock, funds, events };
}

export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return domainErrorCode(err) ?? (err instanceof Error ? err.message : String(err));
  }
  return undefined;
}
