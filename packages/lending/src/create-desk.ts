/**
 * Wire a complete lending desk from configuration.
 */

import type { AccountId } from "@circulate/types";
import { CatalogRegistry, InventoryLedger, MembershipRegistry } from "@circulate/catalog";
import type { FundsSink } from "@circulate/escrow";
import { EscrowVault, InMemoryFundsSink } from "@circulate/escrow";
import type { EventStore } from "@circulate/event-store";
import { InMemoryEventStore } from "@circulate/event-store";
import type { Clock } from "./clock.js";
import { SystemClock } from "./clock.js";
import { LendingDesk } from "./lending-desk.js";
import { PolicyStore } from "./policy-store.js";
import type { PostCommitErrorHandler } from "./post-commit.js";
import type { LendingPolicy } from "./types.js";

export interface LendingDeskConfig {
  readonly steward: AccountId;
  readonly policy: LendingPolicy;
  readonly custodian?: AccountId | undefined;
  readonly curators?: readonly AccountId[] | undefined;
  readonly clock?: Clock | undefined;
  readonly store?: EventStore | undefined;
  /** Default: an InMemoryFundsSink in the deposit currency */
  readonly sink?: FundsSink | undefined;
  readonly newId?: (() => string) | undefined;
  readonly onPostCommitError?: PostCommitErrorHandler | undefined;
}

export interface LendingEngine {
  readonly desk: LendingDesk;
  readonly policy: PolicyStore;
  readonly catalog: CatalogRegistry;
  readonly inventory: InventoryLedger;
  readonly membership: MembershipRegistry;
  readonly vault: EscrowVault;
  readonly sink: FundsSink;
  readonly store: EventStore;
}

export function createLendingDesk(config: LendingDeskConfig): LendingEngine {
  const policy = new PolicyStore({
    steward: config.steward,
    policy: config.policy,
    custodian: config.custodian,
    curators: config.curators,
  });
  const catalog = new CatalogRegistry();
  const inventory = new InventoryLedger(catalog);
  const membership = new MembershipRegistry();
  const vault = new EscrowVault(policy.currency, policy.decimals);
  const sink = config.sink ?? new InMemoryFundsSink(policy.currency, policy.decimals);
  const store = config.store ?? new InMemoryEventStore();

  const desk = new LendingDesk({
    policy,
    catalog,
    inventory,
    membership,
    vault,
    sink,
    store,
    clock: config.clock ?? new SystemClock(),
    newId: config.newId,
    onPostCommitError: config.onPostCommitError,
  });

  return { desk, policy, catalog, inventory, membership, vault, sink, store };
}
