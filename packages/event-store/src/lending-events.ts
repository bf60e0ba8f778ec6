/**
 * @circulate/event-store — Circulate Domain Event Definitions.
 *
 * Naming convention: `<source>.<entity>.<action>`
 * Examples:
 * - lending.loan.opened
 * - escrow.deposit.forfeited
 * - policy.setting.changed
 */

import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Catalog Events
// =============================================================================

export interface ItemCreatedPayload {
  readonly itemId: number;
  readonly title: string;
  readonly createdBy: string;
}

export interface ItemUpdatedPayload {
  readonly itemId: number;
  readonly fields: readonly string[];
  readonly updatedBy: string;
}

export interface ItemPausedPayload {
  readonly itemId: number;
  readonly paused: boolean;
  readonly changedBy: string;
}

export interface UnitsMintedPayload {
  readonly itemId: number;
  readonly to: string;
  readonly quantity: number;
  readonly balance: number;
}

// =============================================================================
// Lending Events
// =============================================================================

export interface LoanOpenedPayload {
  readonly borrower: string;
  readonly itemId: number;
  readonly custodian: string;
  readonly openedAt: number;
  readonly dueDate: number;
  readonly deposit: string;
  readonly currency: string;
}

export interface LoanExtendedPayload {
  readonly borrower: string;
  readonly itemId: number;
  readonly previousDueDate: number;
  readonly dueDate: number;
  readonly extensionsUsed: number;
}

export interface LoanReturnedPayload {
  readonly borrower: string;
  readonly itemId: number;
  readonly returnedAt: number;
  readonly dueDate: number;
  readonly late: boolean;
}

// =============================================================================
// Escrow Events
// =============================================================================

export interface DepositReleasedPayload {
  readonly borrower: string;
  readonly itemId: number;
  readonly amount: string;
  readonly currency: string;
}

export interface DepositForfeitedPayload {
  readonly borrower: string;
  readonly itemId: number;
  readonly amount: string;
  readonly currency: string;
  readonly poolBalance: string;
}

export interface PoolWithdrawnPayload {
  readonly to: string;
  readonly amount: string;
  readonly currency: string;
  readonly poolBalance: string;
  readonly withdrawnBy: string;
}

// =============================================================================
// Policy Events
// =============================================================================

export interface PolicySettingChangedPayload {
  readonly setting: string;
  readonly oldValue: string | number;
  readonly newValue: string | number;
  readonly changedBy: string;
}

export interface CustodianChangedPayload {
  readonly oldCustodian: string | null;
  readonly newCustodian: string;
  readonly changedBy: string;
}

export interface CuratorChangedPayload {
  readonly account: string;
  readonly granted: boolean;
  readonly changedBy: string;
}

export interface StewardTransferredPayload {
  readonly oldSteward: string;
  readonly newSteward: string;
}

export interface StewardRenouncedPayload {
  readonly oldSteward: string;
}

// =============================================================================
// Membership Events
// =============================================================================

export interface MembershipGrantedPayload {
  readonly account: string;
  readonly tier: string | null;
  readonly grantedBy: string;
}

export interface MembershipRevokedPayload {
  readonly account: string;
  readonly revokedBy: string;
}

// =============================================================================
// Event Type Constants
// =============================================================================

export const CIRCULATE_EVENTS = {
  ITEM_CREATED: "catalog.item.created",
  ITEM_UPDATED: "catalog.item.updated",
  ITEM_PAUSED: "catalog.item.paused",
  UNITS_MINTED: "catalog.units.minted",

  LOAN_OPENED: "lending.loan.opened",
  LOAN_EXTENDED: "lending.loan.extended",
  LOAN_RETURNED: "lending.loan.returned",

  DEPOSIT_RELEASED: "escrow.deposit.released",
  DEPOSIT_FORFEITED: "escrow.deposit.forfeited",
  POOL_WITHDRAWN: "escrow.pool.withdrawn",

  POLICY_SETTING_CHANGED: "policy.setting.changed",
  CUSTODIAN_CHANGED: "policy.custodian.changed",
  CURATOR_CHANGED: "policy.curator.changed",
  STEWARD_TRANSFERRED: "policy.steward.transferred",
  STEWARD_RENOUNCED: "policy.steward.renounced",

  MEMBERSHIP_GRANTED: "membership.granted",
  MEMBERSHIP_REVOKED: "membership.revoked",
} as const;

export type CirculateEventType =
  (typeof CIRCULATE_EVENTS)[keyof typeof CIRCULATE_EVENTS];

// =============================================================================
// Schema Definitions
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function hasString(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "string";
}

function hasNumber(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "number";
}

function hasBoolean(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "boolean";
}

function isLoanPayload(p: unknown): p is Record<string, unknown> {
  return isObject(p) && hasString(p, "borrower") && hasNumber(p, "itemId");
}

const CATALOG_SCHEMAS: readonly EventSchema[] = [
  {
    type: CIRCULATE_EVENTS.ITEM_CREATED,
    version: 1,
    description: "A catalog item was created",
    source: "catalog",
    validate: (p): p is ItemCreatedPayload =>
      isObject(p) && hasNumber(p, "itemId") && hasString(p, "title"),
  },
  {
    type: CIRCULATE_EVENTS.ITEM_UPDATED,
    version: 1,
    description: "Catalog item metadata was edited",
    source: "catalog",
    validate: (p): p is ItemUpdatedPayload =>
      isObject(p) && hasNumber(p, "itemId") && Array.isArray(p.fields),
  },
  {
    type: CIRCULATE_EVENTS.ITEM_PAUSED,
    version: 1,
    description: "A catalog item was paused or resumed",
    source: "catalog",
    validate: (p): p is ItemPausedPayload =>
      isObject(p) && hasNumber(p, "itemId") && hasBoolean(p, "paused"),
  },
  {
    type: CIRCULATE_EVENTS.UNITS_MINTED,
    version: 1,
    description: "Loanable units of an item were minted",
    source: "catalog",
    validate: (p): p is UnitsMintedPayload =>
      isObject(p) && hasNumber(p, "itemId") && hasNumber(p, "quantity"),
  },
];

const LENDING_SCHEMAS: readonly EventSchema[] = [
  {
    type: CIRCULATE_EVENTS.LOAN_OPENED,
    version: 1,
    description: "A member borrowed one unit against a deposit",
    source: "lending",
    validate: (p): p is LoanOpenedPayload =>
      isLoanPayload(p) && hasNumber(p, "dueDate") && hasString(p, "deposit"),
  },
  {
    type: CIRCULATE_EVENTS.LOAN_EXTENDED,
    version: 1,
    description: "A loan's due date was postponed",
    source: "lending",
    validate: (p): p is LoanExtendedPayload =>
      isLoanPayload(p) && hasNumber(p, "dueDate") && hasNumber(p, "extensionsUsed"),
  },
  {
    type: CIRCULATE_EVENTS.LOAN_RETURNED,
    version: 1,
    description: "A borrowed unit came back to the custodian",
    source: "lending",
    validate: (p): p is LoanReturnedPayload =>
      isLoanPayload(p) && hasNumber(p, "returnedAt") && hasBoolean(p, "late"),
  },
];

const ESCROW_SCHEMAS: readonly EventSchema[] = [
  {
    type: CIRCULATE_EVENTS.DEPOSIT_RELEASED,
    version: 1,
    description: "An escrowed deposit was refunded to the borrower",
    source: "escrow",
    validate: (p): p is DepositReleasedPayload =>
      isLoanPayload(p) && hasString(p, "amount"),
  },
  {
    type: CIRCULATE_EVENTS.DEPOSIT_FORFEITED,
    version: 1,
    description: "An escrowed deposit moved into the forfeiture pool",
    source: "escrow",
    validate: (p): p is DepositForfeitedPayload =>
      isLoanPayload(p) && hasString(p, "amount") && hasString(p, "poolBalance"),
  },
  {
    type: CIRCULATE_EVENTS.POOL_WITHDRAWN,
    version: 1,
    description: "The steward withdrew from the forfeiture pool",
    source: "escrow",
    validate: (p): p is PoolWithdrawnPayload =>
      isObject(p) && hasString(p, "to") && hasString(p, "amount"),
  },
];

const POLICY_SCHEMAS: readonly EventSchema[] = [
  {
    type: CIRCULATE_EVENTS.POLICY_SETTING_CHANGED,
    version: 1,
    description: "A lending policy setting changed",
    source: "policy",
    validate: (p): p is PolicySettingChangedPayload =>
      isObject(p) && hasString(p, "setting") && "oldValue" in p && "newValue" in p,
  },
  {
    type: CIRCULATE_EVENTS.CUSTODIAN_CHANGED,
    version: 1,
    description: "The custodian (branch) account changed",
    source: "policy",
    validate: (p): p is CustodianChangedPayload =>
      isObject(p) && hasString(p, "newCustodian"),
  },
  {
    type: CIRCULATE_EVENTS.CURATOR_CHANGED,
    version: 1,
    description: "A curator role was granted or revoked",
    source: "policy",
    validate: (p): p is CuratorChangedPayload =>
      isObject(p) && hasString(p, "account") && hasBoolean(p, "granted"),
  },
  {
    type: CIRCULATE_EVENTS.STEWARD_TRANSFERRED,
    version: 1,
    description: "Stewardship moved to another account",
    source: "policy",
    validate: (p): p is StewardTransferredPayload =>
      isObject(p) && hasString(p, "oldSteward") && hasString(p, "newSteward"),
  },
  {
    type: CIRCULATE_EVENTS.STEWARD_RENOUNCED,
    version: 1,
    description: "Stewardship was renounced",
    source: "policy",
    validate: (p): p is StewardRenouncedPayload =>
      isObject(p) && hasString(p, "oldSteward"),
  },
];

const MEMBERSHIP_SCHEMAS: readonly EventSchema[] = [
  {
    type: CIRCULATE_EVENTS.MEMBERSHIP_GRANTED,
    version: 1,
    description: "An account was granted borrowing rights",
    source: "membership",
    validate: (p): p is MembershipGrantedPayload =>
      isObject(p) && hasString(p, "account") && hasString(p, "grantedBy"),
  },
  {
    type: CIRCULATE_EVENTS.MEMBERSHIP_REVOKED,
    version: 1,
    description: "An account lost its borrowing rights",
    source: "membership",
    validate: (p): p is MembershipRevokedPayload =>
      isObject(p) && hasString(p, "account") && hasString(p, "revokedBy"),
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an EventCatalog holding every Circulate event type at version 1.
 */
export function createCirculateCatalog(): EventCatalog {
  const catalog = new EventCatalog();

  for (const schema of [
    ...CATALOG_SCHEMAS,
    ...LENDING_SCHEMAS,
    ...ESCROW_SCHEMAS,
    ...POLICY_SCHEMAS,
    ...MEMBERSHIP_SCHEMAS,
  ]) {
    catalog.register(schema);
  }

  return catalog;
}
