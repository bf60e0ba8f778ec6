/**
 * @circulate/catalog — Types for catalog items, inventory and membership.
 *
 * Rules:
 * - All types are readonly
 * - Items are never deleted; pausing substitutes for removal
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { AccountId, ItemId, Timestamp } from "@circulate/types";

// ─── Catalog Items ───────────────────────────────────────────────────────

/**
 * Descriptive metadata of a catalog item.
 * Pointers (content, manifest, provenance) are opaque URIs.
 */
export interface ItemMetadata {
  readonly title: string;
  readonly author: string;
  readonly contentPointer: string;
  readonly license: string;
  readonly manifestPointer?: string | undefined;
  readonly provenancePointer?: string | undefined;
  readonly contributors: readonly string[];
}

/** Fields a curator may change; omitted fields are left alone. */
export interface MetadataPatch {
  readonly title?: string | undefined;
  readonly author?: string | undefined;
  readonly contentPointer?: string | undefined;
  readonly license?: string | undefined;
  readonly manifestPointer?: string | undefined;
  readonly provenancePointer?: string | undefined;
  readonly contributors?: readonly string[] | undefined;
}

export interface CatalogItem {
  readonly id: ItemId;
  readonly metadata: ItemMetadata;
  readonly paused: boolean;
  readonly createdBy: AccountId;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

// ─── Inventory ───────────────────────────────────────────────────────────

/** Unit balance of one holder for one item. */
export interface UnitHolding {
  readonly holder: AccountId;
  readonly itemId: ItemId;
  readonly units: number;
}

/**
 * Unit custody as seen by the loan ledger.
 */
export interface UnitCustody {
  balanceOf(holder: AccountId, itemId: ItemId): number;
  transfer(from: AccountId, to: AccountId, itemId: ItemId, quantity: number): void;
}

// ─── Membership ──────────────────────────────────────────────────────────

/**
 * Answers whether an account currently holds borrowing rights.
 */
export interface MembershipOracle {
  isMember(account: AccountId): boolean;
  tierOf?(account: AccountId): string | undefined;
}

export interface Membership {
  readonly account: AccountId;
  readonly tier: string | null;
  readonly grantedAt: Timestamp;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type CatalogErrorCode =
  | "NOT_STEWARD"
  | "NOT_CURATOR"
  | "NO_SUCH_ITEM"
  | "INVALID_METADATA"
  | "INVALID_QUANTITY"
  | "INVALID_ACCOUNT"
  | "INSUFFICIENT_UNITS";

/**
 * Structured error from the catalog, inventory and membership registries.
 */
export class CatalogError extends Error {
  public readonly code: CatalogErrorCode;

  constructor(code: CatalogErrorCode, message: string) {
    super(message);
    this.name = "CatalogError";
    this.code = code;
  }
}
