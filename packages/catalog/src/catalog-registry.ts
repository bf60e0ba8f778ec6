/**
 * @circulate/catalog — Catalog registry.
 *
 * Holds item metadata and the pause flag. Item ids are assigned
 * monotonically from 1. Items are never removed.
 *
 * Authorization:
 * - createItem: steward only
 * - updateMetadata, setPaused: steward or curator
 */

import type { AccessPolicy, ItemId, Timestamp } from "@circulate/types";
import { isCuratorAccess, isStewardAccess } from "@circulate/types";
import type { CatalogItem, ItemMetadata, MetadataPatch } from "./types.js";
import { CatalogError } from "./types.js";

export class CatalogRegistry {
  private readonly _items: Map<ItemId, CatalogItem> = new Map();
  private _nextId: ItemId = 1;

  /**
   * Create an item and assign it the next id.
   */
  createItem(
    access: AccessPolicy,
    metadata: ItemMetadata,
    now: Timestamp,
  ): CatalogItem {
    assertSteward(access, "create catalog items");
    validateMetadata(metadata);

    const item: CatalogItem = {
      id: this._nextId,
      metadata: copyMetadata(metadata),
      paused: false,
      createdBy: access.actor,
      createdAt: now,
      updatedAt: now,
    };
    this._items.set(item.id, item);
    this._nextId += 1;
    return item;
  }

  /**
   * Apply a metadata patch. Returns the updated item and the names of the
   * fields the patch touched.
   */
  updateMetadata(
    access: AccessPolicy,
    itemId: ItemId,
    patch: MetadataPatch,
    now: Timestamp,
  ): { readonly item: CatalogItem; readonly fields: readonly string[] } {
    assertCurator(access, "edit catalog metadata");
    const current = this.requireItem(itemId);

    const fields = Object.entries(patch)
      .filter(([, value]) => value !== undefined)
      .map(([key]) => key)
      .sort();
    const merged = applyPatch(current.metadata, patch);
    validateMetadata(merged);

    const item: CatalogItem = { ...current, metadata: merged, updatedAt: now };
    this._items.set(itemId, item);
    return { item, fields };
  }

  /**
   * Pause or resume lending of an item.
   */
  setPaused(
    access: AccessPolicy,
    itemId: ItemId,
    paused: boolean,
    now: Timestamp,
  ): CatalogItem {
    assertCurator(access, "pause catalog items");
    const item: CatalogItem = { ...this.requireItem(itemId), paused, updatedAt: now };
    this._items.set(itemId, item);
    return item;
  }

  getItem(itemId: ItemId): CatalogItem | undefined {
    return this._items.get(itemId);
  }

  hasItem(itemId: ItemId): boolean {
    return this._items.has(itemId);
  }

  /**
   * @throws CatalogError NO_SUCH_ITEM
   */
  requireItem(itemId: ItemId): CatalogItem {
    const item = this._items.get(itemId);
    if (item === undefined) {
      throw new CatalogError("NO_SUCH_ITEM", `Unknown catalog item: ${itemId}`);
    }
    return item;
  }

  listItems(): readonly CatalogItem[] {
    return [...this._items.values()];
  }

  get count(): number {
    return this._items.size;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

export function assertSteward(access: AccessPolicy, action: string): void {
  if (!isStewardAccess(access)) {
    throw new CatalogError("NOT_STEWARD", `Only the steward may ${action}; "${access.actor}" is not`);
  }
}

function assertCurator(access: AccessPolicy, action: string): void {
  if (!isCuratorAccess(access)) {
    throw new CatalogError("NOT_CURATOR", `Only the steward or a curator may ${action}; "${access.actor}" is neither`);
  }
}

function validateMetadata(metadata: ItemMetadata): void {
  if (metadata.title.trim() === "") {
    throw new CatalogError("INVALID_METADATA", "Item title must not be empty");
  }
  if (metadata.contentPointer.trim() === "") {
    throw new CatalogError("INVALID_METADATA", "Item content pointer must not be empty");
  }
  if (metadata.contributors.some((c: string) => c.trim() === "")) {
    throw new CatalogError("INVALID_METADATA", "Contributor names must not be empty");
  }
}

function copyMetadata(metadata: ItemMetadata): ItemMetadata {
  return { ...metadata, contributors: [...metadata.contributors] };
}

function applyPatch(base: ItemMetadata, patch: MetadataPatch): ItemMetadata {
  return {
    title: patch.title ?? base.title,
    author: patch.author ?? base.author,
    contentPointer: patch.contentPointer ?? base.contentPointer,
    license: patch.license ?? base.license,
    manifestPointer: patch.manifestPointer ?? base.manifestPointer,
    provenancePointer: patch.provenancePointer ?? base.provenancePointer,
    contributors: [...(patch.contributors ?? base.contributors)],
  };
}
