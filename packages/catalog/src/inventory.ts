/**
 * @circulate/catalog — Inventory ledger.
 *
 * Fungible unit balances keyed by (holder, itemId). Units come into
 * existence only through a steward mint and otherwise only move.
 *
 * Rules:
 * - Balances are non-negative integers
 * - A transfer that would overdraw the sender fails and changes nothing
 * - Total units per item are conserved by transfer
 */

import type { AccessPolicy, AccountId, ItemId } from "@circulate/types";
import { isAccountId } from "@circulate/types";
import type { CatalogRegistry } from "./catalog-registry.js";
import { assertSteward } from "./catalog-registry.js";
import type { UnitCustody, UnitHolding } from "./types.js";
import { CatalogError } from "./types.js";

export class InventoryLedger implements UnitCustody {
  private readonly _catalog: CatalogRegistry;
  /** itemId → holder → units */
  private readonly _balances: Map<ItemId, Map<AccountId, number>> = new Map();

  constructor(catalog: CatalogRegistry) {
    this._catalog = catalog;
  }

  /**
   * Create `quantity` new units of an item and credit them to `to`.
   * Returns the holder's new balance.
   */
  mint(access: AccessPolicy, itemId: ItemId, to: AccountId, quantity: number): number {
    assertSteward(access, "mint units");
    this._catalog.requireItem(itemId);
    assertAccount(to);
    assertQuantity(quantity);

    const balance = this.balanceOf(to, itemId) + quantity;
    this.holdersOf(itemId).set(to, balance);
    return balance;
  }

  balanceOf(holder: AccountId, itemId: ItemId): number {
    return this._balances.get(itemId)?.get(holder) ?? 0;
  }

  /**
   * Move units between holders.
   *
   * @throws CatalogError INSUFFICIENT_UNITS when `from` holds fewer than `quantity`
   */
  transfer(from: AccountId, to: AccountId, itemId: ItemId, quantity: number): void {
    assertAccount(from);
    assertAccount(to);
    assertQuantity(quantity);

    const available = this.balanceOf(from, itemId);
    if (available < quantity) {
      throw new CatalogError(
        "INSUFFICIENT_UNITS",
        `"${from}" holds ${available} unit(s) of item ${itemId}, cannot move ${quantity}`,
      );
    }
    if (from === to) return;

    const holders = this.holdersOf(itemId);
    const remaining = available - quantity;
    if (remaining === 0) {
      holders.delete(from);
    } else {
      holders.set(from, remaining);
    }
    holders.set(to, this.balanceOf(to, itemId) + quantity);
  }

  totalUnits(itemId: ItemId): number {
    let total = 0;
    for (const units of this._balances.get(itemId)?.values() ?? []) {
      total += units;
    }
    return total;
  }

  holdings(itemId: ItemId): readonly UnitHolding[] {
    const holders = this._balances.get(itemId);
    if (holders === undefined) return [];
    return [...holders.entries()]
      .map(([holder, units]) => ({ holder, itemId, units }))
      .sort((a, b) => a.holder.localeCompare(b.holder));
  }

  private holdersOf(itemId: ItemId): Map<AccountId, number> {
    let holders = this._balances.get(itemId);
    if (holders === undefined) {
      holders = new Map();
      this._balances.set(itemId, holders);
    }
    return holders;
  }
}

function assertAccount(account: AccountId): void {
  if (!isAccountId(account)) {
    throw new CatalogError("INVALID_ACCOUNT", "Account id must be a non-empty string");
  }
}

function assertQuantity(quantity: number): void {
  if (!Number.isSafeInteger(quantity) || quantity <= 0) {
    throw new CatalogError("INVALID_QUANTITY", `Quantity must be a positive integer, got ${quantity}`);
  }
}
