/**
 * @circulate/catalog — Membership registry.
 *
 * The steward grants and revokes borrowing rights. Revocation does not
 * touch loans already open; it only blocks new borrows.
 */

import type { AccessPolicy, AccountId, Timestamp } from "@circulate/types";
import { isAccountId } from "@circulate/types";
import { assertSteward } from "./catalog-registry.js";
import type { Membership, MembershipOracle } from "./types.js";
import { CatalogError } from "./types.js";

export class MembershipRegistry implements MembershipOracle {
  private readonly _members: Map<AccountId, Membership> = new Map();

  /**
   * Grant (or re-grant with a new tier) borrowing rights.
   */
  grant(
    access: AccessPolicy,
    account: AccountId,
    tier: string | null,
    now: Timestamp,
  ): Membership {
    assertSteward(access, "grant membership");
    if (!isAccountId(account)) {
      throw new CatalogError("INVALID_ACCOUNT", "Account id must be a non-empty string");
    }
    const membership: Membership = { account, tier, grantedAt: now };
    this._members.set(account, membership);
    return membership;
  }

  /**
   * Revoke borrowing rights. Returns false when the account was not a member.
   */
  revoke(access: AccessPolicy, account: AccountId): boolean {
    assertSteward(access, "revoke membership");
    return this._members.delete(account);
  }

  isMember(account: AccountId): boolean {
    return this._members.has(account);
  }

  tierOf(account: AccountId): string | undefined {
    return this._members.get(account)?.tier ?? undefined;
  }

  getMembership(account: AccountId): Membership | undefined {
    return this._members.get(account);
  }

  listMembers(): readonly Membership[] {
    return [...this._members.values()];
  }

  get count(): number {
    return this._members.size;
  }
}
