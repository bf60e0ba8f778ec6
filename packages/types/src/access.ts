/**
 * Access Policy
 *
 * Privileged operations receive an explicit AccessPolicy value describing
 * who is acting and who currently holds the steward and curator roles.
 * Nothing reads caller identity from ambient state.
 */

import type { AccountId } from "./lending.js";

export interface AccessPolicy {
  /** The account performing the operation */
  readonly actor: AccountId;

  /** Current steward, or null once stewardship has been renounced */
  readonly steward: AccountId | null;

  /** Accounts holding the curator role */
  readonly curators: ReadonlySet<AccountId>;
}

/**
 * True when the actor is the current steward.
 */
export function isStewardAccess(access: AccessPolicy): boolean {
  return access.steward !== null && access.actor === access.steward;
}

/**
 * True when the actor may edit catalog metadata (steward or curator).
 */
export function isCuratorAccess(access: AccessPolicy): boolean {
  return isStewardAccess(access) || access.curators.has(access.actor);
}
