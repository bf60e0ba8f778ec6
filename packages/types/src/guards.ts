/**
 * Runtime type guards for values that cross package boundaries untyped.
 */

import type { AccountId } from "./lending.js";

/** A non-blank account id. Catalog, escrow and policy reject anything else. */
export function isAccountId(value: unknown): value is AccountId {
  return typeof value === "string" && value.trim().length > 0;
}
