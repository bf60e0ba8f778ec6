/**
 * @circulate/catalog
 *
 * Catalog items, loanable unit inventory and membership.
 */

export type {
  ItemMetadata,
  MetadataPatch,
  CatalogItem,
  UnitHolding,
  UnitCustody,
  MembershipOracle,
  Membership,
  CatalogErrorCode,
} from "./types.js";
export { CatalogError } from "./types.js";

export { CatalogRegistry } from "./catalog-registry.js";
export { InventoryLedger } from "./inventory.js";
export { MembershipRegistry } from "./membership.js";
