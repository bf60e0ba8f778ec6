/**
 * @circulate/types — Shared domain types for the Circulate stack.
 *
 * Used across all Circulate packages:
 * - Financial primitives (Money)
 * - Lending identifiers (accounts, items, loan keys, timestamps)
 * - Access policy for privileged operations
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type { Money, Currency } from "./financial.js";

// Lending identifiers
export type {
  AccountId,
  ItemId,
  Timestamp,
  Seconds,
  LoanKey,
  LoanKeyParts,
} from "./lending.js";
export { loanKey } from "./lending.js";

// Access policy
export type { AccessPolicy } from "./access.js";
export { isStewardAccess, isCuratorAccess } from "./access.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export { isAccountId } from "./guards.js";
