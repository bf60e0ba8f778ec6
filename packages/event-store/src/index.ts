/**
 * @circulate/event-store — Append-only audit event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain over every event
 * - EventCatalog for payload validation
 * - Circulate domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, EventCatalogError } from "./catalog.js";

// Circulate domain events
export { CIRCULATE_EVENTS, createCirculateCatalog } from "./lending-events.js";
export type { CirculateEventType } from "./lending-events.js";
export type {
  ItemCreatedPayload,
  ItemUpdatedPayload,
  ItemPausedPayload,
  UnitsMintedPayload,
  LoanOpenedPayload,
  LoanExtendedPayload,
  LoanReturnedPayload,
  DepositReleasedPayload,
  DepositForfeitedPayload,
  PoolWithdrawnPayload,
  PolicySettingChangedPayload,
  CustodianChangedPayload,
  CuratorChangedPayload,
  StewardTransferredPayload,
  StewardRenouncedPayload,
  MembershipGrantedPayload,
  MembershipRevokedPayload,
} from "./lending-events.js";
