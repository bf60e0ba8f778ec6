/**
 * @circulate/event-store — Event Catalog.
 *
 * Registry of the domain event types the engine writes:
 * - Typed event definitions (type string → payload shape)
 * - Runtime payload validation before append
 * - Discovery (listing all known event types, by source)
 */

import type { EventSource } from "@circulate/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "lending.loan.opened") */
  readonly type: string;

  /** Schema version (positive integer) */
  readonly version: number;

  /** Human-readable description of this event */
  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventSource;

  /** Returns true if the payload has the shape this version requires. */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Centralized registry of domain event types.
 *
 * ```ts
 * const catalog = new EventCatalog();
 * catalog.register({
 *   type: "lending.loan.opened",
 *   version: 1,
 *   description: "A member borrowed a unit",
 *   source: "lending",
 *   validate: (p) => typeof p === "object" && p !== null && "borrower" in p,
 * });
 * catalog.assertValid("lending.loan.opened", payload);
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema. Re-registering the same type replaces the
   * schema only when the version is higher.
   */
  register(schema: EventSchema): void {
    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version >= schema.version) {
      return;
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate a payload against its registered schema.
   * Unregistered types are invalid.
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  /**
   * @throws EventCatalogError if the type is unknown or the payload is malformed
   */
  assertValid(eventType: string, payload: unknown): void {
    if (!this._schemas.has(eventType)) {
      throw new EventCatalogError(`Unknown event type "${eventType}"`);
    }
    if (!this.validate(eventType, payload)) {
      throw new EventCatalogError(`Payload does not match schema for "${eventType}"`);
    }
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class EventCatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EventCatalogError";
  }
}
