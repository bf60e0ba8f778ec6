/**
 * Tests for the event store hash chain.
 */

import { describe, it, expect } from "vitest";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { StoredEvent, UnhashedStoredEvent } from "../src/types.js";
import { fixedClock, makeEvent, makeEvents } from "./helpers.js";

const base: UnhashedStoredEvent = {
  event: {
    type: "lending.loan.opened",
    metadata: {
      eventId: "e1",
      timestamp: "2024-05-01T00:00:00.000Z",
      actor: "member-1",
      correlationId: "c1",
      source: "lending",
    },
    payload: { borrower: "member-1", itemId: 1 },
  },
  streamId: "loan:member-1:1",
  version: 1,
  globalPosition: 1,
  appendedAt: "2024-05-01T00:00:00.000Z",
};

describe("computeEventHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeEventHash(base, GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic", () => {
    expect(computeEventHash(base, GENESIS_HASH)).toBe(computeEventHash(base, GENESIS_HASH));
  });

  it("does not depend on payload key order", () => {
    const reordered: UnhashedStoredEvent = {
      ...base,
      event: { ...base.event, payload: { itemId: 1, borrower: "member-1" } },
    };
    expect(computeEventHash(reordered, GENESIS_HASH)).toBe(computeEventHash(base, GENESIS_HASH));
  });

  it("changes with the payload or the previous hash", () => {
    const changed: UnhashedStoredEvent = {
      ...base,
      event: { ...base.event, payload: { borrower: "member-2", itemId: 1 } },
    };
    expect(computeEventHash(changed, GENESIS_HASH)).not.toBe(computeEventHash(base, GENESIS_HASH));
    expect(computeEventHash(base, "abc")).not.toBe(computeEventHash(base, GENESIS_HASH));
  });
});

describe("verifyHashChain", () => {
  it("accepts an empty log", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("links the first event to genesis and each next event to its predecessor", () => {
    const store = new InMemoryEventStore({ now: fixedClock });
    store.append("a", makeEvents(2));
    store.append("b", makeEvents(1));
    const [first, second, third] = store.readAll();

    expect(first?.previousHash).toBe(GENESIS_HASH);
    expect(second?.previousHash).toBe(first?.hash);
    expect(third?.previousHash).toBe(second?.hash);
    expect(store.verifyIntegrity()).toEqual({ valid: true, lastVerifiedPosition: 3, errors: [] });
  });

  it("detects a tampered payload", () => {
    const store = new InMemoryEventStore({ now: fixedClock });
    store.append("a", [makeEvent("x", { amount: "10" }), makeEvent("y")]);
    const events = [...store.readAll()];
    const first = events[0];
    if (first === undefined) throw new Error("missing event");

    const tampered: StoredEvent = {
      ...first,
      event: { ...first.event, payload: { amount: "99" } },
    };
    const result = verifyHashChain([tampered, ...events.slice(1)]);

    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(0);
    expect(result.errors[0]?.position).toBe(1);
  });

  it("detects a removed event", () => {
    const store = new InMemoryEventStore({ now: fixedClock });
    store.append("a", makeEvents(3));
    const events = store.readAll();
    const withGap = [events[0], events[2]].filter(
      (e): e is StoredEvent => e !== undefined,
    );

    const result = verifyHashChain(withGap);
    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors[0]?.reason).toMatch(/previousHash mismatch at position 3/);
  });
});
