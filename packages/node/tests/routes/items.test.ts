/**
 * Tests for catalog routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { TestApp } from "../setup.js";
import { ALICE, createTestApp, jsonRequest, seed, STEWARD, T0 } from "../setup.js";

const CAROL = "carol";

describe("item routes", () => {
  let t: TestApp;

  beforeEach(async () => {
    t = createTestApp();
    await seed(t.app);
  });

  const errorCode = async (res: Response) =>
    ((await res.json()) as { error: { code: string } }).error.code;

  it("returns an item with its availability", async () => {
    const res = await t.app.request(jsonRequest("/api/v1/items/1", "GET", undefined, ALICE));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        id: 1,
        metadata: {
          title: "Field Notes on Moss",
          author: "",
          contentPointer: "ipfs://moss",
          license: "",
          contributors: [],
        },
        paused: false,
        createdBy: STEWARD,
        createdAt: T0,
        updatedAt: T0,
        availableUnits: 2,
      },
    });
  });

  it("assigns consecutive ids", async () => {
    const res = await t.app.request(
      jsonRequest("/api/v1/items", "POST", { title: "Second", contentPointer: "ipfs://two" }, STEWARD),
    );

    expect(res.status).toBe(201);
    expect(((await res.json()) as { data: { id: number } }).data.id).toBe(2);
  });

  it("lets only the steward create items", async () => {
    const res = await t.app.request(
      jsonRequest("/api/v1/items", "POST", { title: "Mine", contentPointer: "ipfs://mine" }, ALICE),
    );

    expect(res.status).toBe(403);
    expect(await errorCode(res)).toBe("NOT_STEWARD");
  });

  it("validates the create body", async () => {
    const res = await t.app.request(jsonRequest("/api/v1/items", "POST", { title: "No pointer" }, STEWARD));

    expect(res.status).toBe(400);
    expect(await errorCode(res)).toBe("VALIDATION_ERROR");
  });

  it("returns 404 for an unknown item and 400 for a malformed id", async () => {
    const missing = await t.app.request(jsonRequest("/api/v1/items/7", "GET", undefined, ALICE));
    expect(missing.status).toBe(404);

    const malformed = await t.app.request(jsonRequest("/api/v1/items/zero", "GET", undefined, ALICE));
    expect(malformed.status).toBe(400);
  });

  it("lets a curator edit metadata", async () => {
    await t.app.request(jsonRequest("/api/v1/curators", "POST", { account: CAROL }, STEWARD));

    const res = await t.app.request(
      jsonRequest("/api/v1/items/1", "PATCH", { license: "CC-BY-4.0" }, CAROL),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { metadata: { license: string; title: string } } };
    expect(body.data.metadata.license).toBe("CC-BY-4.0");
    expect(body.data.metadata.title).toBe("Field Notes on Moss");
  });

  it("refuses metadata edits from other accounts", async () => {
    const res = await t.app.request(
      jsonRequest("/api/v1/items/1", "PATCH", { license: "CC0" }, ALICE),
    );

    expect(res.status).toBe(403);
    expect(await errorCode(res)).toBe("NOT_CURATOR");
  });

  it("rejects an empty patch", async () => {
    const res = await t.app.request(jsonRequest("/api/v1/items/1", "PATCH", {}, STEWARD));

    expect(res.status).toBe(400);
  });

  it("pauses lending of an item", async () => {
    const pause = await t.app.request(
      jsonRequest("/api/v1/items/1/pause", "POST", { paused: true }, STEWARD),
    );
    expect(((await pause.json()) as { data: { paused: boolean } }).data.paused).toBe(true);

    const borrow = await t.app.request(jsonRequest("/api/v1/loans/borrow", "POST", { itemId: 1 }, ALICE));
    expect(borrow.status).toBe(409);
    expect(await errorCode(borrow)).toBe("ITEM_PAUSED");
  });

  it("mints to the custodian by default", async () => {
    const res = await t.app.request(
      jsonRequest("/api/v1/items/1/mint", "POST", { quantity: 3 }, STEWARD),
    );

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ data: { itemId: 1, quantity: 3, balance: 5 } });
  });

  it("rejects minting for an unknown item", async () => {
    const res = await t.app.request(
      jsonRequest("/api/v1/items/4/mint", "POST", { quantity: 1 }, STEWARD),
    );

    expect(res.status).toBe(404);
    expect(await errorCode(res)).toBe("NO_SUCH_ITEM");
  });
});
