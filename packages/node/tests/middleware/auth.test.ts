/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - X-Account-Id identification when no keys are configured
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord } from "../../src/types/auth.js";
import { authMiddleware } from "../../src/middleware/auth.js";

function makeApp(apiKeys: ApiKeyRecord[] = []) {
  const keyMap = new Map<string, ApiKeyRecord>();
  for (const k of apiKeys) {
    keyMap.set(k.key, k);
  }

  const app = new Hono<AppEnv>();
  app.use("*", authMiddleware({ apiKeys: keyMap }));
  app.get("/whoami", (c) => c.json({ auth: c.get("auth") }));
  return app;
}

describe("API key auth", () => {
  const app = makeApp([{ key: "test-key-1", accountId: "steward" }]);

  it("maps a valid API key to its account", async () => {
    const res = await app.request("/whoami", { headers: { "X-Api-Key": "test-key-1" } });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ auth: { type: "api-key", accountId: "steward" } });
  });

  it("rejects an unknown API key", async () => {
    const res = await app.request("/whoami", { headers: { "X-Api-Key": "wrong" } });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: "UNAUTHORIZED", message: "Invalid API key" },
    });
  });

  it("ignores X-Account-Id once keys are configured", async () => {
    const res = await app.request("/whoami", { headers: { "X-Account-Id": "steward" } });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: "UNAUTHORIZED", message: "Authentication required" },
    });
  });
});

describe("header identification", () => {
  const app = makeApp();

  it("takes the caller from X-Account-Id", async () => {
    const res = await app.request("/whoami", { headers: { "X-Account-Id": " alice " } });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ auth: { type: "header", accountId: "alice" } });
  });

  it("rejects a missing or blank header", async () => {
    expect((await app.request("/whoami")).status).toBe(401);
    expect(
      (await app.request("/whoami", { headers: { "X-Account-Id": "  " } })).status,
    ).toBe(401);
  });
});
