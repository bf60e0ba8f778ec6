/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (audit log hash chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LendingService } from "../services/lending-service.js";

export function createHealthRoutes(service: LendingService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyIntegrity();
    const eventStore = integrity.valid
      ? { status: "ok" }
      : { status: "down", detail: `chainValid=false, errors=${integrity.errors.length}` };

    return c.json(
      {
        status: integrity.valid ? "ready" : "not_ready",
        subsystems: { eventStore },
        events: integrity.lastVerifiedPosition,
        timestamp: new Date().toISOString(),
      },
      integrity.valid ? 200 : 503,
    );
  });

  return routes;
}
