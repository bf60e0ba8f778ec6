/**
 * GET /api/v1/snapshot — Whole-desk diagnostic snapshot.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createSnapshotRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({ data: service.desk.snapshot() });
  });

  return routes;
}
