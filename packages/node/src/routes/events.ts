/**
 * Audit log routes.
 *
 * GET /api/v1/events                          — Whole log, filterable by type and actor
 * GET /api/v1/events/items/:id                — One item's stream
 * GET /api/v1/events/loans/:borrower/:itemId  — One loan's stream
 * GET /api/v1/events/:log                     — The policy, membership or escrow log
 *
 * The whole log pages by global position, single streams by version.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { StoredEvent } from "@circulate/event-store";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import {
  AccountIdSchema,
  AuditLogSchema,
  ItemIdSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

const INVALID_QUERY = createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters");

function streamPage(c: Context<AppEnv>, streamId: string): Response {
  const query = parseQuery(ListStreamEventsQuerySchema, c.req.query());
  if (query === undefined) {
    return c.json(INVALID_QUERY, 400);
  }

  const events = c.get("service").store.read(
    streamId,
    query.afterVersion !== undefined ? { fromVersion: query.afterVersion + 1 } : undefined,
  );
  return c.json(paginate(events, query, (e) => e.version, "version"));
}

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(ListEventsQuerySchema, c.req.query());
    if (query === undefined) {
      return c.json(INVALID_QUERY, 400);
    }

    const { type, actor } = query;
    const matches = (e: StoredEvent): boolean =>
      (type === undefined || e.event.type === type) &&
      (actor === undefined || e.event.metadata.actor === actor);

    const events = c.get("service").store.readAll(
      query.afterPosition !== undefined ? { fromPosition: query.afterPosition + 1 } : undefined,
    );
    return c.json(paginate(events.filter(matches), query, (e) => e.globalPosition, "globalPosition"));
  });

  routes.get("/items/:id", (c) => {
    const itemId = ItemIdSchema.safeParse(c.req.param("id"));
    if (!itemId.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Item id must be a positive integer"), 400);
    }
    return streamPage(c, `item:${itemId.data}`);
  });

  routes.get("/loans/:borrower/:itemId", (c) => {
    const borrower = AccountIdSchema.safeParse(c.req.param("borrower"));
    const itemId = ItemIdSchema.safeParse(c.req.param("itemId"));
    if (!borrower.success || !itemId.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid loan key"), 400);
    }
    return streamPage(c, `loan:${borrower.data}:${itemId.data}`);
  });

  routes.get("/:log", (c) => {
    const log = AuditLogSchema.safeParse(c.req.param("log"));
    if (!log.success) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Unknown audit log: ${c.req.param("log")}`), 404);
    }
    return streamPage(c, log.data);
  });

  return routes;
}
