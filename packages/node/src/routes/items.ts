/**
 * Catalog routes.
 *
 * POST  /api/v1/items            — Create an item (steward)
 * GET   /api/v1/items/:id        — Get an item with its availability
 * PATCH /api/v1/items/:id        — Edit metadata (steward or curator)
 * POST  /api/v1/items/:id/pause  — Pause or resume lending (steward or curator)
 * POST  /api/v1/items/:id/mint   — Mint units to the custodian (steward)
 */

import type { Context } from "hono";
import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateItemSchema,
  ItemIdSchema,
  MintSchema,
  PauseItemSchema,
  UpdateItemSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

function parseItemId(c: Context): number | undefined {
  const parsed = ItemIdSchema.safeParse(c.req.param("id"));
  return parsed.success ? parsed.data : undefined;
}

const INVALID_ITEM_ID = createErrorEnvelope(
  "VALIDATION_ERROR",
  "Item id must be a positive integer",
);

export function createItemRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateItemSchema), (c) => {
    const service = c.get("service");
    const item = service.desk.createItem(c.get("auth").accountId, c.get("validatedBody"));
    return c.json({ data: item }, 201);
  });

  routes.get("/:id", (c) => {
    const service = c.get("service");
    const itemId = parseItemId(c);
    if (itemId === undefined) {
      return c.json(INVALID_ITEM_ID, 400);
    }

    const item = service.desk.getItem(itemId);
    if (item === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Item ${itemId} not found`), 404);
    }

    return c.json({
      data: { ...item, availableUnits: service.desk.availableUnits(itemId) },
    });
  });

  routes.patch("/:id", validateBody(UpdateItemSchema), (c) => {
    const service = c.get("service");
    const itemId = parseItemId(c);
    if (itemId === undefined) {
      return c.json(INVALID_ITEM_ID, 400);
    }

    const item = service.desk.updateMetadata(
      c.get("auth").accountId,
      itemId,
      c.get("validatedBody"),
    );
    return c.json({ data: item });
  });

  routes.post("/:id/pause", validateBody(PauseItemSchema), (c) => {
    const service = c.get("service");
    const itemId = parseItemId(c);
    if (itemId === undefined) {
      return c.json(INVALID_ITEM_ID, 400);
    }

    const item = service.desk.setPaused(
      c.get("auth").accountId,
      itemId,
      c.get("validatedBody").paused,
    );
    return c.json({ data: item });
  });

  routes.post("/:id/mint", validateBody(MintSchema), (c) => {
    const service = c.get("service");
    const itemId = parseItemId(c);
    if (itemId === undefined) {
      return c.json(INVALID_ITEM_ID, 400);
    }

    const body = c.get("validatedBody");
    const balance = service.desk.mint(c.get("auth").accountId, itemId, body.quantity, body.to);
    return c.json({ data: { itemId, quantity: body.quantity, balance } }, 201);
  });

  return routes;
}
