/**
 * Role routes: stewardship, curators and members.
 *
 * POST   /api/v1/stewardship/transfer  — Hand stewardship to another account
 * POST   /api/v1/stewardship/renounce  — Give up stewardship for good
 * POST   /api/v1/curators              — Grant the curator role
 * DELETE /api/v1/curators/:account     — Revoke the curator role
 * POST   /api/v1/members               — Grant membership
 * GET    /api/v1/members/:account      — Membership of one account
 * DELETE /api/v1/members/:account      — Revoke membership
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AccountBodySchema,
  GrantMembershipSchema,
  TransferStewardshipSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createStewardshipRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/transfer", validateBody(TransferStewardshipSchema), (c) => {
    const service = c.get("service");
    const change = service.desk.transferStewardship(
      c.get("auth").accountId,
      c.get("validatedBody").to,
    );
    return c.json({ data: change });
  });

  routes.post("/renounce", (c) => {
    const service = c.get("service");
    const change = service.desk.renounceStewardship(c.get("auth").accountId);
    return c.json({ data: change });
  });

  return routes;
}

export function createCuratorRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(AccountBodySchema), (c) => {
    const service = c.get("service");
    const account = c.get("validatedBody").account;
    const changed = service.desk.grantCurator(c.get("auth").accountId, account);
    return c.json({ data: { account, curator: true, changed } });
  });

  routes.delete("/:account", (c) => {
    const service = c.get("service");
    const account = c.req.param("account");
    const changed = service.desk.revokeCurator(c.get("auth").accountId, account);
    return c.json({ data: { account, curator: false, changed } });
  });

  return routes;
}

export function createMemberRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(GrantMembershipSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");
    const membership = service.desk.grantMembership(
      c.get("auth").accountId,
      body.account,
      body.tier ?? null,
    );
    return c.json({ data: membership }, 201);
  });

  routes.get("/:account", (c) => {
    const service = c.get("service");
    const account = c.req.param("account");
    return c.json({ data: { account, member: service.desk.isMember(account) } });
  });

  routes.delete("/:account", (c) => {
    const service = c.get("service");
    const account = c.req.param("account");
    const revoked = service.desk.revokeMembership(c.get("auth").accountId, account);
    return c.json({ data: { account, revoked } });
  });

  return routes;
}
