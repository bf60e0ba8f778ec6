/**
 * Lending policy routes. Changes are steward-only.
 *
 * GET /api/v1/policy             — Current policy, roles and custodian
 * PUT /api/v1/policy/custodian   — Point lending at another custodian account
 * PUT /api/v1/policy/:setting    — Change one policy setting
 */

import { Hono } from "hono";
import type { PolicyUpdate } from "@circulate/lending";
import type { AppEnv } from "../types/api-contract.js";
import type { LendingService } from "../services/lending-service.js";
import type { PolicyValueDto } from "../types/dto.js";
import {
  AccountBodySchema,
  PolicySettingSchema,
  PolicyValueSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Pair a setting with its value. The deposit takes an amount string,
 * every other setting a whole number of seconds or extensions.
 */
function toPolicyUpdate(
  service: LendingService,
  setting: string,
  value: PolicyValueDto["value"],
): PolicyUpdate | undefined {
  const parsed = PolicySettingSchema.safeParse(setting);
  if (!parsed.success) {
    return undefined;
  }
  if (parsed.data === "depositAmount") {
    return typeof value === "string"
      ? { setting: "depositAmount", value: service.money(value) }
      : undefined;
  }
  return typeof value === "number" ? { setting: parsed.data, value } : undefined;
}

export function createPolicyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({ data: service.desk.policySnapshot() });
  });

  // Registered before /:setting so "custodian" is not read as a setting.
  routes.put("/custodian", validateBody(AccountBodySchema), (c) => {
    const service = c.get("service");
    const change = service.desk.setCustodian(
      c.get("auth").accountId,
      c.get("validatedBody").account,
    );
    return c.json({ data: change });
  });

  routes.put("/:setting", validateBody(PolicyValueSchema), (c) => {
    const service = c.get("service");
    const setting = c.req.param("setting");
    const update = toPolicyUpdate(service, setting, c.get("validatedBody").value);
    if (update === undefined) {
      return c.json(
        createErrorEnvelope(
          "VALIDATION_ERROR",
          `Unknown policy setting '${setting}' or a value of the wrong type`,
        ),
        400,
      );
    }

    const change = service.desk.updatePolicy(c.get("auth").accountId, update);
    return c.json({ data: change });
  });

  return routes;
}
