/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Domain errors carry a `code`; its kind picks the status:
 * authorization 403, not_found 404, state_conflict 409, value 422.
 * A ZodError is a 400. Anything else is a 500 without internal details.
 */

import type { Context } from "hono";
import { ZodError } from "zod";
import type { ErrorKind } from "@circulate/lending";
import { domainErrorCode, errorKindOf } from "@circulate/lending";
import { createErrorEnvelope } from "../types/error.js";

const STATUS_BY_KIND = {
  authorization: 403,
  not_found: 404,
  state_conflict: 409,
  value: 422,
} as const satisfies Record<ErrorKind, number>;

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof ZodError) {
    return c.json(
      createErrorEnvelope("VALIDATION_ERROR", "Validation failed", {
        issues: err.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      }),
      400,
    );
  }

  const code = domainErrorCode(err);
  const kind = code === undefined ? undefined : errorKindOf(code);

  if (code === undefined || kind === undefined) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message), STATUS_BY_KIND[kind]);
}
