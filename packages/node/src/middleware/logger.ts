/**
 * Request log middleware.
 *
 * Emits one entry per request once the response is known. The entry
 * names the authenticated account, if any, so lending actions can be
 * traced to their caller.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Absent for health checks and rejected credentials */
  readonly accountId?: string | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();
    await next();

    const accountId = c.get("accountId");
    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      ...(accountId !== undefined ? { accountId } : {}),
    });
  };
}
