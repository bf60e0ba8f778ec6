/**
 * Request id middleware.
 *
 * Keeps a caller-supplied X-Request-Id when it is a short token, and
 * assigns a UUID otherwise. The id is echoed on the response.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { REQUEST_ID_HEADER, RequestIdSchema } from "../types/api-contract.js";
import type { AppEnv } from "../types/api-contract.js";

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = RequestIdSchema.safeParse(c.req.header(REQUEST_ID_HEADER));
    const requestId = incoming.success ? incoming.data : randomUUID();

    c.set("requestId", requestId);
    await next();
    c.header(REQUEST_ID_HEADER, requestId);
  };
}
