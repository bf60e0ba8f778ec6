/**
 * Authentication middleware.
 *
 * Supports two strategies:
 * 1. API key via X-Api-Key header → looked up in the configured key registry
 * 2. X-Account-Id header, accepted only when no API keys are configured
 *
 * On success, sets `auth` and `accountId` on the context.
 * On failure, returns 401.
 */

import type { MiddlewareHandler } from "hono";
import { ACCOUNT_ID_HEADER, API_KEY_HEADER } from "../types/api-contract.js";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export interface AuthConfig {
  /** Map of API key → record. Empty means header identification. */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  const keyed = config.apiKeys.size > 0;

  return async (c, next) => {
    let auth: AuthContext | undefined;

    if (keyed) {
      const apiKey = c.req.header(API_KEY_HEADER);
      if (apiKey !== undefined) {
        const record = config.apiKeys.get(apiKey);
        if (record === undefined) {
          return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
        }
        auth = { type: "api-key", accountId: record.accountId };
      }
    } else {
      const accountId = c.req.header(ACCOUNT_ID_HEADER)?.trim();
      if (accountId !== undefined && accountId !== "") {
        auth = { type: "header", accountId };
      }
    }

    if (auth === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    c.set("auth", auth);
    c.set("accountId", auth.accountId);
    return next();
  };
}
