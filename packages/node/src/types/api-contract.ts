/**
 * HTTP contract shared by middleware and routes: the headers the node
 * reads or writes, and the typed context variables.
 */

import { z } from "zod";
import type { LendingService } from "../services/lending-service.js";
import type { AuthContext } from "./auth.js";

// ─── Headers ─────────────────────────────────────────────────────────────

/** Echoed on every response; taken from the request when well formed. */
export const REQUEST_ID_HEADER = "X-Request-Id";
/** API key, when the node is configured with keys. */
export const API_KEY_HEADER = "X-Api-Key";
/** Self-declared caller, when no API keys are configured. */
export const ACCOUNT_ID_HEADER = "X-Account-Id";

/** Incoming request ids are kept only if they match this. */
export const RequestIdSchema = z.string().regex(/^[A-Za-z0-9._:-]{1,128}$/);

// ─── Context ─────────────────────────────────────────────────────────────

/**
 * Hono environment type for the Circulate app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The lending service (set once for every API request) */
    service: LendingService;

    /** Calling account (set by auth middleware) */
    auth: AuthContext;

    /** Calling account id; unset outside /api or before authentication */
    accountId: string | undefined;
  };
}
