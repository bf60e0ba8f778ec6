/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, parseQuery } from "./validate.js";
export type { ValidatedEnv } from "./validate.js";
export { authMiddleware } from "./auth.js";
export type { AuthConfig } from "./auth.js";
