/**
 * @circulate/node
 *
 * HTTP service for the Circulate lending ledger.
 */

export { LendingService } from "./services/lending-service.js";
export type { LendingServiceConfig } from "./services/lending-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
