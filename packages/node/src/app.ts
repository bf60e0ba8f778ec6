/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { LendingService } from "./services/lending-service.js";
import type { LendingServiceConfig } from "./services/lending-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import {
  createCuratorRoutes,
  createEventRoutes,
  createHealthRoutes,
  createItemRoutes,
  createLoanRoutes,
  createMemberRoutes,
  createPolicyRoutes,
  createPoolRoutes,
  createSnapshotRoutes,
  createStewardshipRoutes,
  createWalletRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: LendingServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Auth configuration. Without API keys, callers name themselves via X-Account-Id. */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: LendingService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new LendingService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", authMiddleware(options.auth ?? { apiKeys: new Map() }));
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/loans", createLoanRoutes());
  app.route("/api/v1/items", createItemRoutes());
  app.route("/api/v1/policy", createPolicyRoutes());
  app.route("/api/v1/stewardship", createStewardshipRoutes());
  app.route("/api/v1/curators", createCuratorRoutes());
  app.route("/api/v1/members", createMemberRoutes());
  app.route("/api/v1/pool", createPoolRoutes());
  app.route("/api/v1/wallets", createWalletRoutes());
  app.route("/api/v1/snapshot", createSnapshotRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
