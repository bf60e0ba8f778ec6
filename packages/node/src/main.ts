/**
 * @circulate/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import type { ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const keyMap = new Map<string, ApiKeyRecord>();
  for (const k of parseApiKeys(config.API_KEYS)) {
    keyMap.set(k.key, k);
  }
  if (keyMap.size > 0) {
    logger.info({ apiKeyCount: keyMap.size }, "Auth configured");
  } else {
    logger.warn("No API keys configured; callers identify themselves with X-Account-Id");
  }

  const { app, service } = createApp({
    serviceConfig: {
      steward: config.STEWARD_ACCOUNT,
      custodian: config.CUSTODIAN_ACCOUNT,
      currency: config.CURRENCY,
      decimals: config.CURRENCY_DECIMALS,
      loanDuration: config.LOAN_DURATION_SECONDS,
      depositAmount: config.DEPOSIT_AMOUNT,
      gracePeriod: config.GRACE_PERIOD_SECONDS,
      extensionDuration: config.EXTENSION_DURATION_SECONDS,
      maxExtensions: config.MAX_EXTENSIONS,
      onSubscriberError: (err, event) => {
        logger.error(
          { err, eventType: event.event.type, globalPosition: event.globalPosition },
          "Event subscriber failed",
        );
      },
      onPostCommitError: ({ operation, key, error }) => {
        logger.error({ err: error, operation, key }, "Post-commit step failed; the change stands");
      },
    },
    logFn: (entry) => {
      const level = entry.status >= 500 ? "error" : entry.status >= 400 ? "warn" : "info";
      const who = entry.accountId ?? "anonymous";
      logger[level](entry, `${entry.method} ${entry.path} ${entry.status} (${who})`);
    },
    auth: { apiKeys: keyMap },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, steward: config.STEWARD_ACCOUNT },
    "Circulate node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      const integrity = service.verifyIntegrity();
      logger.info(
        { events: integrity.lastVerifiedPosition, chainValid: integrity.valid },
        "Shutdown complete",
      );
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
