/**
 * @circulate/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const accountId = z.string().trim().min(1);
const positiveSeconds = z.coerce.number().int().min(1);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Roles
  STEWARD_ACCOUNT: accountId,
  CUSTODIAN_ACCOUNT: accountId.optional(),

  // Money
  CURRENCY: z.string().trim().min(1).default("EUR"),
  CURRENCY_DECIMALS: z.coerce.number().int().min(0).max(18).default(2),

  // Lending policy
  LOAN_DURATION_SECONDS: positiveSeconds.default(14 * 24 * 60 * 60),
  DEPOSIT_AMOUNT: z
    .string()
    .regex(/^\d+(\.\d+)?$/, "must be a non-negative decimal amount")
    .default("5.00"),
  GRACE_PERIOD_SECONDS: z.coerce.number().int().min(0).default(24 * 60 * 60),
  EXTENSION_DURATION_SECONDS: positiveSeconds.default(7 * 24 * 60 * 60),
  MAX_EXTENSIONS: z.coerce.number().int().min(0).default(2),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly accountId: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:account1,key2:account2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const parts = entry.trim().split(":");
    const [key, accountId] = parts;
    if (parts.length !== 2 || key === undefined || accountId === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:accountId`,
      );
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (accountId === "") {
      throw new Error("Account id cannot be empty in API_KEYS");
    }
    return { key, accountId };
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
