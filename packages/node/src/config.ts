/**
 * @custody/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { LedgerConfig } from "@custody/ledger";
import type { ApiKeyRecord } from "./types/auth.js";
import { ROLES, isRole } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const AmountEnv = z
  .string()
  .regex(/^[1-9]\d*$/, "must be a positive integer")
  .transform((v) => BigInt(v));

const BooleanEnv = z.enum(["true", "false"]).transform((v) => v === "true");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_ISSUER: z.string().default("custody"),

  // Custody limits
  CAPACITY_LIMIT: AmountEnv.default("1000"),
  WITHDRAW_LIMIT: AmountEnv.default("100"),
  CAPACITY_BASIS: z.enum(["held", "lifetime"]).default("held"),
  STRICT_WITHDRAW_LIMIT: BooleanEnv.default("true"),
  OWNER_PRINCIPAL: z.string().trim().min(1).optional(),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:principal1,key2:role2:principal2"
 */
export function parseApiKeys(raw: string): readonly ApiKeyRecord[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ApiKeyRecord[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    if (parts.length !== 3) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:principal`,
      );
    }

    const [key, role, principal] = parts as [string, string, string];

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key "${key}" in API_KEYS`);
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: ${ROLES.join(" or ")}`,
      );
    }
    if (principal === "") {
      throw new Error("Principal cannot be empty in API_KEYS");
    }

    seen.add(key);
    keys.push({ key, role, principal });
  }

  return keys;
}

/**
 * Owner credentials must name the configured owner principal; the
 * ledger grants history access by principal, not by role.
 */
export function assertOwnerCredentials(
  keys: readonly ApiKeyRecord[],
  ownerPrincipal: string | undefined,
): void {
  for (const record of keys) {
    if (record.role === "owner" && record.principal !== ownerPrincipal) {
      throw new Error(
        `API key for "${record.principal}" has role owner, but OWNER_PRINCIPAL is ${ownerPrincipal === undefined ? "unset" : `"${ownerPrincipal}"`}`,
      );
    }
  }
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Ledger limits from a loaded config.
 */
export function toLedgerConfig(config: AppConfig): LedgerConfig {
  return {
    capacityLimit: config.CAPACITY_LIMIT,
    perOperationWithdrawLimit: config.WITHDRAW_LIMIT,
    capacityBasis: config.CAPACITY_BASIS,
    strictWithdrawLimit: config.STRICT_WITHDRAW_LIMIT,
    owner: config.OWNER_PRINCIPAL,
  };
}
