/**
 * @bondline/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod,
 * and derives the protocol configuration from it.
 */

import { z } from "zod";
import type { ProtocolConfigInput } from "@bondline/protocol";
import type { AuthConfig } from "./middleware/auth.js";
import { ROLES } from "./types/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

/** Comma-separated list; blanks dropped. */
const ListSchema = z
  .string()
  .default("")
  .transform((raw) =>
    raw
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry !== ""),
  );

const DigitsSchema = z.string().regex(/^\d+$/, "Expected a non-negative integer");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Protocol identities
  PROTOCOL_ADDRESS: z.string().min(1),
  OWNER_ADDRESS: z.string().min(1),
  TREASURY_ADDRESS: z.string().min(1),
  STAKER_ADDRESS: z.string().min(1),
  OPERATORS: ListSchema,
  VALIDATORS: ListSchema,

  // Denominations
  NATIVE_DENOM: z.string().min(1),
  DERIVATIVE_DENOM: z.string().min(1),

  // Timing (seconds)
  BATCH_PERIOD: z.coerce.number().int().min(1).default(259_200),
  UNBONDING_PERIOD: z.coerce.number().int().min(1).default(1_814_400),

  // Economics
  PROTOCOL_FEE_BPS: z.coerce.number().int().min(0).max(10_000).default(0),
  MINIMUM_STAKE: DigitsSchema.default("1"),
  MINIMUM_UNSTAKE: DigitsSchema.default("1"),
  MINIMUM_REWARDS: DigitsSchema.default("1"),
  UNDERFLOW_POLICY: z.enum(["fail", "clamp"]).optional(),

  // Auth
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_ISSUER: z.string().default("bondline"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Keys
// =============================================================================

const RoleSchema = z.enum(ROLES);

/**
 * Parse the API_KEYS env var into a key registry.
 *
 * Format: "key1:role1:identity1,key2:role2:identity2"
 */
export function parseApiKeys(raw: string): ReadonlyMap<string, ApiKeyRecord> {
  const keys = new Map<string, ApiKeyRecord>();
  if (raw.trim() === "") {
    return keys;
  }

  for (const entry of raw.split(",")) {
    const [key, role, identity, ...rest] = entry.trim().split(":");
    if (key === undefined || role === undefined || identity === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:identity`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    const parsedRole = RoleSchema.safeParse(role);
    if (!parsedRole.success) {
      throw new Error(`Invalid role "${role}" in API_KEYS. Must be one of: ${ROLES.join(", ")}`);
    }
    if (identity === "") {
      throw new Error("Identity cannot be empty in API_KEYS");
    }
    if (keys.has(key)) {
      throw new Error(`Duplicate key in API_KEYS for identity "${identity}"`);
    }

    keys.set(key, { key, role: parsedRole.data, identity });
  }

  return keys;
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

/**
 * Protocol configuration for the loaded environment. Settlement underflow
 * clamps in production and fails elsewhere unless set explicitly.
 */
export function toProtocolConfig(config: AppConfig): ProtocolConfigInput {
  return {
    protocolAddress: config.PROTOCOL_ADDRESS,
    owner: config.OWNER_ADDRESS,
    nativeDenom: config.NATIVE_DENOM,
    derivativeDenom: config.DERIVATIVE_DENOM,
    treasuryAddress: config.TREASURY_ADDRESS,
    stakerAddress: config.STAKER_ADDRESS,
    operators: config.OPERATORS,
    validators: config.VALIDATORS,
    batchPeriod: config.BATCH_PERIOD,
    unbondingPeriod: config.UNBONDING_PERIOD,
    protocolFeeBps: config.PROTOCOL_FEE_BPS,
    minimumLiquidStakeAmount: config.MINIMUM_STAKE,
    minimumLiquidUnstakeAmount: config.MINIMUM_UNSTAKE,
    minimumRewardsToCollect: config.MINIMUM_REWARDS,
    underflowPolicy:
      config.UNDERFLOW_POLICY ?? (config.NODE_ENV === "production" ? "clamp" : "fail"),
  };
}

export function toAuthConfig(config: AppConfig): AuthConfig {
  return {
    apiKeys: parseApiKeys(config.API_KEYS),
    jwtSecret: config.JWT_SECRET,
    jwtIssuer: config.JWT_ISSUER,
  };
}
