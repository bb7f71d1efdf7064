/**
 * @scoregov/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { EoaAddress } from "@scoregov/types";
import { isEoaAddress } from "@scoregov/types";
import type { GovernanceConfig } from "@scoregov/governance";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(9000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Governance
  GENESIS_ADDRESS: z.custom<EoaAddress>((v) => isEoaAddress(v), {
    message: "GENESIS_ADDRESS must be an EOA address (hx + 40 lowercase hex)",
  }),
  AUDIT_ENABLED: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("true"),

  // Block production
  BLOCK_INTERVAL_MS: z.coerce.number().int().min(100).default(2000),
  RETAINED_SNAPSHOTS: z.coerce.number().int().min(1).default(64),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

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
 * The governance settings carried by the node config.
 */
export function toGovernanceConfig(config: AppConfig): GovernanceConfig {
  return {
    genesisAddress: config.GENESIS_ADDRESS,
    auditEnabled: config.AUDIT_ENABLED,
  };
}
