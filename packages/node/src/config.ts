/**
 * @spreadvault/node - Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { ProtocolConfig } from "./services/protocol.js";

// =============================================================================
// Schema
// =============================================================================

const BpsSchema = z.coerce.number().int().min(0).max(10_000);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Incentives
  EMISSION_PER_ACCRUE: z
    .string()
    .regex(/^\d+$/, "must be an unsigned integer")
    .default("100000000000")
    .transform((value) => BigInt(value)),

  // Fee split
  LP_SHARE_BPS: BpsSchema.default(6000),
  BURN_SHARE_BPS: BpsSchema.default(5000),

  // Incentive token
  TOKEN_SYMBOL: z.string().min(1).max(16).default("GRID"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(18).default(9),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/** The protocol parameters carried by a loaded config. */
export function protocolConfigFrom(config: AppConfig): ProtocolConfig {
  return {
    emissionPerAccrue: config.EMISSION_PER_ACCRUE,
    lpShareBps: BigInt(config.LP_SHARE_BPS),
    burnShareBps: BigInt(config.BURN_SHARE_BPS),
    tokenSymbol: config.TOKEN_SYMBOL,
    tokenDecimals: config.TOKEN_DECIMALS,
  };
}
