/**
 * @souk/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Arbitration
  ARBITRATOR: z.string().trim().min(1, "ARBITRATOR must name the arbitrator principal"),

  // Settlement asset
  SETTLEMENT_SYMBOL: z.string().min(1).default("USDC"),
  SETTLEMENT_DECIMALS: z.coerce.number().int().min(0).max(18).default(6),

  // Development faucet
  MINT_ENABLED: booleanFlag,

  // Escrow limits
  PAYMENT_WINDOW_SECONDS: z.coerce.number().int().min(1).default(172800),
  MAX_OPEN_ESCROWS_PER_OFFER: z.coerce.number().int().min(1).default(100),
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
