/**
 * @quevault/keeper — Configuration.
 *
 * Loads and validates keeper configuration from environment variables
 * using Zod.
 */

import { z } from "zod";
import { MAX_DEPOSIT_BATCH_SIZE } from "@quevault/vault";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Identity
  KEEPER_EXECUTOR: z.string().min(1),
  KEEPER_TARGET_SOURCE: z.string().min(1).optional(),

  // Batching
  KEEPER_DEPOSIT_BATCH_SIZE: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_DEPOSIT_BATCH_SIZE)
    .default(MAX_DEPOSIT_BATCH_SIZE),
  KEEPER_WITHDRAW_BATCH_SIZE: z.coerce.number().int().min(1).default(10),
  KEEPER_MAX_BATCHES: z.coerce.number().int().min(1).default(20),

  // Reporting
  KEEPER_PRICE_MAX_AGE_SECONDS: z.coerce.number().int().min(1).default(60),
});

export type KeeperConfig = z.infer<typeof ConfigSchema>;

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
): KeeperConfig {
  return ConfigSchema.parse(env);
}
