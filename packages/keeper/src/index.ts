/**
 * @quevault/keeper — Operator runtime for a queue-based vault.
 *
 * @packageDocumentation
 */

import type { Vault } from "@quevault/vault";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { Keeper } from "./keeper.js";

export { Keeper } from "./keeper.js";
export type {
  KeeperOptions,
  DrainReport,
  DrainStopReason,
  WithdrawalDrainReport,
  CycleReport,
} from "./keeper.js";
export { ConfigSchema, loadConfig } from "./config.js";
export type { KeeperConfig } from "./config.js";
export { createLogger } from "./logger.js";

/**
 * Build a keeper for `vault` from environment variables.
 *
 * @throws {z.ZodError} if the environment is invalid
 */
export function createKeeper(
  vault: Vault,
  env: Record<string, string | undefined> = process.env,
): Keeper {
  const config = loadConfig(env);
  const logger = createLogger(config);
  logger.info(
    {
      executor: config.KEEPER_EXECUTOR,
      target: config.KEEPER_TARGET_SOURCE ?? null,
      depositBatchSize: config.KEEPER_DEPOSIT_BATCH_SIZE,
      withdrawBatchSize: config.KEEPER_WITHDRAW_BATCH_SIZE,
    },
    "keeper configured",
  );
  return Keeper.fromConfig(vault, config, logger);
}
