/**
 * @quevault/keeper — Logger.
 *
 * JSON lines in production, pretty-printed in development.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { KeeperConfig } from "./config.js";

export function createLogger(config: Pick<KeeperConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
