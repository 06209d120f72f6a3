/**
 * @minichain/runtime — Logger construction.
 */

import { pino } from "pino";
import type { DestinationStream, Logger } from "pino";
import type { RuntimeConfig } from "./config.js";

/**
 * Build the runtime logger. Development output goes through pino-pretty;
 * an explicit destination always receives plain JSON lines.
 */
export function createLogger(
  config: Pick<RuntimeConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
