/**
 * @minichain/runtime — Build a Runtime from environment variables.
 */

import type { DestinationStream } from "pino";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { Runtime } from "./runtime.js";

export function createRuntimeFromEnv(
  env: Record<string, string | undefined> = process.env,
  destination?: DestinationStream,
): Runtime {
  const config = loadConfig(env);
  const logger = createLogger(config, destination);

  const runtime = new Runtime({
    logger,
    baseFee: config.BASE_FEE,
    feeRecipient: config.FEE_RECIPIENT,
    staking: {
      minimumStake: config.MINIMUM_STAKE,
      rewardRate: config.REWARD_RATE,
      unstakingPeriod: config.UNSTAKING_PERIOD,
      maxValidators: config.MAX_VALIDATORS,
    },
  });

  logger.debug(
    {
      baseFee: config.BASE_FEE.toString(),
      feeRecipient: config.FEE_RECIPIENT ?? null,
      maxValidators: config.MAX_VALIDATORS,
    },
    "Runtime configured",
  );
  return runtime;
}
