/**
 * @minichain/runtime — Configuration.
 *
 * Loads and validates runtime configuration from environment variables
 * using Zod.
 */

import { z } from "zod";
import { u128 } from "@minichain/support";

// =============================================================================
// Schema
// =============================================================================

/** Balance amount given as a decimal string, parsed to a u128 bigint. */
function balanceAmount(defaultValue: string) {
  return z
    .string()
    .regex(/^\d+$/, "Expected a non-negative integer")
    .default(defaultValue)
    .transform((value) => BigInt(value))
    .refine((value) => u128.isValid(value), "Amount does not fit in u128");
}

export const RuntimeConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Fees
  BASE_FEE: balanceAmount("0"),
  FEE_RECIPIENT: z.string().min(1).optional(),

  // Staking
  MINIMUM_STAKE: balanceAmount("100"),
  REWARD_RATE: balanceAmount("5"),
  UNSTAKING_PERIOD: z.coerce.number().int().min(0).max(0xffff_ffff).default(10),
  MAX_VALIDATORS: z.coerce.number().int().min(0).default(10),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

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
): RuntimeConfig {
  return RuntimeConfigSchema.parse(env);
}
