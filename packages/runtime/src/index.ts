/**
 * @minichain/runtime — Runtime composition over the system, balances and
 * staking pallets.
 */

export { Runtime, transactionToExtrinsic } from "./runtime.js";
export type { RuntimeOptions } from "./runtime.js";
export { RuntimeError } from "./errors.js";
export type { RuntimeErrorCode } from "./errors.js";
export { runtimeConfig } from "./types.js";
export type {
  RuntimeTypes,
  AccountId,
  BlockNumber,
  Nonce,
  Balance,
  RuntimeCall,
  RuntimePallet,
  RuntimeDispatchError,
  RuntimeExtrinsic,
  RuntimeBlock,
  Transaction,
  FailedItem,
  BlockResult,
  GenesisConfig,
  AccountSummary,
  StateSummary,
} from "./types.js";
export { RuntimeConfigSchema, loadConfig } from "./config.js";
export type { RuntimeConfig } from "./config.js";
export { createLogger } from "./logger.js";
export { createRuntimeFromEnv } from "./bootstrap.js";
