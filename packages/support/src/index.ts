/**
 * @minichain/support — Shared building blocks for pallets.
 *
 * - Configuration contract (associated types + capabilities)
 * - Checked unsigned arithmetic over number or bigint
 * - Explicit Result values
 * - Deterministically ordered storage
 * - Dispatch contract and block structure
 */

// Arithmetic
export {
  unsignedBigInt,
  unsignedInteger,
  u8,
  u32,
  u64,
  u128,
} from "./numeric.js";
export type { Numeric, NumericLike, Ordering } from "./numeric.js";

// Configuration
export { stringAccountId, numericAccountId } from "./config.js";
export type {
  AccountIdLike,
  AccountIdOps,
  SystemTypes,
  BalancesTypes,
  SystemConfig,
  BalancesConfig,
} from "./config.js";

// Results
export { ok, err } from "./result.js";
export type { Ok, Err, Result } from "./result.js";

// Storage
export { SortedMap } from "./sorted-map.js";

// Dispatch
export { dispatchError, describeDispatchError } from "./dispatch.js";
export type {
  Dispatch,
  DispatchError,
  DispatchResult,
  Header,
  Extrinsic,
  Block,
} from "./dispatch.js";
