/**
 * @minichain/balances — Checked token transfers with a configurable flat fee.
 */

export { BalancesPallet, BALANCES_PALLET } from "./pallet.js";
export { BalancesError } from "./types.js";
export type { BalancesErrorCode, BalancesCall, AccountBalance, FeeConfig } from "./types.js";
