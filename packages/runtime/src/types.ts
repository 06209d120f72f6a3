/**
 * @minichain/runtime — Concrete types and the call surface of the runtime.
 */

import { stringAccountId, u128, u32 } from "@minichain/support";
import type { BalancesConfig, Block, DispatchError, Extrinsic } from "@minichain/support";
import type { BalancesCall, BalancesError } from "@minichain/balances";
import type { RewardPayout, StakingCall, StakingError, StakingEvent } from "@minichain/staking";

// =============================================================================
// Associated Types
// =============================================================================

export interface RuntimeTypes {
  readonly AccountId: string;
  readonly BlockNumber: number;
  readonly Nonce: number;
  readonly Balance: bigint;
}

export type AccountId = RuntimeTypes["AccountId"];
export type BlockNumber = RuntimeTypes["BlockNumber"];
export type Nonce = RuntimeTypes["Nonce"];
export type Balance = RuntimeTypes["Balance"];

/**
 * The single config object shared by every pallet of the runtime.
 */
export const runtimeConfig: BalancesConfig<RuntimeTypes> = {
  accountId: stringAccountId,
  blockNumber: u32,
  nonce: u32,
  balance: u128,
};

// =============================================================================
// Calls
// =============================================================================

export type RuntimeCall =
  | { readonly pallet: "balances"; readonly call: BalancesCall<RuntimeTypes> }
  | { readonly pallet: "staking"; readonly call: StakingCall<RuntimeTypes> };

export type RuntimePallet = RuntimeCall["pallet"];

export type RuntimeDispatchError =
  | DispatchError<"balances", BalancesError>
  | DispatchError<"staking", StakingError>;

export type RuntimeExtrinsic = Extrinsic<AccountId, RuntimeCall>;
export type RuntimeBlock = Block<BlockNumber, RuntimeExtrinsic>;

// =============================================================================
// Transactions
// =============================================================================

/**
 * Operations accepted by `createBlock()`. Every variant except `setBalance`
 * is signed by the account it names first and goes through dispatch.
 */
export type Transaction =
  | { readonly type: "transfer"; readonly from: AccountId; readonly to: AccountId; readonly amount: Balance }
  | { readonly type: "setBalance"; readonly who: AccountId; readonly amount: Balance }
  | { readonly type: "addValidator"; readonly validator: AccountId; readonly commission: number }
  | {
      readonly type: "stake";
      readonly who: AccountId;
      readonly amount: Balance;
      readonly validator: AccountId;
    }
  | { readonly type: "unstake"; readonly who: AccountId }
  | { readonly type: "claimRewards"; readonly who: AccountId };

// =============================================================================
// Results
// =============================================================================

export interface FailedItem<I> {
  readonly item: I;
  readonly error: RuntimeDispatchError;
}

/**
 * Outcome of one executed block. `I` is what the block was built from:
 * extrinsics for `executeBlock()`, transactions for `createBlock()`.
 */
export interface BlockResult<I> {
  readonly blockNumber: BlockNumber;
  readonly blockHash: Uint8Array;
  readonly successful: number;
  readonly failed: readonly FailedItem<I>[];
  readonly transactionCount: number;
  readonly events: readonly StakingEvent<RuntimeTypes>[];
  readonly payouts: readonly RewardPayout<RuntimeTypes>[];
}

export interface GenesisConfig {
  readonly balances?: readonly { readonly who: AccountId; readonly amount: Balance }[];
  readonly validators?: readonly { readonly validator: AccountId; readonly commission: number }[];
}

export interface AccountSummary {
  readonly accountId: AccountId;
  readonly balance: Balance;
  readonly nonce: Nonce;
}

export interface StateSummary {
  readonly blockNumber: BlockNumber;
  /** Lowercase hex, undefined before genesis. */
  readonly genesisHash: string | undefined;
  readonly totalIssuance: Balance;
  readonly totalStaked: Balance;
  readonly accounts: readonly AccountSummary[];
}
