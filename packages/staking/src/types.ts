/**
 * @minichain/staking — Validator registry and stake accounting types.
 *
 * Rules:
 * - A StakeInfo exists exactly while its account has an active stake
 * - totalStaked equals the sum of every StakeInfo.stakedAmount
 * - A validator's totalStake equals the sum over the stakes naming it
 * - Rewards accrue per block at rewardRate / 1000 of the stake, less the
 *   validator's commission percentage
 */

import type { BalancesTypes } from "@minichain/support";

// ─── Parameters ──────────────────────────────────────────────────────────

export interface StakingParams<T extends BalancesTypes> {
  /** Smallest amount accepted by stake(). */
  readonly minimumStake: T["Balance"];
  /** Reward per block, in thousandths of the staked amount. */
  readonly rewardRate: T["Balance"];
  /** Blocks a stake stays locked after it was made. */
  readonly unstakingPeriod: T["BlockNumber"];
  /** Capacity of the validator registry. */
  readonly maxValidators: number;
}

/** Fixed-point scale of rewardRate. */
export const REWARD_RATE_SCALE = 1000n;

/** Commission rates are whole percentages. */
export const MAX_COMMISSION = 100;

// ─── Records ─────────────────────────────────────────────────────────────

export interface StakeInfo<T extends BalancesTypes> {
  readonly stakedAmount: T["Balance"];
  readonly validator: T["AccountId"];
  readonly stakeBlock: T["BlockNumber"];
  readonly lastRewardBlock: T["BlockNumber"];
  readonly totalRewards: T["Balance"];
}

export interface ValidatorInfo<T extends BalancesTypes> {
  readonly totalStake: T["Balance"];
  /** Percentage (0-100) of each nominator's reward kept by the validator. */
  readonly commissionRate: number;
  readonly isActive: boolean;
  readonly nominatorsCount: number;
}

export interface StakingStats<T extends BalancesTypes> {
  readonly totalStaked: T["Balance"];
  readonly totalValidators: number;
  readonly activeValidators: number;
  readonly totalStakers: number;
  readonly averageStake: T["Balance"];
}

export interface RewardPayout<T extends BalancesTypes> {
  readonly who: T["AccountId"];
  readonly amount: T["Balance"];
}

/** Read-only balance oracle supplied by whoever calls stake(). */
export type BalanceCheck<T extends BalancesTypes> = (who: T["AccountId"]) => T["Balance"];

/**
 * Asks whoever holds spendable balances whether `who` can be credited
 * `amount`. Consulted before an unstake or reward claim is committed.
 */
export type CreditCheck<T extends BalancesTypes> = (who: T["AccountId"], amount: T["Balance"]) => boolean;

// ─── Events ──────────────────────────────────────────────────────────────

export type StakingEvent<T extends BalancesTypes> =
  | {
      readonly type: "staked";
      readonly who: T["AccountId"];
      readonly amount: T["Balance"];
      readonly validator: T["AccountId"];
    }
  | { readonly type: "unstaked"; readonly who: T["AccountId"]; readonly amount: T["Balance"] }
  | { readonly type: "validatorAdded"; readonly validator: T["AccountId"] }
  | { readonly type: "validatorRemoved"; readonly validator: T["AccountId"] }
  | { readonly type: "rewardsPaid"; readonly who: T["AccountId"]; readonly amount: T["Balance"] }
  | { readonly type: "slashApplied"; readonly who: T["AccountId"]; readonly amount: T["Balance"] };

// ─── Calls ───────────────────────────────────────────────────────────────

/**
 * Calls a signed account can make against the staking pallet.
 * The caller is the validator for validator calls and the staker otherwise.
 */
export type StakingCall<T extends BalancesTypes> =
  | { readonly type: "addValidator"; readonly commission: number }
  | { readonly type: "removeValidator" }
  | {
      readonly type: "stake";
      readonly amount: T["Balance"];
      readonly validator: T["AccountId"];
    }
  | { readonly type: "unstake" }
  | { readonly type: "claimRewards" };

/**
 * Spendable-balance change the dispatcher's caller must apply after a
 * successful staking call. The pallet tracks locked funds but does not own
 * spendable balances.
 */
export type StakingEffect<T extends BalancesTypes> =
  | { readonly type: "none" }
  | { readonly type: "lock"; readonly who: T["AccountId"]; readonly amount: T["Balance"] }
  | { readonly type: "unlock"; readonly who: T["AccountId"]; readonly amount: T["Balance"] }
  | { readonly type: "reward"; readonly who: T["AccountId"]; readonly amount: T["Balance"] };

// ─── Error Types ─────────────────────────────────────────────────────────

export type StakingErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INVALID_AMOUNT"
  | "CREDIT_REJECTED"
  | "NOT_STAKED"
  | "ALREADY_STAKED"
  | "MINIMUM_STAKE_NOT_MET"
  | "INVALID_VALIDATOR"
  | "TOO_MANY_VALIDATORS"
  | "NOT_VALIDATOR"
  | "ALREADY_VALIDATOR"
  | "REWARD_CALCULATION_ERROR"
  | "UNSTAKING_PERIOD_NOT_MET";

const MESSAGES: Readonly<Record<StakingErrorCode, string>> = {
  INSUFFICIENT_BALANCE: "Insufficient balance to stake",
  INVALID_AMOUNT: "Invalid amount specified",
  CREDIT_REJECTED: "Balance cannot be credited",
  NOT_STAKED: "Account is not staking",
  ALREADY_STAKED: "Account is already staking",
  MINIMUM_STAKE_NOT_MET: "Minimum stake amount not met",
  INVALID_VALIDATOR: "Invalid validator",
  TOO_MANY_VALIDATORS: "Too many validators",
  NOT_VALIDATOR: "Account is not a validator",
  ALREADY_VALIDATOR: "Account is already a validator",
  REWARD_CALCULATION_ERROR: "Error calculating rewards",
  UNSTAKING_PERIOD_NOT_MET: "Unstaking period not met",
};

/**
 * Structured error from the staking pallet.
 * Returned inside a Result, never thrown for expected failures.
 */
export class StakingError extends Error {
  public readonly code: StakingErrorCode;

  constructor(code: StakingErrorCode, message: string = MESSAGES[code]) {
    super(message);
    this.name = "StakingError";
    this.code = code;
  }
}
