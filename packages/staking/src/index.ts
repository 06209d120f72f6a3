/**
 * @minichain/staking — Validators, nominator stakes and block rewards.
 */

export { StakingPallet, STAKING_PALLET, defaultStakingParams } from "./pallet.js";
export type { StakingDispatch } from "./pallet.js";
export { StakingError, REWARD_RATE_SCALE, MAX_COMMISSION } from "./types.js";
export type {
  StakingErrorCode,
  StakingParams,
  StakeInfo,
  ValidatorInfo,
  StakingStats,
  RewardPayout,
  BalanceCheck,
  CreditCheck,
  StakingEvent,
  StakingCall,
  StakingEffect,
} from "./types.js";
