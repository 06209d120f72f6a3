/**
 * @minichain/staking — Validators, nominator stakes and block rewards.
 *
 * API surface:
 * - addValidator() / removeValidator() / setValidatorActive() — Registry
 * - stake() / unstake() — Lock and release funds behind a validator
 * - calculateRewards() / claimRewards() — Commission-adjusted rewards
 * - slash() — Burn part of a stake
 * - onBlock() — Advance the clock and pay every staker
 * - getStakingStats() and accessors — Read-only views
 * - getEvents() / clearEvents() / drainEvents() — Event queue
 * - dispatcher() — Execute StakingCalls with caller-supplied balance oracles
 *
 * The pallet never holds a reference to the balances ledger. stake() reads
 * balances through the oracle passed with the call, unstake() and
 * claimRewards() ask a credit oracle before committing, and moving spendable
 * funds is left to the caller.
 *
 * Removed validators leave their nominators' stakes frozen: those stakes
 * earn nothing, can still be unstaked once unlocked, and are re-attached if
 * the same validator id registers again.
 */

import { SortedMap, dispatchError, err, ok } from "@minichain/support";
import type { BalancesConfig, BalancesTypes, Dispatch, DispatchResult, Result } from "@minichain/support";
import {
  MAX_COMMISSION,
  REWARD_RATE_SCALE,
  StakingError,
} from "./types.js";
import type {
  BalanceCheck,
  CreditCheck,
  RewardPayout,
  StakeInfo,
  StakingCall,
  StakingEffect,
  StakingEvent,
  StakingParams,
  StakingStats,
  ValidatorInfo,
} from "./types.js";

export const STAKING_PALLET = "staking";

export type StakingDispatch<T extends BalancesTypes> = Dispatch<
  T["AccountId"],
  StakingCall<T>,
  StakingEffect<T>,
  typeof STAKING_PALLET,
  StakingError
>;

/**
 * Default parameters: minimum stake 100, reward rate 5 per 1000 per block,
 * 10-block lock-up, 10 validators.
 */
export function defaultStakingParams<T extends BalancesTypes>(
  config: BalancesConfig<T>,
): StakingParams<T> {
  const minimumStake = config.balance.fromBigInt(100n);
  const rewardRate = config.balance.fromBigInt(5n);
  const unstakingPeriod = config.blockNumber.fromBigInt(10n);
  if (minimumStake === undefined || rewardRate === undefined || unstakingPeriod === undefined) {
    throw new RangeError(
      `Default staking parameters do not fit ${config.balance.name}/${config.blockNumber.name}`,
    );
  }
  return { minimumStake, rewardRate, unstakingPeriod, maxValidators: 10 };
}

const NO_EFFECT = { type: "none" } as const;

const ANY_CREDIT = (): boolean => true;

export class StakingPallet<T extends BalancesTypes> {
  private readonly config: BalancesConfig<T>;
  private readonly params: StakingParams<T>;
  private readonly _stakes: SortedMap<T["AccountId"], StakeInfo<T>>;
  private readonly _validators: SortedMap<T["AccountId"], ValidatorInfo<T>>;
  private _totalStaked: T["Balance"];
  private _currentBlock: T["BlockNumber"];
  private _events: StakingEvent<T>[] = [];

  constructor(config: BalancesConfig<T>, params?: Partial<StakingParams<T>>) {
    this.config = config;
    this.params = { ...defaultStakingParams(config), ...params };

    if (!Number.isInteger(this.params.maxValidators) || this.params.maxValidators < 0) {
      throw new RangeError(`maxValidators must be a non-negative integer, got ${String(this.params.maxValidators)}`);
    }
    if (!config.balance.isValid(this.params.minimumStake) || !config.balance.isValid(this.params.rewardRate)) {
      throw new RangeError(`minimumStake and rewardRate must be valid ${config.balance.name} values`);
    }
    if (!config.blockNumber.isValid(this.params.unstakingPeriod)) {
      throw new RangeError(`unstakingPeriod must be a valid ${config.blockNumber.name} value`);
    }

    const byAccount = (a: T["AccountId"], b: T["AccountId"]) => config.accountId.compare(a, b);
    this._stakes = new SortedMap(byAccount);
    this._validators = new SortedMap(byAccount);
    this._totalStaked = config.balance.zero;
    this._currentBlock = config.blockNumber.zero;
  }

  getParams(): StakingParams<T> {
    return this.params;
  }

  // ─── Clock ───────────────────────────────────────────────────────────

  currentBlock(): T["BlockNumber"] {
    return this._currentBlock;
  }

  /**
   * Block hook, called once per finalized block.
   * Pays every staker in account order; a staker whose reward cannot be
   * computed or credited is skipped without stopping the sweep, and keeps
   * accruing from its last paid block.
   */
  onBlock(blockNumber: T["BlockNumber"], canCredit: CreditCheck<T> = ANY_CREDIT): readonly RewardPayout<T>[] {
    this._currentBlock = blockNumber;

    const payouts: RewardPayout<T>[] = [];
    for (const who of this._stakes.keys()) {
      const result = this.claimRewards(who, canCredit);
      if (result.ok) {
        payouts.push({ who, amount: result.value });
      }
    }
    return payouts;
  }

  // ─── Validator Registry ──────────────────────────────────────────────

  addValidator(validator: T["AccountId"], commissionRate: number): Result<void, StakingError> {
    if (this._validators.has(validator)) {
      return err(new StakingError("ALREADY_VALIDATOR"));
    }
    if (this._validators.size >= this.params.maxValidators) {
      return err(new StakingError("TOO_MANY_VALIDATORS"));
    }
    if (!Number.isInteger(commissionRate) || commissionRate < 0 || commissionRate > MAX_COMMISSION) {
      return err(
        new StakingError("INVALID_VALIDATOR", `Invalid commission rate: ${String(commissionRate)}`),
      );
    }

    // Re-attach stakes frozen by an earlier removal of the same id.
    let totalStake = this.config.balance.zero;
    let nominatorsCount = 0;
    for (const info of this._stakes.values()) {
      if (this.config.accountId.compare(info.validator, validator) !== 0) continue;
      const next = this.config.balance.checkedAdd(totalStake, info.stakedAmount);
      if (next === undefined) {
        return err(new StakingError("REWARD_CALCULATION_ERROR"));
      }
      totalStake = next;
      nominatorsCount += 1;
    }

    this._validators.set(validator, {
      totalStake,
      commissionRate,
      isActive: true,
      nominatorsCount,
    });
    this._events.push({ type: "validatorAdded", validator });
    return ok();
  }

  removeValidator(validator: T["AccountId"]): Result<void, StakingError> {
    if (!this._validators.delete(validator)) {
      return err(new StakingError("NOT_VALIDATOR"));
    }
    this._events.push({ type: "validatorRemoved", validator });
    return ok();
  }

  setValidatorActive(validator: T["AccountId"], isActive: boolean): Result<void, StakingError> {
    const info = this._validators.get(validator);
    if (info === undefined) {
      return err(new StakingError("NOT_VALIDATOR"));
    }
    this._validators.set(validator, { ...info, isActive });
    return ok();
  }

  // ─── Staking ─────────────────────────────────────────────────────────

  /**
   * Lock `amount` behind `validator`.
   *
   * Only records the lock: debiting the staker's spendable balance is the
   * caller's job.
   */
  stake(
    who: T["AccountId"],
    amount: T["Balance"],
    validator: T["AccountId"],
    balanceCheck: BalanceCheck<T>,
  ): Result<void, StakingError> {
    const { balance } = this.config;

    if (!balance.isValid(amount)) {
      return err(new StakingError("INVALID_AMOUNT", `Invalid amount specified: ${String(amount)}`));
    }
    if (this._stakes.has(who)) {
      return err(new StakingError("ALREADY_STAKED"));
    }
    if (balance.compare(amount, this.params.minimumStake) < 0) {
      return err(new StakingError("MINIMUM_STAKE_NOT_MET"));
    }

    const validatorInfo = this._validators.get(validator);
    if (validatorInfo === undefined || !validatorInfo.isActive) {
      return err(new StakingError("INVALID_VALIDATOR"));
    }

    if (balance.compare(balanceCheck(who), amount) < 0) {
      return err(new StakingError("INSUFFICIENT_BALANCE"));
    }

    const validatorStake = balance.checkedAdd(validatorInfo.totalStake, amount);
    const totalStaked = balance.checkedAdd(this._totalStaked, amount);
    if (validatorStake === undefined || totalStaked === undefined) {
      return err(new StakingError("REWARD_CALCULATION_ERROR"));
    }

    this._stakes.set(who, {
      stakedAmount: amount,
      validator,
      stakeBlock: this._currentBlock,
      lastRewardBlock: this._currentBlock,
      totalRewards: balance.zero,
    });
    this._validators.set(validator, {
      ...validatorInfo,
      totalStake: validatorStake,
      nominatorsCount: validatorInfo.nominatorsCount + 1,
    });
    this._totalStaked = totalStaked;

    this._events.push({ type: "staked", who, amount, validator });
    return ok();
  }

  /**
   * Release a stake once its lock-up has elapsed.
   * Returns the freed amount; crediting it back is the caller's job, and
   * nothing is released unless `canCredit` accepts that credit.
   */
  unstake(who: T["AccountId"], canCredit: CreditCheck<T> = ANY_CREDIT): Result<T["Balance"], StakingError> {
    const { blockNumber } = this.config;

    const info = this._stakes.get(who);
    if (info === undefined) {
      return err(new StakingError("NOT_STAKED"));
    }

    const unlockBlock = blockNumber.checkedAdd(info.stakeBlock, this.params.unstakingPeriod);
    if (unlockBlock === undefined || blockNumber.compare(this._currentBlock, unlockBlock) < 0) {
      return err(new StakingError("UNSTAKING_PERIOD_NOT_MET"));
    }

    const released = this.releaseFromTotals(info, info.stakedAmount);
    if (!released.ok) return released;
    if (!canCredit(who, info.stakedAmount)) {
      return err(new StakingError("CREDIT_REJECTED"));
    }

    this._stakes.delete(who);
    this.commitRelease(info, released.value, true);

    this._events.push({ type: "unstaked", who, amount: info.stakedAmount });
    return ok(info.stakedAmount);
  }

  /**
   * Remove up to `amount` from a stake. The slashed funds are burned.
   * A stake slashed to zero is removed.
   */
  slash(who: T["AccountId"], amount: T["Balance"]): Result<T["Balance"], StakingError> {
    const { balance } = this.config;

    if (!balance.isValid(amount)) {
      return err(new StakingError("INVALID_AMOUNT", `Invalid amount specified: ${String(amount)}`));
    }

    const info = this._stakes.get(who);
    if (info === undefined) {
      return err(new StakingError("NOT_STAKED"));
    }

    const slashed = balance.compare(amount, info.stakedAmount) < 0 ? amount : info.stakedAmount;
    const remaining = balance.checkedSub(info.stakedAmount, slashed);
    if (remaining === undefined) {
      return err(new StakingError("REWARD_CALCULATION_ERROR"));
    }

    const released = this.releaseFromTotals(info, slashed);
    if (!released.ok) return released;

    const emptied = balance.compare(remaining, balance.zero) === 0;
    if (emptied) {
      this._stakes.delete(who);
    } else {
      this._stakes.set(who, { ...info, stakedAmount: remaining });
    }
    this.commitRelease(info, released.value, emptied);

    this._events.push({ type: "slashApplied", who, amount: slashed });
    return ok(slashed);
  }

  /**
   * Compute the totals left after taking `amount` of `info` out of the
   * validator and global counters, without writing anything.
   */
  private releaseFromTotals(
    info: StakeInfo<T>,
    amount: T["Balance"],
  ): Result<{ totalStaked: T["Balance"]; validatorStake: T["Balance"] | undefined }, StakingError> {
    const { balance } = this.config;

    const totalStaked = balance.checkedSub(this._totalStaked, amount);
    if (totalStaked === undefined) {
      return err(new StakingError("REWARD_CALCULATION_ERROR"));
    }

    const validatorInfo = this._validators.get(info.validator);
    if (validatorInfo === undefined) {
      return ok({ totalStaked, validatorStake: undefined });
    }

    const validatorStake = balance.checkedSub(validatorInfo.totalStake, amount);
    if (validatorStake === undefined) {
      return err(new StakingError("REWARD_CALCULATION_ERROR"));
    }
    return ok({ totalStaked, validatorStake });
  }

  private commitRelease(
    info: StakeInfo<T>,
    totals: { totalStaked: T["Balance"]; validatorStake: T["Balance"] | undefined },
    nominatorLeft: boolean,
  ): void {
    this._totalStaked = totals.totalStaked;

    const validatorInfo = this._validators.get(info.validator);
    if (validatorInfo === undefined || totals.validatorStake === undefined) return;

    this._validators.set(info.validator, {
      ...validatorInfo,
      totalStake: totals.validatorStake,
      nominatorsCount: nominatorLeft
        ? Math.max(0, validatorInfo.nominatorsCount - 1)
        : validatorInfo.nominatorsCount,
    });
  }

  // ─── Rewards ─────────────────────────────────────────────────────────

  /**
   * Reward accrued since the last claim:
   *
   *   base = staked × rewardRate × blocks / 1000
   *   net  = base − base × commission / 100
   */
  calculateRewards(who: T["AccountId"]): Result<T["Balance"], StakingError> {
    const { balance, blockNumber } = this.config;

    const info = this._stakes.get(who);
    if (info === undefined) {
      return err(new StakingError("NOT_STAKED"));
    }

    const validatorInfo = this._validators.get(info.validator);
    if (validatorInfo === undefined) {
      return err(new StakingError("INVALID_VALIDATOR"));
    }

    const elapsed = blockNumber.checkedSub(this._currentBlock, info.lastRewardBlock) ?? blockNumber.zero;
    const blocks = balance.fromBigInt(blockNumber.toBigInt(elapsed));
    const commissionRate = balance.fromBigInt(BigInt(validatorInfo.commissionRate));
    if (blocks === undefined || commissionRate === undefined) {
      return err(new StakingError("REWARD_CALCULATION_ERROR"));
    }

    const perBlock = balance.checkedMul(info.stakedAmount, this.params.rewardRate);
    const accrued = perBlock === undefined ? undefined : balance.checkedMul(perBlock, blocks);
    if (accrued === undefined) {
      return err(new StakingError("REWARD_CALCULATION_ERROR"));
    }
    const base = balance.fromBigInt(balance.toBigInt(accrued) / REWARD_RATE_SCALE);
    const scaledCommission = base === undefined ? undefined : balance.checkedMul(base, commissionRate);
    if (base === undefined || scaledCommission === undefined) {
      return err(new StakingError("REWARD_CALCULATION_ERROR"));
    }
    const commission = balance.toBigInt(scaledCommission) / BigInt(MAX_COMMISSION);

    const net = balance.fromBigInt(balance.toBigInt(base) - commission);
    if (net === undefined) {
      return err(new StakingError("REWARD_CALCULATION_ERROR"));
    }
    return ok(net);
  }

  /**
   * Settle the accrued reward and return it. Nothing is recorded unless
   * `canCredit` accepts the credit.
   */
  claimRewards(who: T["AccountId"], canCredit: CreditCheck<T> = ANY_CREDIT): Result<T["Balance"], StakingError> {
    const reward = this.calculateRewards(who);
    if (!reward.ok) return reward;

    const info = this._stakes.get(who);
    if (info === undefined) {
      return err(new StakingError("NOT_STAKED"));
    }

    const totalRewards = this.config.balance.checkedAdd(info.totalRewards, reward.value);
    if (totalRewards === undefined) {
      return err(new StakingError("REWARD_CALCULATION_ERROR"));
    }
    if (!canCredit(who, reward.value)) {
      return err(new StakingError("CREDIT_REJECTED"));
    }

    this._stakes.set(who, {
      ...info,
      lastRewardBlock: this._currentBlock,
      totalRewards,
    });
    this._events.push({ type: "rewardsPaid", who, amount: reward.value });
    return ok(reward.value);
  }

  // ─── Views ───────────────────────────────────────────────────────────

  getStakeInfo(who: T["AccountId"]): StakeInfo<T> | undefined {
    return this._stakes.get(who);
  }

  getValidatorInfo(validator: T["AccountId"]): ValidatorInfo<T> | undefined {
    return this._validators.get(validator);
  }

  /** Active validators in account order. */
  getActiveValidators(): readonly [T["AccountId"], ValidatorInfo<T>][] {
    return this._validators.entries().filter(([, info]) => info.isActive);
  }

  /** Every stake in account order. */
  getStakes(): readonly [T["AccountId"], StakeInfo<T>][] {
    return this._stakes.entries();
  }

  getTotalStaked(): T["Balance"] {
    return this._totalStaked;
  }

  isStaking(who: T["AccountId"]): boolean {
    return this._stakes.has(who);
  }

  isValidator(who: T["AccountId"]): boolean {
    return this._validators.has(who);
  }

  /** Aggregate view, recomputed from the stake and validator tables. */
  getStakingStats(): StakingStats<T> {
    const { balance } = this.config;

    let totalStaked = balance.zero;
    for (const info of this._stakes.values()) {
      totalStaked = balance.saturatingAdd(totalStaked, info.stakedAmount);
    }

    const totalStakers = this._stakes.size;
    const averageStake =
      totalStakers > 0
        ? balance.fromBigInt(balance.toBigInt(totalStaked) / BigInt(totalStakers)) ?? balance.zero
        : balance.zero;

    return {
      totalStaked,
      totalValidators: this._validators.size,
      activeValidators: this.getActiveValidators().length,
      totalStakers,
      averageStake,
    };
  }

  // ─── Events ──────────────────────────────────────────────────────────

  getEvents(): readonly StakingEvent<T>[] {
    return [...this._events];
  }

  clearEvents(): void {
    this._events = [];
  }

  /** Return every queued event and empty the queue. */
  drainEvents(): readonly StakingEvent<T>[] {
    const drained = this._events;
    this._events = [];
    return drained;
  }

  // ─── Dispatch ────────────────────────────────────────────────────────

  /**
   * Bind the balance oracles for the duration of one dispatch.
   */
  dispatcher(balanceCheck: BalanceCheck<T>, canCredit: CreditCheck<T> = ANY_CREDIT): StakingDispatch<T> {
    return {
      dispatch: (caller, call) => this.dispatchWith(caller, call, balanceCheck, canCredit),
    };
  }

  private dispatchWith(
    caller: T["AccountId"],
    call: StakingCall<T>,
    balanceCheck: BalanceCheck<T>,
    canCredit: CreditCheck<T>,
  ): DispatchResult<StakingEffect<T>, typeof STAKING_PALLET, StakingError> {
    const fail = (reason: string, error: StakingError) =>
      err(dispatchError(STAKING_PALLET, reason, error));

    switch (call.type) {
      case "addValidator": {
        const result = this.addValidator(caller, call.commission);
        return result.ok ? ok<StakingEffect<T>>(NO_EFFECT) : fail("Add validator failed", result.error);
      }
      case "removeValidator": {
        const result = this.removeValidator(caller);
        return result.ok ? ok<StakingEffect<T>>(NO_EFFECT) : fail("Remove validator failed", result.error);
      }
      case "stake": {
        const result = this.stake(caller, call.amount, call.validator, balanceCheck);
        return result.ok
          ? ok<StakingEffect<T>>({ type: "lock", who: caller, amount: call.amount })
          : fail("Stake failed", result.error);
      }
      case "unstake": {
        const result = this.unstake(caller, canCredit);
        return result.ok
          ? ok<StakingEffect<T>>({ type: "unlock", who: caller, amount: result.value })
          : fail("Unstake failed", result.error);
      }
      case "claimRewards": {
        const result = this.claimRewards(caller, canCredit);
        return result.ok
          ? ok<StakingEffect<T>>({ type: "reward", who: caller, amount: result.value })
          : fail("Claim rewards failed", result.error);
      }
    }
  }
}
