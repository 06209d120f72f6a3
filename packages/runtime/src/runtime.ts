/**
 * @minichain/runtime — Runtime composition.
 *
 * Owns one system, balances and staking pallet built from the shared
 * `runtimeConfig`, routes calls to the pallet that owns them, and executes
 * blocks.
 *
 * Block execution is fail-soft: a failed extrinsic is recorded and logged,
 * its nonce increment stays, and the remaining extrinsics still run.
 *
 * The staking pallet only tracks locked funds. After each successful
 * staking call the runtime applies the returned effect to balances:
 * a stake debits the staker, an unstake or reward claim credits them.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import { describeDispatchError, dispatchError, err, ok } from "@minichain/support";
import type { Dispatch, Result } from "@minichain/support";
import { SystemPallet, toHex } from "@minichain/system";
import type { ChainIntegrityReport } from "@minichain/system";
import { BalancesError, BalancesPallet } from "@minichain/balances";
import { StakingPallet } from "@minichain/staking";
import type {
  RewardPayout,
  StakingEffect,
  StakingError,
  StakingParams,
} from "@minichain/staking";
import { RuntimeError } from "./errors.js";
import { runtimeConfig } from "./types.js";
import type {
  AccountId,
  AccountSummary,
  Balance,
  BlockNumber,
  BlockResult,
  FailedItem,
  GenesisConfig,
  RuntimeBlock,
  RuntimeCall,
  RuntimeDispatchError,
  RuntimeExtrinsic,
  RuntimePallet,
  RuntimeTypes,
  StateSummary,
  Transaction,
} from "./types.js";

// =============================================================================
// Options
// =============================================================================

export interface RuntimeOptions {
  /** Defaults to a silent logger. */
  readonly logger?: Logger;
  readonly baseFee?: Balance;
  readonly feeRecipient?: AccountId;
  readonly staking?: Partial<StakingParams<RuntimeTypes>>;
}

type SignedTransaction = Exclude<Transaction, { readonly type: "setBalance" }>;

/**
 * Map a signed transaction to the extrinsic its signer submits.
 */
export function transactionToExtrinsic(tx: SignedTransaction): RuntimeExtrinsic {
  switch (tx.type) {
    case "transfer":
      return {
        caller: tx.from,
        call: { pallet: "balances", call: { type: "transfer", to: tx.to, amount: tx.amount } },
      };
    case "addValidator":
      return {
        caller: tx.validator,
        call: { pallet: "staking", call: { type: "addValidator", commission: tx.commission } },
      };
    case "stake":
      return {
        caller: tx.who,
        call: {
          pallet: "staking",
          call: { type: "stake", amount: tx.amount, validator: tx.validator },
        },
      };
    case "unstake":
      return { caller: tx.who, call: { pallet: "staking", call: { type: "unstake" } } };
    case "claimRewards":
      return { caller: tx.who, call: { pallet: "staking", call: { type: "claimRewards" } } };
  }
}

// =============================================================================
// Runtime
// =============================================================================

export class Runtime
  implements Dispatch<AccountId, RuntimeCall, void, RuntimePallet, BalancesError | StakingError>
{
  readonly system: SystemPallet<RuntimeTypes>;
  readonly balances: BalancesPallet<RuntimeTypes>;
  readonly staking: StakingPallet<RuntimeTypes>;
  private readonly logger: Logger;

  constructor(options: RuntimeOptions = {}) {
    this.system = new SystemPallet(runtimeConfig);
    this.balances = BalancesPallet.withFeeConfig(
      runtimeConfig,
      options.baseFee ?? runtimeConfig.balance.zero,
      options.feeRecipient,
    );
    this.staking = new StakingPallet(runtimeConfig, options.staking);
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  blockNumber(): BlockNumber {
    return this.system.blockNumber();
  }

  // ─── Dispatch ──────────────────────────────────────────────────────────

  /**
   * Route a call to its pallet. Pallet errors are returned unchanged.
   * Does not touch the caller's nonce.
   */
  dispatch(caller: AccountId, call: RuntimeCall): Result<void, RuntimeDispatchError> {
    switch (call.pallet) {
      case "balances":
        return this.balances.dispatch(caller, call.call);
      case "staking": {
        const result = this.staking
          .dispatcher((who) => this.balances.balance(who), this.canCredit)
          .dispatch(caller, call.call);
        if (!result.ok) return result;
        return this.settle(result.value);
      }
    }
  }

  /** Staking commits an unstake or reward only if this credit would succeed. */
  private readonly canCredit = (who: AccountId, amount: Balance): boolean =>
    runtimeConfig.balance.checkedAdd(this.balances.balance(who), amount) !== undefined;

  private settle(effect: StakingEffect<RuntimeTypes>): Result<void, RuntimeDispatchError> {
    switch (effect.type) {
      case "none":
        return ok();
      case "lock":
        return this.settleWith(this.balances.withdraw(effect.who, effect.amount));
      case "unlock":
      case "reward":
        return this.settleWith(this.balances.deposit(effect.who, effect.amount));
    }
  }

  private settleWith(result: Result<Balance, BalancesError>): Result<void, RuntimeDispatchError> {
    return result.ok ? ok() : err(dispatchError("balances", "Staking settlement failed", result.error));
  }

  // ─── Blocks ────────────────────────────────────────────────────────────

  /**
   * Execute a block built by someone else.
   *
   * The header must carry the next block number; otherwise nothing is
   * changed.
   */
  executeBlock(block: RuntimeBlock): Result<BlockResult<RuntimeExtrinsic>, RuntimeError> {
    const { blockNumber } = runtimeConfig;
    const expected = blockNumber.checkedAdd(this.system.blockNumber(), blockNumber.one);

    if (expected === undefined || block.header.blockNumber !== expected) {
      this.logger.warn(
        { expected, received: block.header.blockNumber },
        "Rejected block with unexpected number",
      );
      return err(
        new RuntimeError("BLOCK_NUMBER_MISMATCH", "block number does not match what is expected"),
      );
    }

    return ok(
      this.sealBlock(block.extrinsics, (extrinsic) => {
        this.system.incNonce(extrinsic.caller);
        return this.dispatch(extrinsic.caller, extrinsic.call);
      }),
    );
  }

  /**
   * Build and execute the next block from a list of transactions.
   */
  createBlock(transactions: readonly Transaction[]): BlockResult<Transaction> {
    return this.sealBlock(transactions, (tx) => this.executeTransaction(tx));
  }

  private executeTransaction(tx: Transaction): Result<void, RuntimeDispatchError> {
    if (tx.type === "setBalance") {
      if (!runtimeConfig.balance.isValid(tx.amount)) {
        return err(
          dispatchError(
            "balances",
            "Set balance failed",
            new BalancesError("INVALID_AMOUNT", `Invalid amount specified: ${String(tx.amount)}`),
          ),
        );
      }
      this.balances.setBalance(tx.who, tx.amount);
      return ok();
    }

    const { caller, call } = transactionToExtrinsic(tx);
    this.system.incNonce(caller);
    return this.dispatch(caller, call);
  }

  private sealBlock<I>(
    items: readonly I[],
    execute: (item: I) => Result<void, RuntimeDispatchError>,
  ): BlockResult<I> {
    this.system.incBlockNumber();
    const blockNumber = this.system.blockNumber();
    const log = this.logger.child({ blockNumber });
    log.debug({ transactionCount: items.length }, "Block started");

    let successful = 0;
    const failed: FailedItem<I>[] = [];
    for (const [index, item] of items.entries()) {
      const result = execute(item);
      if (result.ok) {
        successful += 1;
      } else {
        failed.push({ item, error: result.error });
        log.warn(
          { index, pallet: result.error.pallet, code: result.error.error.code },
          describeDispatchError(result.error),
        );
      }
    }

    const blockHash = this.system.finalizeBlock();
    const payouts = this.payRewards(blockNumber, log);
    const events = this.staking.drainEvents();

    log.info(
      { hash: toHex(blockHash), successful, failed: failed.length, payouts: payouts.length },
      "Block finalized",
    );

    return {
      blockNumber,
      blockHash,
      successful,
      failed,
      transactionCount: items.length,
      events,
      payouts,
    };
  }

  /** Run the staking block hook and credit every payout. */
  private payRewards(blockNumber: BlockNumber, log: Logger): RewardPayout<RuntimeTypes>[] {
    const credited: RewardPayout<RuntimeTypes>[] = [];
    for (const payout of this.staking.onBlock(blockNumber, this.canCredit)) {
      const result = this.balances.deposit(payout.who, payout.amount);
      if (result.ok) {
        credited.push(payout);
      } else {
        log.error({ who: payout.who, code: result.error.code }, "Reward could not be credited");
      }
    }
    return credited;
  }

  // ─── Genesis ───────────────────────────────────────────────────────────

  /**
   * Issue initial balances, register initial validators and seal block 0.
   * Applies nothing unless every entry is accepted.
   */
  applyGenesis(genesis: GenesisConfig): Result<Uint8Array, RuntimeError> {
    const { balance, blockNumber } = runtimeConfig;

    if (
      blockNumber.compare(this.system.blockNumber(), blockNumber.zero) !== 0 ||
      this.system.genesisHash() !== undefined
    ) {
      return err(
        new RuntimeError("GENESIS_ALREADY_APPLIED", "genesis can only be applied once, before block 1"),
      );
    }

    const balances = genesis.balances ?? [];
    for (const entry of balances) {
      if (!balance.isValid(entry.amount)) {
        return err(
          new RuntimeError("INVALID_GENESIS", `Invalid genesis balance for ${entry.who}: ${String(entry.amount)}`),
        );
      }
    }

    const added: AccountId[] = [];
    for (const entry of genesis.validators ?? []) {
      const result = this.staking.addValidator(entry.validator, entry.commission);
      if (!result.ok) {
        for (const validator of added) {
          this.staking.removeValidator(validator);
        }
        this.staking.clearEvents();
        return err(
          new RuntimeError("INVALID_GENESIS", `Validator ${entry.validator}: ${result.error.message}`),
        );
      }
      added.push(entry.validator);
    }

    for (const entry of balances) {
      this.balances.setBalance(entry.who, entry.amount);
    }
    this.staking.clearEvents();

    const hash = this.system.finalizeBlock();
    this.logger.info(
      { accounts: balances.length, validators: added.length, hash: toHex(hash) },
      "Genesis applied",
    );
    return ok(hash);
  }

  // ─── Views ─────────────────────────────────────────────────────────────

  verifyChainIntegrity(): ChainIntegrityReport<BlockNumber> {
    return this.system.verifyChainIntegrity();
  }

  /**
   * Every account known to balances or system, in account order.
   */
  stateSummary(): StateSummary {
    const ids = new Set<AccountId>();
    for (const { accountId } of this.balances.accounts()) ids.add(accountId);
    for (const accountId of this.system.nonces().keys()) ids.add(accountId);

    const accounts: AccountSummary[] = [...ids]
      .sort((a, b) => runtimeConfig.accountId.compare(a, b))
      .map((accountId) => ({
        accountId,
        balance: this.balances.balance(accountId),
        nonce: this.system.nonce(accountId),
      }));

    const genesisHash = this.system.genesisHash();
    return {
      blockNumber: this.system.blockNumber(),
      genesisHash: genesisHash === undefined ? undefined : toHex(genesisHash),
      totalIssuance: this.balances.totalIssuance(),
      totalStaked: this.staking.getTotalStaked(),
      accounts,
    };
  }
}
