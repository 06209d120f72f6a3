/**
 * @minichain/balances — Fungible token ledger with a flat transfer fee.
 *
 * API surface:
 * - balance() / setBalance() — Read and issue balances
 * - setTransactionFee() / getTransactionFee() / setFeeRecipient() — Fee policy
 * - getTransferCost() — Amount plus fee
 * - transfer() — Checked transfer that pays the fee
 * - withdraw() / deposit() — Checked single-account debit and credit
 * - accounts() / totalIssuance() — Ledger views
 * - dispatch() — Execute a BalancesCall on behalf of a signed caller
 */

import { SortedMap, dispatchError, err, ok } from "@minichain/support";
import type { BalancesConfig, BalancesTypes, Dispatch, DispatchResult, Result } from "@minichain/support";
import { BalancesError } from "./types.js";
import type { AccountBalance, BalancesCall, FeeConfig } from "./types.js";

export const BALANCES_PALLET = "balances";

export class BalancesPallet<T extends BalancesTypes>
  implements Dispatch<T["AccountId"], BalancesCall<T>, void, typeof BALANCES_PALLET, BalancesError>
{
  private readonly config: BalancesConfig<T>;
  private readonly _balances: SortedMap<T["AccountId"], T["Balance"]>;
  private _baseFee: T["Balance"];
  private _feeRecipient: T["AccountId"] | undefined;

  constructor(config: BalancesConfig<T>) {
    this.config = config;
    this._balances = new SortedMap((a, b) => config.accountId.compare(a, b));
    this._baseFee = config.balance.zero;
    this._feeRecipient = undefined;
  }

  static withFeeConfig<T extends BalancesTypes>(
    config: BalancesConfig<T>,
    baseFee: T["Balance"],
    recipient: T["AccountId"] | undefined,
  ): BalancesPallet<T> {
    const pallet = new BalancesPallet(config);
    pallet.setTransactionFee(baseFee);
    pallet.setFeeRecipient(recipient);
    return pallet;
  }

  // ─── Balances ────────────────────────────────────────────────────────

  balance(who: T["AccountId"]): T["Balance"] {
    return this._balances.get(who) ?? this.config.balance.zero;
  }

  /** Overwrite an account's balance. Issuance only, not a transfer. */
  setBalance(who: T["AccountId"], amount: T["Balance"]): void {
    this._balances.set(who, amount);
  }

  // ─── Fee Configuration ───────────────────────────────────────────────

  setTransactionFee(fee: T["Balance"]): void {
    this._baseFee = fee;
  }

  getTransactionFee(): T["Balance"] {
    return this._baseFee;
  }

  setFeeRecipient(recipient: T["AccountId"] | undefined): void {
    this._feeRecipient = recipient;
  }

  getFeeRecipient(): T["AccountId"] | undefined {
    return this._feeRecipient;
  }

  getFeeConfig(): FeeConfig<T> {
    return { baseFee: this._baseFee, recipient: this._feeRecipient };
  }

  /** Flat fee: every transfer pays the base fee regardless of amount. */
  private calculateFee(_amount: T["Balance"]): T["Balance"] {
    return this._baseFee;
  }

  getTransferCost(amount: T["Balance"]): Result<T["Balance"], BalancesError> {
    const total = this.config.balance.checkedAdd(amount, this.calculateFee(amount));
    return total === undefined ? err(new BalancesError("OVERFLOW_IN_CALCULATION")) : ok(total);
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  /**
   * Move `amount` from sender to receiver and charge the fee to the sender.
   *
   * Every step is evaluated against a staged view of the ledger; nothing
   * is written unless all steps succeed.
   */
  transfer(
    sender: T["AccountId"],
    receiver: T["AccountId"],
    amount: T["Balance"],
  ): Result<void, BalancesError> {
    const { balance } = this.config;

    if (!balance.isValid(amount)) {
      return err(new BalancesError("INVALID_AMOUNT", `Invalid amount specified: ${String(amount)}`));
    }

    const fee = this.calculateFee(amount);
    const totalNeeded = balance.checkedAdd(amount, fee);
    if (totalNeeded === undefined) {
      return err(new BalancesError("OVERFLOW_IN_CALCULATION"));
    }

    if (balance.compare(this.balance(sender), totalNeeded) < 0) {
      return err(new BalancesError("INSUFFICIENT_BALANCE"));
    }

    const staged = new Map<T["AccountId"], T["Balance"]>();
    const read = (who: T["AccountId"]): T["Balance"] => staged.get(who) ?? this.balance(who);

    const senderAfter = balance.checkedSub(read(sender), amount);
    if (senderAfter === undefined) {
      return err(new BalancesError("INSUFFICIENT_FUNDS"));
    }
    staged.set(sender, senderAfter);

    const receiverAfter = balance.checkedAdd(read(receiver), amount);
    if (receiverAfter === undefined) {
      return err(new BalancesError("OVERFLOW_IN_TRANSFER"));
    }
    staged.set(receiver, receiverAfter);

    const payerAfter = balance.checkedSub(read(sender), fee);
    if (payerAfter === undefined) {
      return err(new BalancesError("INSUFFICIENT_FUNDS"));
    }
    staged.set(sender, payerAfter);

    if (this._feeRecipient !== undefined) {
      const recipientAfter = balance.checkedAdd(read(this._feeRecipient), fee);
      if (recipientAfter === undefined) {
        return err(new BalancesError("OVERFLOW_IN_CALCULATION"));
      }
      staged.set(this._feeRecipient, recipientAfter);
    }

    for (const [who, value] of staged) {
      this._balances.set(who, value);
    }
    return ok();
  }

  /** Debit a single account. */
  withdraw(who: T["AccountId"], amount: T["Balance"]): Result<T["Balance"], BalancesError> {
    const { balance } = this.config;
    if (!balance.isValid(amount)) {
      return err(new BalancesError("INVALID_AMOUNT", `Invalid amount specified: ${String(amount)}`));
    }
    const next = balance.checkedSub(this.balance(who), amount);
    if (next === undefined) {
      return err(new BalancesError("INSUFFICIENT_BALANCE"));
    }
    this._balances.set(who, next);
    return ok(next);
  }

  /** Credit a single account. */
  deposit(who: T["AccountId"], amount: T["Balance"]): Result<T["Balance"], BalancesError> {
    const { balance } = this.config;
    if (!balance.isValid(amount)) {
      return err(new BalancesError("INVALID_AMOUNT", `Invalid amount specified: ${String(amount)}`));
    }
    const next = balance.checkedAdd(this.balance(who), amount);
    if (next === undefined) {
      return err(new BalancesError("OVERFLOW_IN_TRANSFER"));
    }
    this._balances.set(who, next);
    return ok(next);
  }

  // ─── Views ───────────────────────────────────────────────────────────

  /** Every stored balance, in account order. */
  accounts(): readonly AccountBalance<T>[] {
    return this._balances.entries().map(([accountId, balance]) => ({ accountId, balance }));
  }

  /** Sum of all balances, as an unbounded integer. */
  totalIssuance(): bigint {
    let total = 0n;
    for (const value of this._balances.values()) {
      total += this.config.balance.toBigInt(value);
    }
    return total;
  }

  // ─── Dispatch ────────────────────────────────────────────────────────

  dispatch(
    caller: T["AccountId"],
    call: BalancesCall<T>,
  ): DispatchResult<void, typeof BALANCES_PALLET, BalancesError> {
    switch (call.type) {
      case "transfer": {
        const result = this.transfer(caller, call.to, call.amount);
        if (!result.ok) {
          return err(dispatchError(BALANCES_PALLET, "Transfer failed", result.error));
        }
        return ok();
      }
    }
  }
}
