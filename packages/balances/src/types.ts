/**
 * @minichain/balances — Types for the token ledger.
 *
 * Rules:
 * - An absent account has a zero balance
 * - Transfers pay a flat fee on top of the transferred amount
 * - Fees move to the fee recipient when one is configured, otherwise
 *   they leave circulation
 */

import type { BalancesTypes } from "@minichain/support";

// ─── Error Types ─────────────────────────────────────────────────────────

export type BalancesErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_FUNDS"
  | "OVERFLOW_IN_CALCULATION"
  | "OVERFLOW_IN_TRANSFER"
  | "INVALID_AMOUNT";

const MESSAGES: Readonly<Record<BalancesErrorCode, string>> = {
  INSUFFICIENT_BALANCE: "Insufficient balance",
  INSUFFICIENT_FUNDS: "Insufficient funds to pay fees",
  OVERFLOW_IN_CALCULATION: "Overflow in calculating transfer costs",
  OVERFLOW_IN_TRANSFER: "Overflow in transfer calculation",
  INVALID_AMOUNT: "Invalid amount specified",
};

/**
 * Structured error from the balances pallet.
 * Returned inside a Result, never thrown for expected failures.
 */
export class BalancesError extends Error {
  public readonly code: BalancesErrorCode;

  constructor(code: BalancesErrorCode, message: string = MESSAGES[code]) {
    super(message);
    this.name = "BalancesError";
    this.code = code;
  }
}

// ─── Calls ───────────────────────────────────────────────────────────────

/** Calls a signed account can make against the balances pallet. */
export type BalancesCall<T extends BalancesTypes> = {
  readonly type: "transfer";
  readonly to: T["AccountId"];
  readonly amount: T["Balance"];
};

// ─── Views ───────────────────────────────────────────────────────────────

export interface AccountBalance<T extends BalancesTypes> {
  readonly accountId: T["AccountId"];
  readonly balance: T["Balance"];
}

export interface FeeConfig<T extends BalancesTypes> {
  readonly baseFee: T["Balance"];
  readonly recipient: T["AccountId"] | undefined;
}
