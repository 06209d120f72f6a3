/**
 * Tests for the balances pallet.
 *
 * Covers:
 * - Issuance and reads
 * - Transfers with and without a fee recipient
 * - Error ordering and all-or-nothing writes
 * - Single-account withdraw/deposit
 * - Dispatch
 */

import { describe, it, expect, beforeEach } from "vitest";
import { stringAccountId, u32, u128, unsignedBigInt } from "@minichain/support";
import type { BalancesConfig } from "@minichain/support";
import { BalancesPallet } from "../src/pallet.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

interface TestTypes {
  readonly AccountId: string;
  readonly BlockNumber: number;
  readonly Nonce: number;
  readonly Balance: bigint;
}

const config: BalancesConfig<TestTypes> = {
  accountId: stringAccountId,
  blockNumber: u32,
  nonce: u32,
  balance: u128,
};

/** Balances capped at 255 to reach overflow paths. */
const tinyConfig: BalancesConfig<TestTypes> = { ...config, balance: unsignedBigInt(8) };

let balances: BalancesPallet<TestTypes>;

beforeEach(() => {
  balances = new BalancesPallet(config);
});

// ─── Reads & Issuance ────────────────────────────────────────────────────

describe("balances", () => {
  it("reads zero for unknown accounts", () => {
    expect(balances.balance("alice")).toBe(0n);
  });

  it("overwrites balances on setBalance", () => {
    balances.setBalance("alice", 100n);
    balances.setBalance("alice", 40n);
    expect(balances.balance("alice")).toBe(40n);
  });

  it("lists accounts in account order and sums issuance", () => {
    balances.setBalance("carol", 3n);
    balances.setBalance("alice", 1n);
    balances.setBalance("bob", 2n);

    expect(balances.accounts()).toEqual([
      { accountId: "alice", balance: 1n },
      { accountId: "bob", balance: 2n },
      { accountId: "carol", balance: 3n },
    ]);
    expect(balances.totalIssuance()).toBe(6n);
  });
});

// ─── Fee Configuration ───────────────────────────────────────────────────

describe("fee configuration", () => {
  it("defaults to no fee and no recipient", () => {
    expect(balances.getFeeConfig()).toEqual({ baseFee: 0n, recipient: undefined });
  });

  it("builds a pallet with a fee and recipient", () => {
    const withFee = BalancesPallet.withFeeConfig(config, 5n, "treasury");
    expect(withFee.getTransactionFee()).toBe(5n);
    expect(withFee.getFeeRecipient()).toBe("treasury");
  });

  it("computes the transfer cost", () => {
    balances.setTransactionFee(5n);
    expect(balances.getTransferCost(30n)).toEqual({ ok: true, value: 35n });
  });

  it("reports overflow in the transfer cost", () => {
    const tiny = BalancesPallet.withFeeConfig(tinyConfig, 10n, undefined);
    const cost = tiny.getTransferCost(250n);
    expect(cost.ok).toBe(false);
    if (!cost.ok) expect(cost.error.code).toBe("OVERFLOW_IN_CALCULATION");
  });
});

// ─── Transfers ───────────────────────────────────────────────────────────

describe("transfer", () => {
  it("fails with insufficient balance on an empty account", () => {
    const result = balances.transfer("alice", "bob", 51n);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("INSUFFICIENT_BALANCE");
      expect(result.error.message).toBe("Insufficient balance");
    }
    expect(balances.balance("alice")).toBe(0n);
    expect(balances.balance("bob")).toBe(0n);
  });

  it("moves funds without a fee", () => {
    balances.setBalance("alice", 100n);

    expect(balances.transfer("alice", "bob", 51n)).toEqual({ ok: true, value: undefined });
    expect(balances.balance("alice")).toBe(49n);
    expect(balances.balance("bob")).toBe(51n);
  });

  it("pays the fee to the recipient", () => {
    const pallet = BalancesPallet.withFeeConfig(config, 5n, "treasury");
    pallet.setBalance("treasury", 10n);
    pallet.setBalance("alice", 100n);

    expect(pallet.transfer("alice", "bob", 30n).ok).toBe(true);
    expect(pallet.balance("alice")).toBe(65n);
    expect(pallet.balance("bob")).toBe(30n);
    expect(pallet.balance("treasury")).toBe(15n);
  });

  it("burns the fee when no recipient is configured", () => {
    balances.setTransactionFee(5n);
    balances.setBalance("alice", 100n);

    expect(balances.transfer("alice", "bob", 30n).ok).toBe(true);
    expect(balances.balance("alice")).toBe(65n);
    expect(balances.totalIssuance()).toBe(95n);
  });

  it("accepts a transfer that spends the whole balance", () => {
    balances.setTransactionFee(5n);
    balances.setBalance("alice", 35n);

    expect(balances.transfer("alice", "bob", 30n).ok).toBe(true);
    expect(balances.balance("alice")).toBe(0n);
  });

  it("rejects a transfer that cannot also cover the fee", () => {
    balances.setTransactionFee(5n);
    balances.setBalance("alice", 34n);

    const result = balances.transfer("alice", "bob", 30n);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("INSUFFICIENT_BALANCE");
    expect(balances.balance("alice")).toBe(34n);
  });

  it("rejects amounts outside the balance type", () => {
    balances.setBalance("alice", 100n);

    const result = balances.transfer("alice", "bob", -1n);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("INVALID_AMOUNT");
      expect(result.error.message).toBe("Invalid amount specified: -1");
    }
  });

  it("reports overflow of amount plus fee before anything else", () => {
    const tiny = BalancesPallet.withFeeConfig(tinyConfig, 10n, undefined);
    tiny.setBalance("alice", 255n);

    const result = tiny.transfer("alice", "bob", 250n);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("OVERFLOW_IN_CALCULATION");
  });

  it("leaves the ledger untouched when the receiver would overflow", () => {
    const tiny = new BalancesPallet(tinyConfig);
    tiny.setBalance("alice", 100n);
    tiny.setBalance("bob", 200n);

    const result = tiny.transfer("alice", "bob", 60n);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("OVERFLOW_IN_TRANSFER");
    expect(tiny.balance("alice")).toBe(100n);
    expect(tiny.balance("bob")).toBe(200n);
  });

  it("leaves the ledger untouched when the fee recipient would overflow", () => {
    const tiny = BalancesPallet.withFeeConfig(tinyConfig, 10n, "treasury");
    tiny.setBalance("treasury", 250n);
    tiny.setBalance("alice", 100n);

    const result = tiny.transfer("alice", "bob", 20n);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("OVERFLOW_IN_CALCULATION");
    expect(tiny.balance("alice")).toBe(100n);
    expect(tiny.balance("bob")).toBe(0n);
    expect(tiny.balance("treasury")).toBe(250n);
  });

  it("conserves value on a self-transfer", () => {
    const pallet = BalancesPallet.withFeeConfig(config, 5n, "treasury");
    pallet.setBalance("alice", 100n);

    expect(pallet.transfer("alice", "alice", 30n).ok).toBe(true);
    expect(pallet.balance("alice")).toBe(95n);
    expect(pallet.balance("treasury")).toBe(5n);
  });

  it("returns the fee when the sender is the fee recipient", () => {
    const pallet = BalancesPallet.withFeeConfig(config, 5n, "alice");
    pallet.setBalance("alice", 100n);

    expect(pallet.transfer("alice", "bob", 30n).ok).toBe(true);
    expect(pallet.balance("alice")).toBe(70n);
    expect(pallet.balance("bob")).toBe(30n);
  });
});

// ─── Withdraw & Deposit ──────────────────────────────────────────────────

describe("withdraw / deposit", () => {
  it("debits and credits a single account", () => {
    balances.setBalance("alice", 100n);

    expect(balances.withdraw("alice", 40n)).toEqual({ ok: true, value: 60n });
    expect(balances.deposit("alice", 15n)).toEqual({ ok: true, value: 75n });
    expect(balances.balance("alice")).toBe(75n);
  });

  it("refuses to withdraw more than the balance", () => {
    balances.setBalance("alice", 10n);

    const result = balances.withdraw("alice", 11n);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("INSUFFICIENT_BALANCE");
    expect(balances.balance("alice")).toBe(10n);
  });

  it("refuses deposits that overflow", () => {
    const tiny = new BalancesPallet(tinyConfig);
    tiny.setBalance("alice", 250n);

    const result = tiny.deposit("alice", 6n);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("OVERFLOW_IN_TRANSFER");
  });
});

// ─── Dispatch ────────────────────────────────────────────────────────────

describe("dispatch", () => {
  it("executes transfer calls for the caller", () => {
    balances.setBalance("alice", 100n);

    const result = balances.dispatch("alice", { type: "transfer", to: "bob", amount: 25n });
    expect(result.ok).toBe(true);
    expect(balances.balance("bob")).toBe(25n);
  });

  it("keeps the typed error behind a static reason", () => {
    const result = balances.dispatch("alice", { type: "transfer", to: "bob", amount: 25n });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.pallet).toBe("balances");
      expect(result.error.reason).toBe("Transfer failed");
      expect(result.error.error.code).toBe("INSUFFICIENT_BALANCE");
    }
  });
});
