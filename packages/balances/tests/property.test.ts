/**
 * Property-Based Tests for @minichain/balances
 *
 * 1. With a fee recipient, transfers never change the total issuance
 * 2. Without one, the total drops by exactly one fee per successful transfer
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { stringAccountId, u32, u128 } from "@minichain/support";
import type { BalancesConfig } from "@minichain/support";
import { BalancesPallet } from "../src/pallet.js";

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

// =============================================================================
// Arbitraries
// =============================================================================

const accounts = ["alice", "bob", "carol", "treasury"] as const;

const arbAccount = fc.constantFrom(...accounts);

const arbBalances = fc.array(fc.bigInt({ min: 0n, max: 1_000n }), {
  minLength: accounts.length,
  maxLength: accounts.length,
});

const arbTransfer = fc.record({
  from: arbAccount,
  to: arbAccount,
  amount: fc.bigInt({ min: 0n, max: 500n }),
});

const arbFee = fc.bigInt({ min: 0n, max: 20n });

function seed(pallet: BalancesPallet<TestTypes>, initial: readonly bigint[]): void {
  accounts.forEach((who, i) => {
    pallet.setBalance(who, initial[i] ?? 0n);
  });
}

// =============================================================================
// Conservation
// =============================================================================

describe("conservation", () => {
  it("keeps the total constant when fees go to a recipient", () => {
    fc.assert(
      fc.property(arbBalances, arbFee, fc.array(arbTransfer, { maxLength: 30 }), (initial, fee, transfers) => {
        const pallet = BalancesPallet.withFeeConfig(config, fee, "treasury");
        seed(pallet, initial);
        const before = pallet.totalIssuance();

        for (const t of transfers) {
          pallet.transfer(t.from, t.to, t.amount);
        }

        expect(pallet.totalIssuance()).toBe(before);
      }),
      { numRuns: 200 },
    );
  });

  it("removes exactly the collected fees when there is no recipient", () => {
    fc.assert(
      fc.property(arbBalances, arbFee, fc.array(arbTransfer, { maxLength: 30 }), (initial, fee, transfers) => {
        const pallet = BalancesPallet.withFeeConfig(config, fee, undefined);
        seed(pallet, initial);
        const before = pallet.totalIssuance();

        let succeeded = 0n;
        for (const t of transfers) {
          if (pallet.transfer(t.from, t.to, t.amount).ok) succeeded += 1n;
        }

        expect(pallet.totalIssuance()).toBe(before - fee * succeeded);
      }),
      { numRuns: 200 },
    );
  });

  it("never leaves a negative balance", () => {
    fc.assert(
      fc.property(arbBalances, arbFee, fc.array(arbTransfer, { maxLength: 30 }), (initial, fee, transfers) => {
        const pallet = BalancesPallet.withFeeConfig(config, fee, "treasury");
        seed(pallet, initial);

        for (const t of transfers) {
          pallet.transfer(t.from, t.to, t.amount);
        }

        for (const { balance } of pallet.accounts()) {
          expect(balance >= 0n).toBe(true);
        }
      }),
      { numRuns: 100 },
    );
  });
});
