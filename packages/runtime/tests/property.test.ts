/**
 * Property-Based Tests for @minichain/runtime
 *
 * 1. An account's nonce equals the number of extrinsics it submitted,
 *    whether or not they succeeded
 * 2. Block execution conserves issuance when fees go to a recipient
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { Runtime } from "../src/runtime.js";
import type { RuntimeExtrinsic } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbAccount = fc.constantFrom("alice", "bob", "carol");

const arbTransfer: fc.Arbitrary<RuntimeExtrinsic> = fc
  .record({ from: arbAccount, to: arbAccount, amount: fc.bigInt({ min: 0n, max: 400n }) })
  .map(({ from, to, amount }) => ({
    caller: from,
    call: { pallet: "balances" as const, call: { type: "transfer" as const, to, amount } },
  }));

const arbBlocks = fc.array(fc.array(arbTransfer, { maxLength: 8 }), { minLength: 1, maxLength: 6 });

// =============================================================================
// Properties
// =============================================================================

describe("nonce monotonicity", () => {
  it("counts every submitted extrinsic", () => {
    fc.assert(
      fc.property(arbBlocks, (blocks) => {
        const runtime = new Runtime({ baseFee: 3n });
        runtime.balances.setBalance("alice", 500n);

        const submitted = new Map<string, number>();
        blocks.forEach((extrinsics, i) => {
          const result = runtime.executeBlock({ header: { blockNumber: i + 1 }, extrinsics });
          expect(result.ok).toBe(true);
          for (const { caller } of extrinsics) {
            submitted.set(caller, (submitted.get(caller) ?? 0) + 1);
          }
        });

        for (const who of ["alice", "bob", "carol"]) {
          expect(runtime.system.nonce(who)).toBe(submitted.get(who) ?? 0);
        }
        expect(runtime.blockNumber()).toBe(blocks.length);
      }),
      { numRuns: 100 },
    );
  });
});

describe("conservation", () => {
  it("keeps issuance constant across blocks of transfers", () => {
    fc.assert(
      fc.property(arbBlocks, (blocks) => {
        const runtime = new Runtime({ baseFee: 3n, feeRecipient: "treasury" });
        runtime.balances.setBalance("alice", 500n);
        runtime.balances.setBalance("bob", 200n);

        blocks.forEach((extrinsics, i) => {
          runtime.executeBlock({ header: { blockNumber: i + 1 }, extrinsics });
        });

        expect(runtime.balances.totalIssuance()).toBe(700n);
      }),
      { numRuns: 100 },
    );
  });
});
