/**
 * @minichain/system — Block progression, account nonces, block hashes.
 *
 * Tracks the current block number and one nonce per account, seals each
 * block into the hash chain on finalizeBlock(), and walks that chain on
 * verifyChainIntegrity(). None of these operations fail; counters saturate
 * at their type's maximum.
 */

import { SortedMap } from "@minichain/support";
import type { SystemConfig, SystemTypes } from "@minichain/support";
import { computeBlockHash, linksToParent } from "./hash.js";
import type { ChainIntegrityError, ChainIntegrityReport } from "./types.js";

export class SystemPallet<T extends SystemTypes> {
  private readonly config: SystemConfig<T>;
  private _blockNumber: T["BlockNumber"];
  private readonly _nonces: SortedMap<T["AccountId"], T["Nonce"]>;
  private readonly _blockHashes: SortedMap<T["BlockNumber"], Uint8Array>;

  constructor(config: SystemConfig<T>) {
    this.config = config;
    this._blockNumber = config.blockNumber.zero;
    this._nonces = new SortedMap((a, b) => config.accountId.compare(a, b));
    this._blockHashes = new SortedMap((a, b) => config.blockNumber.compare(a, b));
  }

  // ─── Block Number ────────────────────────────────────────────────────

  blockNumber(): T["BlockNumber"] {
    return this._blockNumber;
  }

  incBlockNumber(): void {
    const { blockNumber } = this.config;
    this._blockNumber = blockNumber.saturatingAdd(this._blockNumber, blockNumber.one);
  }

  // ─── Nonces ──────────────────────────────────────────────────────────

  nonce(who: T["AccountId"]): T["Nonce"] {
    return this._nonces.get(who) ?? this.config.nonce.zero;
  }

  incNonce(who: T["AccountId"]): void {
    const { nonce } = this.config;
    this._nonces.set(who, nonce.saturatingAdd(this.nonce(who), nonce.one));
  }

  /** All tracked nonces in account order. */
  nonces(): ReadonlyMap<T["AccountId"], T["Nonce"]> {
    return this._nonces.toMap();
  }

  // ─── Finalization ────────────────────────────────────────────────────

  /**
   * Compute the current block's hash and store it, replacing any hash
   * previously stored for the same block number.
   */
  finalizeBlock(): Uint8Array {
    const { blockNumber, nonce } = this.config;

    let nonceSum = 0n;
    for (const value of this._nonces.values()) {
      nonceSum += nonce.toBigInt(value);
    }

    // Block 0 has no predecessor, so it links to its own previous seal.
    const parentNumber = blockNumber.checkedSub(this._blockNumber, blockNumber.one) ?? blockNumber.zero;
    const hash = computeBlockHash(
      blockNumber.toBigInt(this._blockNumber),
      nonceSum,
      this._blockHashes.get(parentNumber),
    );

    this._blockHashes.set(this._blockNumber, hash);
    return hash.slice();
  }

  // ─── Hash Queries ────────────────────────────────────────────────────

  getBlockHash(n: T["BlockNumber"]): Uint8Array | undefined {
    return this._blockHashes.get(n)?.slice();
  }

  /** Hash of the current block, once finalized. */
  currentBlockHash(): Uint8Array | undefined {
    return this.getBlockHash(this._blockNumber);
  }

  /** Hash of the block before the current one. Undefined at block 0. */
  parentBlockHash(): Uint8Array | undefined {
    const { blockNumber } = this.config;
    const parent = blockNumber.checkedSub(this._blockNumber, blockNumber.one);
    return parent === undefined ? undefined : this.getBlockHash(parent);
  }

  genesisHash(): Uint8Array | undefined {
    return this.getBlockHash(this.config.blockNumber.zero);
  }

  /** Every stored hash, in block order. */
  allBlockHashes(): ReadonlyMap<T["BlockNumber"], Uint8Array> {
    return new Map(
      this._blockHashes
        .entries()
        .map(([n, hash]): [T["BlockNumber"], Uint8Array] => [n, hash.slice()]),
    );
  }

  // ─── Integrity ───────────────────────────────────────────────────────

  /**
   * Walk the chain from block 1 to the current block.
   *
   * Reports blocks without a stored hash, and stored hashes whose parent
   * link does not match the parent hash currently stored.
   */
  verifyChainIntegrity(): ChainIntegrityReport<T["BlockNumber"]> {
    const { blockNumber } = this.config;
    const errors: ChainIntegrityError<T["BlockNumber"]>[] = [];

    let n = blockNumber.one;
    while (blockNumber.compare(n, this._blockNumber) <= 0) {
      const hash = this._blockHashes.get(n);
      const parentNumber = blockNumber.checkedSub(n, blockNumber.one) ?? blockNumber.zero;
      const parentHash = this._blockHashes.get(parentNumber);

      if (hash === undefined) {
        errors.push({
          blockNumber: n,
          reason: `Block #${String(n)} hash missing`,
        });
      } else if (parentHash !== undefined && !linksToParent(hash, parentHash)) {
        errors.push({
          blockNumber: n,
          reason: `Block #${String(n)} does not link to the stored hash of block #${String(parentNumber)}`,
        });
      }

      const next = blockNumber.checkedAdd(n, blockNumber.one);
      if (next === undefined) break;
      n = next;
    }

    return { valid: errors.length === 0, errors };
  }
}
