/**
 * @minichain/system — Placeholder block hash.
 *
 * Not cryptographic. The 32-byte hash is laid out as:
 *
 *   [0..4)   block number, big-endian u32 (low 32 bits)
 *   [4..8)   sum of all account nonces, big-endian u32 (low 32 bits)
 *   [8..16)  first 8 bytes of the parent hash (zero when absent)
 *   [16..32) (index + block number) mod 256
 *
 * The output depends only on the block number, the nonce sum and the
 * parent hash.
 */

export const BLOCK_HASH_LENGTH = 32;

const PARENT_LINK_OFFSET = 8;
const PARENT_LINK_LENGTH = 8;

export function computeBlockHash(
  blockNumber: bigint,
  nonceSum: bigint,
  parentHash: Uint8Array | undefined,
): Uint8Array {
  const hash = new Uint8Array(BLOCK_HASH_LENGTH);
  const view = new DataView(hash.buffer);

  view.setUint32(0, Number(BigInt.asUintN(32, blockNumber)));
  view.setUint32(4, Number(BigInt.asUintN(32, nonceSum)));

  if (parentHash !== undefined) {
    hash.set(parentHash.subarray(0, PARENT_LINK_LENGTH), PARENT_LINK_OFFSET);
  }

  for (let i = 16; i < BLOCK_HASH_LENGTH; i += 1) {
    hash[i] = Number((BigInt(i) + blockNumber) % 256n);
  }

  return hash;
}

/**
 * Whether `hash` carries the parent link expected for `parentHash`.
 */
export function linksToParent(hash: Uint8Array, parentHash: Uint8Array): boolean {
  for (let i = 0; i < PARENT_LINK_LENGTH; i += 1) {
    if (hash[PARENT_LINK_OFFSET + i] !== parentHash[i]) {
      return false;
    }
  }
  return true;
}

/** Lowercase hex encoding of a hash (or a prefix of it). */
export function toHex(hash: Uint8Array, length: number = hash.length): string {
  return Buffer.from(hash.subarray(0, length)).toString("hex");
}
