/**
 * @minichain/system — Block number, account nonces and the block hash chain.
 */

export { SystemPallet } from "./pallet.js";
export { computeBlockHash, linksToParent, toHex, BLOCK_HASH_LENGTH } from "./hash.js";
export type { ChainIntegrityError, ChainIntegrityReport } from "./types.js";
