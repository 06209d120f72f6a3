/**
 * @minichain/system — Types for block progression and chain integrity.
 */

/** A single problem found while walking the block hash chain. */
export interface ChainIntegrityError<BlockNumber> {
  readonly blockNumber: BlockNumber;
  readonly reason: string;
}

/**
 * Result of `verifyChainIntegrity()`.
 * `valid` is true exactly when `errors` is empty.
 */
export interface ChainIntegrityReport<BlockNumber> {
  readonly valid: boolean;
  readonly errors: readonly ChainIntegrityError<BlockNumber>[];
}
