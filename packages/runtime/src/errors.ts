/**
 * @minichain/runtime — Runtime-level errors.
 */

export type RuntimeErrorCode =
  | "BLOCK_NUMBER_MISMATCH"
  | "GENESIS_ALREADY_APPLIED"
  | "INVALID_GENESIS";

/**
 * Failure of a whole-block or genesis operation.
 * Individual extrinsic failures are reported per item instead.
 */
export class RuntimeError extends Error {
  public readonly code: RuntimeErrorCode;

  constructor(code: RuntimeErrorCode, message: string) {
    super(message);
    this.name = "RuntimeError";
    this.code = code;
  }
}
