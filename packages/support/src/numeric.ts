/**
 * @minichain/support — Checked unsigned arithmetic.
 *
 * Every numeric associated type (block number, nonce, balance) is described
 * by a `Numeric` capability instead of being hardcoded. Implementations are
 * bounded unsigned integers backed by either `number` or `bigint`.
 *
 * Rules:
 * - No floating-point operations
 * - Checked operations return undefined instead of wrapping
 * - All intermediate arithmetic is done in bigint
 */

/** Result of a three-way comparison. */
export type Ordering = -1 | 0 | 1;

/** Runtime representations a numeric associated type may use. */
export type NumericLike = number | bigint;

/**
 * Arithmetic capability for a bounded unsigned integer type.
 */
export interface Numeric<N extends NumericLike> {
  /** Human-readable type name, e.g. "u32". */
  readonly name: string;
  readonly zero: N;
  readonly one: N;
  readonly max: N;

  /** Whether a runtime value is a member of this type. */
  isValid(value: unknown): value is N;
  compare(a: N, b: N): Ordering;
  checkedAdd(a: N, b: N): N | undefined;
  checkedSub(a: N, b: N): N | undefined;
  checkedMul(a: N, b: N): N | undefined;
  /** Floor division. Undefined when dividing by zero. */
  checkedDiv(a: N, b: N): N | undefined;
  /** Addition clamped to `max`. */
  saturatingAdd(a: N, b: N): N;
  /** Convert from bigint. Undefined when out of range. */
  fromBigInt(value: bigint): N | undefined;
  toBigInt(value: N): bigint;
}

// ─── Internal Helpers ────────────────────────────────────────────────────

function compareBigInt(a: bigint, b: bigint): Ordering {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Build a Numeric whose arithmetic is evaluated in bigint and narrowed back
 * through `wrap` when the result fits in `[0, max]`.
 */
function boundedNumeric<N extends NumericLike>(
  name: string,
  maxValue: bigint,
  wrap: (value: bigint) => N,
  unwrap: (value: N) => bigint,
  isMember: (value: unknown) => value is N,
): Numeric<N> {
  const narrow = (value: bigint): N | undefined =>
    value < 0n || value > maxValue ? undefined : wrap(value);

  return {
    name,
    zero: wrap(0n),
    one: wrap(1n),
    max: wrap(maxValue),

    isValid(value: unknown): value is N {
      if (!isMember(value)) return false;
      const big = unwrap(value);
      return big >= 0n && big <= maxValue;
    },

    compare(a, b) {
      return compareBigInt(unwrap(a), unwrap(b));
    },

    checkedAdd(a, b) {
      return narrow(unwrap(a) + unwrap(b));
    },

    checkedSub(a, b) {
      return narrow(unwrap(a) - unwrap(b));
    },

    checkedMul(a, b) {
      return narrow(unwrap(a) * unwrap(b));
    },

    checkedDiv(a, b) {
      const divisor = unwrap(b);
      if (divisor === 0n) return undefined;
      return narrow(unwrap(a) / divisor);
    },

    saturatingAdd(a, b) {
      const sum = unwrap(a) + unwrap(b);
      return wrap(sum > maxValue ? maxValue : sum);
    },

    fromBigInt(value) {
      return narrow(value);
    },

    toBigInt(value) {
      return unwrap(value);
    },
  };
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Unsigned integer of `bits` width backed by bigint (u64, u128, ...).
 */
export function unsignedBigInt(bits: number): Numeric<bigint> {
  if (!Number.isInteger(bits) || bits < 1) {
    throw new RangeError(`Invalid bit width: ${String(bits)}`);
  }
  return boundedNumeric<bigint>(
    `u${String(bits)}`,
    (1n << BigInt(bits)) - 1n,
    (value) => value,
    (value) => value,
    (value): value is bigint => typeof value === "bigint",
  );
}

/**
 * Unsigned integer of `bits` width backed by number.
 * Limited to 53 bits so every value is a safe integer.
 */
export function unsignedInteger(bits: number): Numeric<number> {
  if (!Number.isInteger(bits) || bits < 1 || bits > 53) {
    throw new RangeError(
      `Invalid bit width for a number-backed integer: ${String(bits)} (1-53 allowed)`,
    );
  }
  return boundedNumeric<number>(
    `u${String(bits)}`,
    (1n << BigInt(bits)) - 1n,
    (value) => Number(value),
    (value) => BigInt(value),
    (value): value is number => typeof value === "number" && Number.isSafeInteger(value),
  );
}

export const u8: Numeric<number> = unsignedInteger(8);
export const u32: Numeric<number> = unsignedInteger(32);
export const u64: Numeric<bigint> = unsignedBigInt(64);
export const u128: Numeric<bigint> = unsignedBigInt(128);
