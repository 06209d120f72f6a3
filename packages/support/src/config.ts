/**
 * @minichain/support — Configuration contract.
 *
 * Every pallet is generic over a bundle of associated types. The bundle is
 * a type-level record (`SystemTypes`, `BalancesTypes`) paired with a value
 * that supplies the capabilities each type needs (`SystemConfig`,
 * `BalancesConfig`). A runtime builds one config value and hands the same
 * object to every pallet, so the concrete types cannot diverge.
 */

import type { Numeric, NumericLike, Ordering } from "./numeric.js";

/** Runtime representations an account identity may use. */
export type AccountIdLike = string | number | bigint;

/**
 * Identity capability: a total order plus a display form.
 */
export interface AccountIdOps<A extends AccountIdLike> {
  compare(a: A, b: A): Ordering;
  display(value: A): string;
}

// ─── Associated Types ────────────────────────────────────────────────────

export interface SystemTypes {
  readonly AccountId: AccountIdLike;
  readonly BlockNumber: NumericLike;
  readonly Nonce: NumericLike;
}

export interface BalancesTypes extends SystemTypes {
  readonly Balance: NumericLike;
}

// ─── Capabilities ────────────────────────────────────────────────────────

export interface SystemConfig<T extends SystemTypes> {
  readonly accountId: AccountIdOps<T["AccountId"]>;
  readonly blockNumber: Numeric<T["BlockNumber"]>;
  readonly nonce: Numeric<T["Nonce"]>;
}

export interface BalancesConfig<T extends BalancesTypes> extends SystemConfig<T> {
  readonly balance: Numeric<T["Balance"]>;
}

// ─── Identity Implementations ────────────────────────────────────────────

/** Account ids as strings, ordered by UTF-16 code units. */
export const stringAccountId: AccountIdOps<string> = {
  compare(a, b) {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  },
  display(value) {
    return value;
  },
};

/** Account ids as plain numbers. */
export const numericAccountId: AccountIdOps<number> = {
  compare(a, b) {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  },
  display(value) {
    return String(value);
  },
};
