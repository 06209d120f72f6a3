/**
 * @minichain/support — Ordered key/value storage.
 *
 * A Map whose iteration order follows a comparator instead of insertion
 * order, so every walk over pallet storage is deterministic regardless of
 * the order in which accounts were first touched.
 *
 * Keys must be primitives (string, number, bigint): equality is Map
 * equality, ordering is the comparator's.
 */

import type { Ordering } from "./numeric.js";

export class SortedMap<K extends string | number | bigint, V> {
  private readonly _entries: Map<K, V> = new Map();
  private readonly _compare: (a: K, b: K) => Ordering;

  constructor(compare: (a: K, b: K) => Ordering, initial?: Iterable<readonly [K, V]>) {
    this._compare = compare;
    if (initial !== undefined) {
      for (const [key, value] of initial) {
        this._entries.set(key, value);
      }
    }
  }

  get(key: K): V | undefined {
    return this._entries.get(key);
  }

  has(key: K): boolean {
    return this._entries.has(key);
  }

  set(key: K, value: V): this {
    this._entries.set(key, value);
    return this;
  }

  delete(key: K): boolean {
    return this._entries.delete(key);
  }

  clear(): void {
    this._entries.clear();
  }

  get size(): number {
    return this._entries.size;
  }

  /** Keys in comparator order. */
  keys(): K[] {
    return [...this._entries.keys()].sort(this._compare);
  }

  /** Values in key order. */
  values(): V[] {
    return this.entries().map(([, value]) => value);
  }

  /** Entries in key order. */
  entries(): [K, V][] {
    return [...this._entries.entries()].sort(([a], [b]) => this._compare(a, b));
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries()[Symbol.iterator]();
  }

  /** Plain Map copy whose insertion order is the key order. */
  toMap(): Map<K, V> {
    return new Map(this.entries());
  }
}
