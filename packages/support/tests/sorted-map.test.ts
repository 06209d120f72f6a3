/**
 * Tests for SortedMap.
 */

import { describe, it, expect } from "vitest";
import { SortedMap } from "../src/sorted-map.js";
import { numericAccountId, stringAccountId } from "../src/config.js";
import { u32 } from "../src/numeric.js";

describe("SortedMap", () => {
  it("iterates in comparator order regardless of insertion order", () => {
    const map = new SortedMap<string, number>(stringAccountId.compare);
    map.set("charlie", 3).set("alice", 1).set("bob", 2);

    expect(map.keys()).toEqual(["alice", "bob", "charlie"]);
    expect(map.values()).toEqual([1, 2, 3]);
    expect([...map]).toEqual([
      ["alice", 1],
      ["bob", 2],
      ["charlie", 3],
    ]);
  });

  it("orders numeric keys numerically", () => {
    const map = new SortedMap<number, string>(u32.compare, [
      [10, "ten"],
      [2, "two"],
      [1, "one"],
    ]);
    expect(map.keys()).toEqual([1, 2, 10]);
  });

  it("orders numeric account ids and displays them as text", () => {
    const map = new SortedMap<number, string>(numericAccountId.compare);
    map.set(42, "b").set(7, "a");

    expect(map.keys().map((id) => numericAccountId.display(id))).toEqual(["7", "42"]);
  });

  it("supports get, has, delete and clear", () => {
    const map = new SortedMap<string, number>(stringAccountId.compare);
    map.set("alice", 1);

    expect(map.get("alice")).toBe(1);
    expect(map.get("bob")).toBeUndefined();
    expect(map.has("alice")).toBe(true);
    expect(map.size).toBe(1);

    expect(map.delete("alice")).toBe(true);
    expect(map.delete("alice")).toBe(false);

    map.set("bob", 2);
    map.clear();
    expect(map.size).toBe(0);
  });

  it("copies to a plain Map in key order", () => {
    const map = new SortedMap<string, number>(stringAccountId.compare);
    map.set("b", 2).set("a", 1);

    const copy = map.toMap();
    copy.set("c", 3);

    expect([...copy.keys()]).toEqual(["a", "b", "c"]);
    expect(map.has("c")).toBe(false);
  });
});
