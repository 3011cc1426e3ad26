import { describe, expect, it } from "vitest";

import { char, float64, fromIsSame, integer, optional, record, string, tuple, unitRecord } from "@is-same/core";

interface Custom {
  foo: number;
  bar: string;
  baz: string;
}

interface WithOptional {
  id: number;
  label?: string;
}

describe("tuple", () => {
  it("compares every position", () => {
    const triple = tuple(integer, integer, string);

    expect(triple.isSame([1, 2, "baz"], [1, 2, "baz"])).toBe(true);
    expect(triple.isNotSame([1, 2, "baz"], [1, 3, "baz"])).toBe(true);
  });

  it("supports arities from one to eight", () => {
    expect(tuple(integer).isSame([1], [1])).toBe(true);
    expect(
      tuple(integer, integer, integer, integer, integer, integer, integer, integer).isSame(
        [1, 2, 3, 4, 5, 6, 7, 8],
        [1, 2, 3, 4, 5, 6, 7, 9],
      ),
    ).toBe(false);
  });

  it("stops at the first position that differs", () => {
    let calls = 0;
    const counting = fromIsSame<string>((left, right) => {
      calls++;
      return left === right;
    });

    expect(tuple(integer, counting).isSame([1, "a"], [2, "a"])).toBe(false);
    expect(calls).toBe(0);
  });
});

describe("record", () => {
  const custom = record<Custom>({ foo: integer, bar: string, baz: char });

  it("is the conjunction of its fields", () => {
    const left: Custom = { foo: 2, bar: "asdf", baz: "a" };
    const right: Custom = { foo: 2, bar: "asdf", baz: "a" };

    expect(custom.isSame(left, right)).toBe(true);

    right.baz = "b";
    expect(custom.isNotSame(left, right)).toBe(true);
  });

  it("evaluates fields in declaration order and stops at the first mismatch", () => {
    const seen: string[] = [];
    const recording = (name: string) =>
      fromIsSame<number>((left, right) => {
        seen.push(name);
        return left === right;
      });

    const ordered = record<{ a: number; b: number; c: number }>({
      a: recording("a"),
      b: recording("b"),
      c: recording("c"),
    });

    expect(ordered.isSame({ a: 1, b: 2, c: 3 }, { a: 1, b: 0, c: 3 })).toBe(false);
    expect(seen).toEqual(["a", "b"]);
  });

  it("visits integer-like keys before the other keys", () => {
    const seen: string[] = [];
    const recording = (name: string) =>
      fromIsSame<number>((left, right) => {
        seen.push(name);
        return left === right;
      });

    const mixed = record<{ b: number; "1": number; a: number; "0": number }>({
      b: recording("b"),
      "1": recording("1"),
      a: recording("a"),
      "0": recording("0"),
    });

    expect(mixed.isSame({ b: 1, "1": 1, a: 1, "0": 1 }, { b: 1, "1": 1, a: 1, "0": 1 })).toBe(true);
    expect(seen).toEqual(["0", "1", "b", "a"]);
  });

  it("compares optional fields with an optional instance", () => {
    const withOptional = record<WithOptional>({ id: float64, label: optional(string) });

    expect(withOptional.isSame({ id: 1 }, { id: 1 })).toBe(true);
    expect(withOptional.isSame({ id: 1 }, { id: 1, label: "x" })).toBe(false);
    expect(withOptional.isSame({ id: 1, label: "x" }, { id: 1, label: "x" })).toBe(true);
  });
});

describe("unitRecord", () => {
  it("treats any two instances as the same", () => {
    class Marker {}

    expect(unitRecord<Marker>().isSame(new Marker(), new Marker())).toBe(true);
  });
});
