import { describe, expect, it } from "vitest";

import { array, float64, fromIsSame, integer, isIsSame, string, tuple } from "@is-same/core";
import type { IsSame } from "@is-same/core";

function expectNegationLaw<T>(instance: IsSame<T>, pairs: ReadonlyArray<readonly [T, T]>): void {
  for (const [left, right] of pairs) {
    expect(instance.isNotSame(left, right)).toBe(!instance.isSame(left, right));
  }
}

describe("fromIsSame", () => {
  it("derives isNotSame as the negation of isSame", () => {
    const parity = fromIsSame<number>((left, right) => left % 2 === right % 2);

    expect(parity.isSame(1, 3)).toBe(true);
    expect(parity.isNotSame(1, 3)).toBe(false);
    expect(parity.isSame(1, 2)).toBe(false);
    expect(parity.isNotSame(1, 2)).toBe(true);
  });

  it("builds frozen, recognisable instances", () => {
    const instance = fromIsSame<string>((left, right) => left === right);

    expect(Object.isFrozen(instance)).toBe(true);
    expect(isIsSame(instance)).toBe(true);
    expect(isIsSame({ isSame: () => true, isNotSame: () => false })).toBe(false);
    expect(isIsSame(null)).toBe(false);
  });

  it("holds the negation law across instances", () => {
    expectNegationLaw(float64, [
      [0, -0],
      [Number.NaN, Number.NaN],
      [Infinity, -Infinity],
      [1.5, 1.5],
    ]);
    expectNegationLaw(string, [
      ["a", "a"],
      ["a", "b"],
    ]);
    expectNegationLaw<readonly number[]>(array(integer), [
      [[1, 2, 3], [1, 2]],
      [[1, 2, 3], [1, 2, 3]],
    ]);
    expectNegationLaw<readonly [number, string]>(tuple(integer, string), [
      [[1, "a"], [1, "a"]],
      [[1, "a"], [2, "a"]],
    ]);
  });
});
