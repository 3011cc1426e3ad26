import { describe, expect, it } from "vitest";

import {
  bigint,
  boolean,
  char,
  float32,
  float32Bits,
  float64,
  float64Bits,
  integer,
  string,
  typeToken,
  unit,
} from "@is-same/core";

describe("float64", () => {
  it("compares ordinary values", () => {
    expect(float64.isSame(1.0, 1.0)).toBe(true);
    expect(float64.isSame(0.0, 0.0)).toBe(true);
    expect(float64.isNotSame(0.0, 1.0)).toBe(true);
  });

  it("treats bit-identical NaNs as the same", () => {
    expect(Number.NaN === Number.NaN).toBe(false);
    expect(float64.isSame(Number.NaN, Number.NaN)).toBe(true);
  });

  it("distinguishes signed zeros and infinities", () => {
    expect(float64.isSame(0, -0)).toBe(false);
    expect(float64.isSame(Infinity, Infinity)).toBe(true);
    expect(float64.isNotSame(Infinity, -Infinity)).toBe(true);
  });

  it("exposes the raw bit pattern", () => {
    expect(float64Bits(0)).toBe(0n);
    expect(float64Bits(-0)).toBe(0x8000000000000000n);
    expect(float64Bits(1)).toBe(0x3ff0000000000000n);
    expect(float64Bits(Infinity)).toBe(0x7ff0000000000000n);
  });
});

describe("float32", () => {
  it("compares binary32 bit patterns", () => {
    expect(float32.isSame(1.0, 1.0)).toBe(true);
    expect(float32.isNotSame(0.0, 1.0)).toBe(true);
    expect(float32.isSame(Number.NaN, Number.NaN)).toBe(true);
    expect(float32.isSame(Infinity, Infinity)).toBe(true);
    expect(float32.isSame(0, -0)).toBe(false);
    expect(float32.isNotSame(Infinity, -Infinity)).toBe(true);
  });

  it("rounds to binary32 before comparing", () => {
    expect(float32Bits(1)).toBe(0x3f800000);
    expect(float32Bits(-0)).toBe(0x80000000);
    // 0.1 and its binary32 rounding share one binary32 encoding.
    expect(float32.isSame(0.1, Math.fround(0.1))).toBe(true);
    expect(float64.isSame(0.1, Math.fround(0.1))).toBe(false);
  });
});

describe("exact scalars", () => {
  it("compares integers, bigints, booleans and text by value", () => {
    expect(integer.isSame(3, 3)).toBe(true);
    expect(integer.isSame(3, 4)).toBe(false);
    expect(bigint.isSame(10n, 10n)).toBe(true);
    expect(bigint.isSame(10n, 11n)).toBe(false);
    expect(boolean.isSame(true, true)).toBe(true);
    expect(boolean.isSame(true, false)).toBe(false);
    expect(string.isSame("baz", "baz")).toBe(true);
    expect(string.isSame("baz", "bar")).toBe(false);
    expect(char.isSame("a", "a")).toBe(true);
    expect(char.isSame("a", "b")).toBe(false);
  });

  it("keeps integer reflexive over every number", () => {
    expect(integer.isSame(NaN, NaN)).toBe(true);
    expect(integer.isSame(0, -0)).toBe(true);
    expect(integer.isSame(NaN, 0)).toBe(false);
    expect(integer.isNotSame(NaN, NaN)).toBe(false);
  });

  it("treats unit values as always the same", () => {
    expect(unit.isSame(undefined, undefined)).toBe(true);
    expect(unit.isSame(null, undefined)).toBe(true);
  });

  it("compares type tokens by identity", () => {
    class A {}
    class B {}
    const tag = Symbol("tag");

    expect(typeToken.isSame(A, A)).toBe(true);
    expect(typeToken.isSame(A, B)).toBe(false);
    expect(typeToken.isSame(tag, tag)).toBe(true);
    expect(typeToken.isSame(tag, Symbol("tag"))).toBe(false);
  });
});
