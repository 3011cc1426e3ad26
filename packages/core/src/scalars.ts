import { fromIsSame } from "./isSame.js";
import type { IsSame } from "./isSame.js";

/** A runtime token denoting a type: a class/constructor or a symbol. */
export type TypeToken = symbol | (abstract new (...args: never[]) => unknown);

function strictEqual<T>(left: T, right: T): boolean {
  return left === right;
}

// Scratch space for reinterpreting floats. Comparisons never suspend, so a
// single module-level view is never observed mid-use.
const scratch = new DataView(new ArrayBuffer(8));

/** The raw IEEE-754 binary64 bit pattern of `value`. */
export function float64Bits(value: number): bigint {
  scratch.setFloat64(0, value);
  return scratch.getBigUint64(0);
}

/** The raw IEEE-754 binary32 bit pattern of `value` (after rounding to binary32). */
export function float32Bits(value: number): number {
  scratch.setFloat32(0, value);
  return scratch.getUint32(0);
}

/**
 * Numbers compared as integers: `0` and `-0` are one integer, and `NaN` is
 * the same as `NaN` so the instance stays reflexive over all of `number`.
 */
export const integer: IsSame<number> = fromIsSame<number>(
  (left, right) => left === right || (Number.isNaN(left) && Number.isNaN(right)),
);

export const bigint: IsSame<bigint> = fromIsSame<bigint>(strictEqual);

export const boolean: IsSame<boolean> = fromIsSame<boolean>(strictEqual);

export const string: IsSame<string> = fromIsSame<string>(strictEqual);

/** Single characters are strings in JS; same as {@link string}. */
export const char: IsSame<string> = string;

/** Values with no data are always the same. */
export const unit: IsSame<void | undefined | null> = fromIsSame<void | undefined | null>(() => true);

/**
 * Binary64 floats compared by bit pattern.
 *
 * `NaN` is the same as an identically encoded `NaN`, while `0` and `-0` are not
 * the same.
 */
export const float64: IsSame<number> = fromIsSame<number>(
  (left, right) => float64Bits(left) === float64Bits(right),
);

/** Binary32 floats compared by bit pattern. */
export const float32: IsSame<number> = fromIsSame<number>(
  (left, right) => float32Bits(left) === float32Bits(right),
);

export const typeToken: IsSame<TypeToken> = fromIsSame<TypeToken>(strictEqual);

/** Reference identity (`===`). */
export const identity: IsSame<unknown> = fromIsSame<unknown>(strictEqual);
