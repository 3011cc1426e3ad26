import { invariant } from "./invariant.js";
import { fromIsSame } from "./isSame.js";
import type { IsSame } from "./isSame.js";

// Walks both sequences in order and stops at the first mismatch. Sequences
// that end at different positions are not the same.
function elementsSame<T>(element: IsSame<T>, left: Iterable<T>, right: Iterable<T>): boolean {
  const rightValues = right[Symbol.iterator]();
  for (const l of left) {
    const r = rightValues.next();
    if (r.done) return false;
    if (element.isNotSame(l, r.value)) return false;
  }
  return rightValues.next().done === true;
}

/**
 * Growable sequences: the same array is trivially the same; otherwise lengths
 * must match and elements are compared in index order, stopping at the first
 * mismatch.
 */
export function array<T>(element: IsSame<T>): IsSame<readonly T[]> {
  return fromIsSame<readonly T[]>((left, right) => {
    if (left === right) return true;
    if (left.length !== right.length) return false;
    return elementsSame(element, left, right);
  });
}

/** Byte buffers; views over the same bytes are the same without a scan. */
export const bytes: IsSame<Uint8Array> = fromIsSame<Uint8Array>((left, right) => {
  if (left.length !== right.length) return false;
  if (left.buffer === right.buffer && left.byteOffset === right.byteOffset) return true;
  for (let i = 0; i < left.length; i++) {
    if (left[i] !== right[i]) return false;
  }
  return true;
});

/**
 * Arrays of a static `size`. There is no identity fast path; elements are
 * compared in index order.
 */
export function fixedArray<T>(element: IsSame<T>, size: number): IsSame<readonly T[]> {
  invariant(Number.isSafeInteger(size) && size >= 0, () => `fixedArray size must be a non-negative integer (got ${size})`);

  return fromIsSame<readonly T[]>((left, right) => {
    if (left.length !== size || right.length !== size) return false;
    return elementsSame(element, left, right);
  });
}
