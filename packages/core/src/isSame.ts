/**
 * Change-detection equivalence for values of type `A` (compared against `B`).
 *
 * Unlike structural equality, instances decide whether a value is
 * *observably identical* to a previous one: floats compare by bit pattern and
 * shared handles compare by allocation.
 *
 * Build instances with {@link fromIsSame}; `isNotSame` is always the negation
 * of `isSame` and cannot be supplied separately.
 */
export interface IsSame<A, B = A> {
  isSame(left: A, right: B): boolean;
  isNotSame(left: A, right: B): boolean;
}

// Runtime-only brand so instances can be recognised after crossing an
// untyped module boundary (e.g. generated code loaded at run time).
const IS_SAME_BRAND = Symbol("IsSame");

/**
 * Create an {@link IsSame} instance from a comparison function.
 *
 * The returned instance is frozen and derives `isNotSame` from `fn`.
 */
export function fromIsSame<A, B = A>(fn: (left: A, right: B) => boolean): IsSame<A, B> {
  return Object.freeze({
    [IS_SAME_BRAND]: true,
    isSame: (left: A, right: B): boolean => fn(left, right),
    isNotSame: (left: A, right: B): boolean => !fn(left, right),
  });
}

/** Whether `value` is an instance created by {@link fromIsSame}. */
export function isIsSame(value: unknown): value is IsSame<unknown> {
  return typeof value === "object" && value !== null && IS_SAME_BRAND in value;
}
