import { fromIsSame } from "./isSame.js";
import type { IsSame } from "./isSame.js";

type Allocation<T> = { readonly value: T };

/**
 * A handle to a shared, immutable allocation.
 *
 * Several handles may point at one allocation (see {@link Shared.clone}). Data
 * reached through a handle must not be mutated once the handle is published:
 * {@link shared} relies on that to compare handles by allocation alone.
 */
export class Shared<T> {
  private constructor(private readonly allocation: Allocation<T>) {}

  /** Allocate `value` and return the first handle to it. */
  static of<T>(value: T): Shared<T> {
    return new Shared(Object.freeze({ value }));
  }

  /** Whether two handles refer to the same allocation. */
  static ptrEq<T>(left: Shared<T>, right: Shared<T>): boolean {
    return left.allocation === right.allocation;
  }

  get value(): T {
    return this.allocation.value;
  }

  /** A new handle to the same allocation. */
  clone(): Shared<T> {
    return new Shared(this.allocation);
  }
}

/**
 * Shared handles are the same iff they refer to the same allocation.
 *
 * The pointee is never inspected: two separately allocated handles holding
 * equal content are not the same.
 */
export function shared<T>(): IsSame<Shared<T>> {
  return fromIsSame<Shared<T>>((left, right) => Shared.ptrEq(left, right));
}
