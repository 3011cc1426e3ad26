import { fromIsSame } from "./isSame.js";
import type { IsSame } from "./isSame.js";

/** One instance per position of the tuple `T`. */
export type ElementComparators<T extends readonly unknown[]> = {
  readonly [K in keyof T]: IsSame<T[K]>;
};

/** One instance per field of `T`, optional fields included. */
export type FieldComparators<T> = {
  readonly [K in keyof T]-?: IsSame<T[K]>;
};

/**
 * Fixed-arity tuples: the conjunction of every position, stopping at the
 * first position that is not the same.
 */
export function tuple<T extends readonly unknown[]>(...elements: ElementComparators<T>): IsSame<Readonly<T>>;
export function tuple(...elements: ReadonlyArray<IsSame<unknown>>): IsSame<readonly unknown[]> {
  return fromIsSame<readonly unknown[]>((left, right) => {
    for (let i = 0; i < elements.length; i++) {
      const element = elements[i];
      if (element && element.isNotSame(left[i], right[i])) return false;
    }
    return true;
  });
}

/**
 * Named-field records: the conjunction of every field, stopping at the first
 * field that is not the same.
 *
 * Fields are visited in the own-property order of `fields`: integer-like
 * keys (`"0"`, `"1"`) first in ascending order, then the other keys in the
 * order they were written. Only the short-circuit order depends on this.
 */
export function record<T extends object>(fields: FieldComparators<T>): IsSame<T>;
export function record(fields: Readonly<Record<string, IsSame<unknown>>>): IsSame<Readonly<Record<string, unknown>>> {
  const entries = Object.entries(fields);
  return fromIsSame<Readonly<Record<string, unknown>>>((left, right) => {
    for (const [name, field] of entries) {
      if (field.isNotSame(left[name], right[name])) return false;
    }
    return true;
  });
}

/** Field-less records: any two instances are the same. */
export function unitRecord<T>(): IsSame<T> {
  return fromIsSame<T>(() => true);
}
