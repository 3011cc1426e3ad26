/** A total ordering: negative, zero or positive like `Array.prototype.sort`. */
export interface Order<T> {
  compare(left: T, right: T): number;
}

export type NaturallyOrdered = string | number | bigint;

/** `<`/`>` ordering for strings, numbers and bigints. */
export function naturalOrder<T extends NaturallyOrdered>(): Order<T> {
  return {
    compare: (left, right) => {
      if (left < right) return -1;
      if (left > right) return 1;
      return 0;
    },
  };
}

/** Order values by a naturally ordered projection. */
export function orderBy<T, K extends NaturallyOrdered>(project: (value: T) => K): Order<T> {
  const base = naturalOrder<K>();
  return {
    compare: (left, right) => base.compare(project(left), project(right)),
  };
}

/** A sorted copy of `values` (the input is not reordered). */
export function sortedBy<T>(values: Iterable<T>, order: Order<T>): T[] {
  return Array.from(values).sort((left, right) => order.compare(left, right));
}
