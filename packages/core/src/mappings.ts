import { fromIsSame } from "./isSame.js";
import type { IsSame } from "./isSame.js";
import { sortedBy } from "./order.js";
import type { Order } from "./order.js";

/**
 * Key/value mappings compared in ascending key order.
 *
 * Keys pair up under `keyOrder` (a comparison of `0`), never under the
 * protocol; values are compared with `value`. Insertion order is irrelevant.
 */
export function orderedMap<K, V>(keyOrder: Order<K>, value: IsSame<V>): IsSame<ReadonlyMap<K, V>> {
  const entryOrder: Order<readonly [K, V]> = {
    compare: (left, right) => keyOrder.compare(left[0], right[0]),
  };

  return fromIsSame<ReadonlyMap<K, V>>((left, right) => {
    if (left === right) return true;
    if (left.size !== right.size) return false;

    const rightEntries = sortedBy(right.entries(), entryOrder).values();
    for (const [leftKey, leftValue] of sortedBy(left.entries(), entryOrder)) {
      const next = rightEntries.next();
      if (next.done) return false;
      const [rightKey, rightValue] = next.value;
      if (keyOrder.compare(leftKey, rightKey) !== 0) return false;
      if (value.isNotSame(leftValue, rightValue)) return false;
    }
    return true;
  });
}

/** Key-only sets compared in ascending order under `order`. */
export function orderedSet<K>(order: Order<K>): IsSame<ReadonlySet<K>> {
  return fromIsSame<ReadonlySet<K>>((left, right) => {
    if (left === right) return true;
    if (left.size !== right.size) return false;

    const rightKeys = sortedBy(right, order).values();
    for (const leftKey of sortedBy(left, order)) {
      const next = rightKeys.next();
      if (next.done || order.compare(leftKey, next.value) !== 0) return false;
    }
    return true;
  });
}

/**
 * Hash-based key/value mappings.
 *
 * The size check runs first and is required: the per-key scan only walks the
 * left map, so it would miss keys that exist only on the right.
 */
export function hashMap<K, V>(value: IsSame<V>): IsSame<ReadonlyMap<K, V>> {
  return fromIsSame<ReadonlyMap<K, V>>((left, right) => {
    if (left.size !== right.size) return false;

    for (const [key, leftValue] of left) {
      const rightValue = right.get(key);
      if (rightValue === undefined) {
        // A key mapped to `undefined` only matches an `undefined` on the left.
        if (!right.has(key) || leftValue !== undefined) return false;
        continue;
      }
      if (value.isNotSame(leftValue, rightValue)) return false;
    }

    return true;
  });
}

/** Hash-based key-only sets: exactly the same keys. */
export function hashSet<K>(): IsSame<ReadonlySet<K>> {
  return fromIsSame<ReadonlySet<K>>((left, right) => {
    if (left.size !== right.size) return false;
    for (const key of left) {
      if (!right.has(key)) return false;
    }
    return true;
  });
}
