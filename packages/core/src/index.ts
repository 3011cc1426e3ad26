export { fromIsSame, isIsSame } from "./isSame.js";
export type { IsSame } from "./isSame.js";

export { InvariantError, invariant } from "./invariant.js";

export {
  bigint,
  boolean,
  char,
  float32,
  float32Bits,
  float64,
  float64Bits,
  identity,
  integer,
  string,
  typeToken,
  unit,
} from "./scalars.js";
export type { TypeToken } from "./scalars.js";

export { Shared, shared } from "./shared.js";

export { borrowed, cow, cowValue, cowWith, nullable, optional, owned, ref } from "./views.js";
export type { Cow } from "./views.js";

export { array, bytes, fixedArray } from "./sequences.js";

export { naturalOrder, orderBy, sortedBy } from "./order.js";
export type { NaturallyOrdered, Order } from "./order.js";

export { hashMap, hashSet, orderedMap, orderedSet } from "./mappings.js";

export { path, pathComponents } from "./path.js";
export type { PathLike } from "./path.js";

export { record, tuple, unitRecord } from "./structural.js";
export type { ElementComparators, FieldComparators } from "./structural.js";
