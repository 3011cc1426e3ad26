import { fromIsSame } from "./isSame.js";
import type { IsSame } from "./isSame.js";

/**
 * Borrowed-reference semantics: the same reference is trivially the same,
 * otherwise compare the referenced values with `inner`.
 */
export function ref<T>(inner: IsSame<T>): IsSame<T> {
  return fromIsSame<T>((left, right) => left === right || inner.isSame(left, right));
}

/** Both absent is the same; exactly one absent is not. */
export function optional<T>(inner: IsSame<T>): IsSame<T | undefined> {
  return fromIsSame<T | undefined>((left, right) => {
    if (left === undefined || right === undefined) {
      return left === right;
    }
    return inner.isSame(left, right);
  });
}

/** `null` is the same only as `null`. */
export function nullable<T>(inner: IsSame<T>): IsSame<T | null> {
  return fromIsSame<T | null>((left, right) => {
    if (left === null || right === null) {
      return left === right;
    }
    return inner.isSame(left, right);
  });
}

/** A borrowed-or-owned view of a value. */
export type Cow<T> =
  | {
      readonly kind: "borrowed";
      readonly value: T;
    }
  | {
      readonly kind: "owned";
      readonly value: T;
    };

export function borrowed<T>(value: T): Cow<T> {
  return { kind: "borrowed", value };
}

export function owned<T>(value: T): Cow<T> {
  return { kind: "owned", value };
}

export function cowValue<T>(view: Cow<T>): T {
  return view.value;
}

/** Compare two views by their underlying values; ownership never matters. */
export function cow<T>(inner: IsSame<T>): IsSame<Cow<T>> {
  return fromIsSame<Cow<T>>((left, right) => inner.isSame(left.value, right.value));
}

/** Compare a view directly against a plain value of its content type. */
export function cowWith<T>(inner: IsSame<T>): IsSame<Cow<T>, T> {
  return fromIsSame<Cow<T>, T>((left, right) => inner.isSame(left.value, right));
}
