/** Raised when a combinator is built with arguments it cannot honor. */
export class InvariantError extends Error {
  override name = "InvariantError";
}

/**
 * Assert that a construction-time condition holds.
 *
 * `message` may be a thunk so callers only format it on failure.
 */
export function invariant(condition: unknown, message: string | (() => string)): asserts condition {
  if (!condition) {
    throw new InvariantError(typeof message === "function" ? message() : message);
  }
}
