/** Error used for invalid CLI usage / flag combinations. */
export class UsageError extends Error {
  override name = "UsageError";
}

/** Error used for invalid or unreadable derive configuration. */
export class ConfigError extends Error {
  override name = "ConfigError";
}

/** Source location of a derivation failure (1-based line/column). */
export interface DeriveErrorLocation {
  filePath: string;
  line: number;
  col: number;
}

/**
 * Build-time failure to derive an instance for a declaration.
 *
 * Derivation is all-or-nothing: a run that raises this writes no output.
 */
export class DeriveError extends Error {
  override name = "DeriveError";

  constructor(
    readonly typeName: string,
    readonly location: DeriveErrorLocation,
    readonly detail: string,
  ) {
    super(`${location.filePath}:${location.line}:${location.col}: cannot derive IsSame for ${typeName}: ${detail}`);
  }
}

/** The declaration is not a named-field, positional-field or field-less record. */
export class UnsupportedShapeError extends DeriveError {
  override name = "UnsupportedShapeError";
}

/** A field's type has no known instance. */
export class UnsupportedFieldTypeError extends DeriveError {
  override name = "UnsupportedFieldTypeError";
}

/**
 * Exhaustiveness helper for `switch` statements.
 *
 * Throws an error if called.
 */
export function assertNever(value: never, message = "Unexpected value"): never {
  throw new Error(`${message}: ${String(value)}`);
}
