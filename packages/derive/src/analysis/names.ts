/** Value exports of the protocol module that generated code may reference. */
export const CORE_VALUE_EXPORTS = [
  "array",
  "bigint",
  "boolean",
  "bytes",
  "char",
  "cow",
  "cowWith",
  "fixedArray",
  "float32",
  "float64",
  "fromIsSame",
  "hashMap",
  "hashSet",
  "identity",
  "integer",
  "naturalOrder",
  "nullable",
  "optional",
  "orderBy",
  "orderedMap",
  "orderedSet",
  "path",
  "record",
  "ref",
  "shared",
  "string",
  "tuple",
  "typeToken",
  "unit",
  "unitRecord"
] as const;

/** Type exports of the protocol module that field types may name. */
export const CORE_TYPE_EXPORTS = ["Cow", "PathLike", "Shared", "TypeToken"] as const;

export type CoreTypeExport = (typeof CORE_TYPE_EXPORTS)[number];

const coreValueExports: ReadonlySet<string> = new Set(CORE_VALUE_EXPORTS);
const coreTypeExports: ReadonlySet<string> = new Set(CORE_TYPE_EXPORTS);

export function isCoreValueExport(name: string): boolean {
  return coreValueExports.has(name);
}

export function isCoreTypeExport(name: string): name is CoreTypeExport {
  return coreTypeExports.has(name);
}

/**
 * camelCase instance name for a type: `Point` -> `pointIsSame`,
 * `URLPath` -> `urlPathIsSame`.
 */
export function instanceNameFor(typeName: string): string {
  const leading = /^[A-Z]+/.exec(typeName)?.[0] ?? "";
  if (leading.length <= 1) {
    return `${typeName.charAt(0).toLowerCase()}${typeName.slice(1)}IsSame`;
  }

  // In `URLPath` the last capital of the run starts the next word.
  const next = typeName.charAt(leading.length);
  const head = /[a-z]/.test(next) ? leading.slice(0, -1) : leading;
  return `${head.toLowerCase()}${typeName.slice(head.length)}IsSame`;
}
