export const DEFAULT_CONFIG_PATH = "is-same-derive.yml";

export const DEFAULT_IMPORT_SOURCE = "@is-same/core";

export interface DeriveConfig {
  schemaVersion: number;
  /** Module the generated code imports the protocol from. */
  importSource: string;
  /** Root-relative source files to scan for `@derive IsSame` declarations. */
  inputs: string[];
}
