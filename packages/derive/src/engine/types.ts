import type { DeriveConfig } from "../config/types.js";

export type RunMode = "write" | "check";

/**
 * Outcome for one input file.
 *
 * `written`/`unchanged` in write mode; `unchanged`, `stale` or `missing` in
 * check mode.
 */
export type OutputStatus = "written" | "unchanged" | "stale" | "missing";

export interface DerivedOutput {
  inputPath: string;
  outputPath: string;
  typeNames: string[];
  status: OutputStatus;
}

/** Report produced by one derive run. */
export interface DeriveReport {
  repoRoot: string;
  configPath: string;
  mode: RunMode;
  outputs: DerivedOutput[];
  warnings: string[];
}

/** Options for running the generator over a configured set of inputs. */
export interface RunDeriveOptions {
  repoRoot: string;
  configPath: string;
  config: DeriveConfig;
  mode: RunMode;
}
