import type { DeriveReport } from "../engine/types.js";
import { sortOutputs } from "./sortOutputs.js";

/** Format a derive report as deterministic pretty-printed JSON. */
export function formatJsonReport(report: DeriveReport): string {
  return JSON.stringify(
    {
      repoRoot: report.repoRoot,
      configPath: report.configPath,
      mode: report.mode,
      outputs: sortOutputs(report.outputs),
      warnings: report.warnings
    },
    null,
    2
  );
}
