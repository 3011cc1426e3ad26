import type { DeriveReport, DerivedOutput } from "../engine/types.js";
import { sortOutputs } from "./sortOutputs.js";

function describe(output: DerivedOutput): string {
  const types = output.typeNames.join(", ");
  switch (output.status) {
    case "written":
      return `wrote ${output.outputPath} (${types})`;
    case "unchanged":
      return `up to date ${output.outputPath} (${types})`;
    case "stale":
      return `stale ${output.outputPath} (regenerate from ${output.inputPath})`;
    case "missing":
      return `missing ${output.outputPath} (generate from ${output.inputPath})`;
  }
}

/** Format a derive report as a human-friendly plain-text summary. */
export function formatPrettyReport(report: DeriveReport): string {
  const outdated = report.outputs.filter((o) => o.status === "stale" || o.status === "missing");

  const lines: string[] = [];
  if (report.mode === "check") {
    lines.push(
      outdated.length === 0
        ? `is-same-derive: ${report.outputs.length} output(s) up to date`
        : `is-same-derive: ${outdated.length} of ${report.outputs.length} output(s) out of date`
    );
  } else {
    const written = report.outputs.filter((o) => o.status === "written").length;
    lines.push(`is-same-derive: wrote ${written} of ${report.outputs.length} output(s)`);
  }
  lines.push(`configPath: ${report.configPath}`);

  for (const output of sortOutputs(report.outputs)) {
    lines.push(`  - ${describe(output)}`);
  }

  return lines.join("\n");
}
