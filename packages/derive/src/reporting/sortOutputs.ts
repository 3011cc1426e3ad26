import type { DerivedOutput } from "../engine/types.js";

function cmp(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortOutputs(outputs: DerivedOutput[]): DerivedOutput[] {
  return [...outputs].sort((a, b) => cmp(a.outputPath, b.outputPath) || cmp(a.inputPath, b.inputPath));
}
