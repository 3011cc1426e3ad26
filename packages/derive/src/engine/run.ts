import fs from "node:fs/promises";
import path from "node:path";

import { ConfigError } from "../util/errors.js";
import { outputPathFor } from "../util/paths.js";
import { deriveSource } from "./deriveSource.js";
import type { DeriveReport, DerivedOutput, RunDeriveOptions } from "./types.js";

type Planned = {
  inputPath: string;
  outputPath: string;
  typeNames: string[];
  code: string;
};

async function readIfExists(absPath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(absPath, "utf8");
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") {
      return undefined;
    }
    throw err;
  }
}

async function readInput(repoRoot: string, inputPath: string): Promise<string> {
  const text = await readIfExists(path.resolve(repoRoot, inputPath));
  if (text === undefined) {
    throw new ConfigError(`input not found: ${inputPath}`);
  }
  return text;
}

/**
 * Derive every configured input, then write (or check) the outputs.
 *
 * Every input is derived before anything is written, so a derivation error
 * leaves the tree untouched.
 */
export async function runDerive(opts: RunDeriveOptions): Promise<DeriveReport> {
  const planned: Planned[] = [];
  const warnings: string[] = [];

  for (const inputPath of opts.config.inputs) {
    const sourceText = await readInput(opts.repoRoot, inputPath);
    const derived = deriveSource({
      filePath: inputPath,
      sourceText,
      importSource: opts.config.importSource
    });

    if (derived.code === undefined) {
      warnings.push(`no @derive IsSame declarations in ${inputPath}`);
      continue;
    }

    planned.push({
      inputPath,
      outputPath: outputPathFor(inputPath),
      typeNames: derived.typeNames,
      code: derived.code
    });
  }

  const outputs: DerivedOutput[] = [];

  for (const plan of planned) {
    const absOutput = path.resolve(opts.repoRoot, plan.outputPath);
    const existing = await readIfExists(absOutput);
    const base = { inputPath: plan.inputPath, outputPath: plan.outputPath, typeNames: plan.typeNames };

    if (existing === plan.code) {
      outputs.push({ ...base, status: "unchanged" });
      continue;
    }

    if (opts.mode === "check") {
      outputs.push({ ...base, status: existing === undefined ? "missing" : "stale" });
      continue;
    }

    await fs.writeFile(absOutput, plan.code, "utf8");
    outputs.push({ ...base, status: "written" });
  }

  return {
    repoRoot: opts.repoRoot,
    configPath: opts.configPath,
    mode: opts.mode,
    outputs,
    warnings
  };
}
