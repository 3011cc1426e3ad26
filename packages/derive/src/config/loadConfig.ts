import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";

import YAML from "yaml";

import { ConfigError } from "../util/errors.js";
import { isGeneratedPath, normalizeRepoRelativePath } from "../util/paths.js";
import { DEFAULT_IMPORT_SOURCE } from "./types.js";
import type { DeriveConfig } from "./types.js";

const KNOWN_KEYS = ["schemaVersion", "importSource", "inputs"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertInputs(value: unknown): string[] {
  if (!Array.isArray(value) || !value.every((p) => typeof p === "string")) {
    throw new ConfigError("inputs must be a string[]");
  }

  const inputs = value.map((p: string) => {
    let normalized: string;
    try {
      normalized = normalizeRepoRelativePath(p);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`inputs contains invalid path: ${message}`);
    }

    if (!/\.(?:[cm]?ts|tsx)$/.test(normalized)) {
      throw new ConfigError(`inputs must be TypeScript files: ${p}`);
    }
    if (isGeneratedPath(normalized)) {
      throw new ConfigError(`inputs must not be generated files: ${p}`);
    }
    return normalized;
  });

  // Stable, de-duplicated order keeps reports and writes deterministic.
  return Array.from(new Set(inputs)).sort();
}

export interface LoadConfigOptions {
  repoRoot: string;
  configPath: string;
  stderr?: NodeJS.WritableStream;
}

export async function loadConfig(
  opts: LoadConfigOptions
): Promise<{ configPath: string; config: DeriveConfig }> {
  const absPath = path.resolve(opts.repoRoot, opts.configPath);
  const stderr = opts.stderr ?? process.stderr;

  let raw: string;
  try {
    raw = await fs.readFile(absPath, "utf8");
  } catch (err) {
    const code = isRecord(err) ? err.code : undefined;

    if (code === "ENOENT") {
      throw new ConfigError(`config not found: ${opts.configPath}`);
    }

    if (code === "EACCES" || code === "EPERM") {
      throw new ConfigError(`cannot read config (permission denied): ${opts.configPath}`);
    }

    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`failed to read config ${opts.configPath}: ${msg}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`invalid YAML in ${opts.configPath}: ${msg}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError("config root must be an object");
  }

  const schemaVersion = parsed.schemaVersion;
  if (schemaVersion !== 1) {
    throw new ConfigError(`schemaVersion must be 1 (got ${String(schemaVersion)})`);
  }

  const importSource = parsed.importSource ?? DEFAULT_IMPORT_SOURCE;
  if (typeof importSource !== "string" || importSource.trim().length === 0) {
    throw new ConfigError("importSource must be a non-empty string");
  }

  const inputs = assertInputs(parsed.inputs);

  const unknownKeys = Object.keys(parsed).filter((key) => !KNOWN_KEYS.includes(key));
  if (unknownKeys.length > 0) {
    stderr.write(`warning: unknown key(s) in ${opts.configPath}: ${unknownKeys.sort().join(", ")} (ignoring)\n`);
  }

  return {
    configPath: opts.configPath,
    config: {
      schemaVersion: 1,
      importSource: importSource.trim(),
      inputs
    }
  };
}
