#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";

import { loadConfig } from "./config/loadConfig.js";
import { DEFAULT_CONFIG_PATH } from "./config/types.js";
import { runDerive } from "./engine/run.js";
import { formatJsonReport } from "./reporting/formatJson.js";
import { formatPrettyReport } from "./reporting/formatPretty.js";
import { ConfigError, DeriveError, UsageError } from "./util/errors.js";

type OutputFormat = "pretty" | "json";

/** Options parsed from CLI flags (after validation). */
export interface CliOptions {
  configPath: string;
  format: OutputFormat;
  check: boolean;
}

export type ParseResult =
  | {
      kind: "help";
    }
  | {
      kind: "run";
      options: CliOptions;
    };

/**
 * Returns a help/usage string for the `is-same-derive` CLI.
 */
export function usage(): string {
  return [
    "Derive IsSame instances for declarations tagged `@derive IsSame`",
    "",
    "Usage:",
    "  is-same-derive [--config <path>] [--check] [--format pretty|json]",
    "",
    "Flags:",
    `  --config <path>        Path to derive config (default: ${DEFAULT_CONFIG_PATH})`,
    "  --check                Write nothing; fail if generated files are missing or stale",
    "  --format pretty|json   Output format (default: pretty)",
    "",
    "Exit codes:",
    "  0 = outputs written / up to date",
    "  1 = outputs out of date (--check)",
    "  2 = config/usage/derivation error"
  ].join("\n");
}

/**
 * Parses raw CLI argv into a strongly-typed run or help request.
 */
export function parseCliArgs(rawArgv: string[]): ParseResult {
  const argv: string[] = [];
  const positionals: string[] = [];
  let parsingFlags = true;

  for (const arg of rawArgv) {
    if (parsingFlags && arg === "--") {
      parsingFlags = false;
      continue;
    }

    if (parsingFlags) {
      argv.push(arg);
    } else {
      positionals.push(arg);
    }
  }

  let configPath = DEFAULT_CONFIG_PATH;
  let format: OutputFormat = "pretty";
  let check = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;

    if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    }

    if (arg === "--config") {
      const next = argv[i + 1];
      if (!next || next.startsWith("-")) {
        throw new UsageError("--config requires a <path>");
      }
      configPath = next;
      i++;
      continue;
    }

    if (arg === "--format") {
      const next = argv[i + 1];
      if (next !== "pretty" && next !== "json") {
        throw new UsageError("--format must be one of: pretty, json");
      }
      format = next;
      i++;
      continue;
    }

    if (arg === "--check") {
      check = true;
      continue;
    }

    if (arg.startsWith("-")) {
      throw new UsageError(`unknown flag: ${arg}`);
    }

    throw new UsageError(`unexpected positional argument: ${arg}`);
  }

  if (positionals.length > 0) {
    throw new UsageError(`unexpected positional arguments: ${positionals.join(" ")}`);
  }

  return {
    kind: "run",
    options: { configPath, format, check }
  };
}

/** IO dependencies for {@link main} (abstracted for testing). */
export interface MainIo {
  cwd: string;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/**
 * CLI entrypoint: loads config, derives every input, and writes a formatted report.
 */
export async function main(rawArgv: string[], io: MainIo): Promise<number> {
  try {
    const parsed = parseCliArgs(rawArgv);

    if (parsed.kind === "help") {
      io.stdout.write(`${usage()}\n`);
      return 0;
    }

    const repoRoot = io.cwd;

    const loaded = await loadConfig({
      repoRoot,
      configPath: parsed.options.configPath,
      stderr: io.stderr
    });

    const report = await runDerive({
      repoRoot,
      configPath: loaded.configPath,
      config: loaded.config,
      mode: parsed.options.check ? "check" : "write"
    });

    for (const warning of report.warnings) {
      io.stderr.write(`warning: ${warning}\n`);
    }

    const out = parsed.options.format === "json" ? formatJsonReport(report) : formatPrettyReport(report);

    io.stdout.write(`${out}\n`);

    const outdated = report.outputs.some((o) => o.status === "stale" || o.status === "missing");
    return outdated ? 1 : 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);

    if (err instanceof UsageError) {
      io.stderr.write(`error: ${message}\n\n${usage()}\n`);
      return 2;
    }

    if (err instanceof ConfigError || err instanceof DeriveError) {
      io.stderr.write(`error: ${message}\n`);
      return 2;
    }

    io.stderr.write(`error: ${message}\n`);
    return 2;
  }
}

/**
 * Whether the module at `moduleUrl` is the script node was asked to run.
 *
 * npm installs bins as symlinks, so both sides are compared after resolving
 * links.
 */
export function isEntrypoint(argvPath: string | undefined, moduleUrl: string): boolean {
  if (!argvPath) return false;

  const resolve = (p: string): string => {
    try {
      return fs.realpathSync(p);
    } catch (err) {
      if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") {
        return path.resolve(p);
      }
      throw err;
    }
  };

  return resolve(path.resolve(argvPath)) === resolve(fileURLToPath(moduleUrl));
}

const isMain = isEntrypoint(process.argv[1], import.meta.url);

if (isMain) {
  void main(process.argv.slice(2), {
    cwd: process.cwd(),
    stdout: process.stdout,
    stderr: process.stderr
  }).then((code) => {
    process.exitCode = code;
  });
}
