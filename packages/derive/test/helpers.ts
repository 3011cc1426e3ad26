import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";

export interface CapturedStream {
  stream: NodeJS.WritableStream;
  text: () => string;
}

/** A writable that records everything written to it. */
export function captureStream(): CapturedStream {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    }
  });
  return { stream, text: () => chunks.join("") };
}

/** Create a temp directory populated with `files` (root-relative path -> contents). */
export async function makeTempRepo(files: Record<string, string>): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "is-same-derive-"));
  for (const [relPath, contents] of Object.entries(files)) {
    const abs = path.join(dir, relPath);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, contents, "utf8");
  }
  return dir;
}

export const MODEL_SOURCE = [
  "/** @derive IsSame */",
  "export interface Point {",
  "  x: number;",
  "  y: number;",
  "}",
  ""
].join("\n");

export const POINT_OUTPUT = [
  "// Generated by is-same-derive from model.ts. Do not edit.",
  'import { float64, fromIsSame } from "@is-same/core";',
  'import type { IsSame } from "@is-same/core";',
  "",
  'import type { Point } from "./model.js";',
  "",
  "export const pointIsSame: IsSame<Point> = fromIsSame<Point>(",
  "  (left, right) =>",
  "    float64.isSame(left.x, right.x) &&",
  "    float64.isSame(left.y, right.y),",
  ");",
  ""
].join("\n");
