import nodePath from "node:path";
import { fileURLToPath } from "node:url";

import { fromIsSame } from "./isSame.js";
import type { IsSame } from "./isSame.js";

/** A filesystem path: a plain string or a `file:` URL. */
export type PathLike = string | URL;

function toPathString(p: PathLike): string {
  if (typeof p === "string") return p;
  // Only local `file:` URLs name a filesystem path; anything else compares by href.
  if (p.protocol !== "file:" || p.hostname !== "") return p.href;
  return fileURLToPath(p);
}

/**
 * Split a path into comparable components.
 *
 * Repeated separators collapse, interior `.` segments are dropped and a
 * trailing separator is ignored. A leading `.` is kept and `..` is never
 * resolved, so `a/../b` and `b` stay distinct.
 */
export function pathComponents(p: PathLike): string[] {
  const raw = toPathString(p);
  const segments = raw.split(nodePath.sep === "\\" ? /[\\/]/ : "/");

  const out: string[] = [];
  if (raw.startsWith(nodePath.sep) || raw.startsWith("/")) {
    out.push(nodePath.sep);
  }

  segments.forEach((seg, i) => {
    if (!seg) return;
    if (seg === "." && !(i === 0 && out.length === 0)) return;
    out.push(seg);
  });

  return out;
}

/** Paths are the same when their components are, whatever their representation. */
export const path: IsSame<PathLike, PathLike> = fromIsSame<PathLike, PathLike>((left, right) => {
  if (left === right) return true;

  const l = pathComponents(left);
  const r = pathComponents(right);
  return l.length === r.length && l.every((seg, i) => seg === r[i]);
});
