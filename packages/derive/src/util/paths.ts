import path from "node:path";

export function toPosixPath(p: string): string {
  // Convert both platform-specific separators and any Windows-style separators.
  return p.split(path.sep).join("/").replace(/\\/g, "/");
}

export function normalizeRepoRelativePath(input: string): string {
  // Config paths are root-relative (no leading ./) and must stay inside the root.
  const trimmed = input.replace(/^\.\//, "");
  const posix = toPosixPath(trimmed);
  let normalized = path.posix.normalize(posix);

  if (normalized.endsWith("/") && normalized !== "/") {
    normalized = normalized.slice(0, -1);
  }

  // `path.posix.isAbsolute()` won't treat Windows drive paths as absolute, so we
  // explicitly guard those too.
  if (path.posix.isAbsolute(normalized) || /^[A-Za-z]:/.test(normalized)) {
    throw new Error(`path must be root-relative (got absolute): ${input}`);
  }

  if (normalized === ".." || normalized.startsWith("../")) {
    throw new Error(`path must not traverse outside the root: ${input}`);
  }

  return normalized;
}

/** `src/model.ts` -> `src/model.is-same.ts`. */
export function outputPathFor(inputPath: string): string {
  const ext = path.posix.extname(inputPath);
  const base = ext ? inputPath.slice(0, -ext.length) : inputPath;
  return `${base}.is-same${ext || ".ts"}`;
}

export function isGeneratedPath(p: string): boolean {
  return /\.is-same\.(?:[cm]?ts|tsx)$/.test(p);
}

/** Module specifier for importing `targetPath` from a module beside it, NodeNext style. */
export function siblingImportSpecifier(targetPath: string): string {
  const file = path.posix.basename(targetPath);
  const ext = path.posix.extname(file);
  const jsExt = ext === ".mts" ? ".mjs" : ext === ".cts" ? ".cjs" : ".js";
  return `./${ext ? file.slice(0, -ext.length) : file}${jsExt}`;
}
