import path from "node:path";

import * as ts from "typescript";

import { analyzeSource } from "../analysis/analyzeSource.js";
import { emitModule } from "../emit/emitModule.js";
import { siblingImportSpecifier } from "../util/paths.js";

export interface DeriveSourceOptions {
  /** Root-relative path of the annotated file (used for diagnostics and imports). */
  filePath: string;
  sourceText: string;
  importSource: string;
}

export interface DerivedModule {
  typeNames: string[];
  /** Generated module text, or `undefined` when nothing is annotated. */
  code: string | undefined;
}

function scriptKindFor(filePath: string): ts.ScriptKind {
  return filePath.endsWith(".tsx") ? ts.ScriptKind.TSX : ts.ScriptKind.TS;
}

/** Derive instances for the `@derive IsSame` declarations of one source text. */
export function deriveSource(opts: DeriveSourceOptions): DerivedModule {
  const sf = ts.createSourceFile(opts.filePath, opts.sourceText, ts.ScriptTarget.Latest, true, scriptKindFor(opts.filePath));

  const { targets, imports } = analyzeSource(sf, {
    filePath: opts.filePath,
    importSource: opts.importSource
  });

  const typeNames = targets.map((t) => t.typeName);
  if (targets.length === 0) {
    return { typeNames, code: undefined };
  }

  return {
    typeNames,
    code: emitModule({
      sourceName: path.posix.basename(opts.filePath),
      sourceSpecifier: siblingImportSpecifier(opts.filePath),
      importSource: opts.importSource,
      targets,
      imports
    })
  };
}
