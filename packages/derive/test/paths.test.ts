import { describe, expect, it } from "vitest";

import {
  isGeneratedPath,
  normalizeRepoRelativePath,
  outputPathFor,
  siblingImportSpecifier
} from "../src/util/paths.js";

describe("normalizeRepoRelativePath", () => {
  it("normalizes leading ./ and collapses segments", () => {
    expect(normalizeRepoRelativePath("./src/model.ts")).toBe("src/model.ts");
    expect(normalizeRepoRelativePath("src/shapes/../model.ts")).toBe("src/model.ts");
  });

  it("normalizes Windows-style separators", () => {
    expect(normalizeRepoRelativePath("src\\model.ts")).toBe("src/model.ts");
    expect(normalizeRepoRelativePath(".\\src\\model.ts")).toBe("src/model.ts");
  });

  it("rejects absolute paths", () => {
    expect(() => normalizeRepoRelativePath("/tmp/model.ts")).toThrowError(/root-relative/);
    expect(() => normalizeRepoRelativePath("C:\\tmp\\model.ts")).toThrowError(/root-relative/);
  });

  it("rejects traversal that escapes the root", () => {
    expect(() => normalizeRepoRelativePath("../model.ts")).toThrowError(/traverse/);
    expect(() => normalizeRepoRelativePath("src/../../model.ts")).toThrowError(/traverse/);
  });
});

describe("outputPathFor", () => {
  it("places the generated module beside its input", () => {
    expect(outputPathFor("src/model.ts")).toBe("src/model.is-same.ts");
    expect(outputPathFor("src/view.tsx")).toBe("src/view.is-same.tsx");
    expect(outputPathFor("lib/esm.mts")).toBe("lib/esm.is-same.mts");
  });

  it("recognizes its own outputs", () => {
    expect(isGeneratedPath(outputPathFor("src/model.ts"))).toBe(true);
    expect(isGeneratedPath("src/model.ts")).toBe(false);
  });
});

describe("siblingImportSpecifier", () => {
  it("maps TypeScript extensions to their emitted form", () => {
    expect(siblingImportSpecifier("src/model.ts")).toBe("./model.js");
    expect(siblingImportSpecifier("src/view.tsx")).toBe("./view.js");
    expect(siblingImportSpecifier("lib/esm.mts")).toBe("./esm.mjs");
    expect(siblingImportSpecifier("lib/cjs.cts")).toBe("./cjs.cjs");
  });
});
