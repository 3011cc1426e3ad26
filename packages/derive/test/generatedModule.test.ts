import * as ts from "typescript";
import { describe, expect, it } from "vitest";

import * as core from "@is-same/core";
import { isIsSame } from "@is-same/core";
import type { IsSame } from "@is-same/core";

import { deriveSource } from "../src/engine/deriveSource.js";

const source = [
  "/** @derive IsSame */",
  "export interface MyCustomType {",
  "  foo: number;",
  "  bar: string;",
  "  baz: string;",
  "}",
  "",
  "/** @derive IsSame */",
  "export type Pair = [number, string];",
  "",
  "/** @derive IsSame */",
  "export class Marker {}",
  "",
  "/** @derive IsSame */",
  "export interface Reading {",
  "  sensor?: string;",
  "  values: number[];",
  "}",
  "",
  "/** @derive IsSame */",
  "export interface Outer {",
  "  /** @isSame record({ x: float64 }) */",
  "  inner: { x: number };",
  "  /** @isSame fromIsSame<string>((a, b) => a.toLowerCase() === b.toLowerCase()) */",
  "  label: string;",
  "}",
  "",
  "/** @derive IsSame */",
  "export interface Stop {",
  "  name: string;",
  "  next?: Stop;",
  "}",
  ""
].join("\n");

/** Transpile a generated module and evaluate it against the protocol module. */
function loadGenerated(code: string): Record<string, unknown> {
  const js = ts.transpileModule(code, {
    compilerOptions: { module: ts.ModuleKind.CommonJS, target: ts.ScriptTarget.ES2022 }
  }).outputText;

  const exports: Record<string, unknown> = {};
  const requireStub = (id: string): unknown => {
    if (id === "@is-same/core") return core;
    throw new Error(`unexpected import: ${id}`);
  };
  new Function("require", "exports", js)(requireStub, exports);
  return exports;
}

function instance(exports: Record<string, unknown>, name: string): IsSame<unknown> {
  const value = exports[name];
  if (!isIsSame(value)) throw new Error(`${name} is not an IsSame instance`);
  return value;
}

describe("generated module", () => {
  const code = deriveSource({ filePath: "src/model.ts", sourceText: source, importSource: "@is-same/core" }).code;
  if (code === undefined) throw new Error("expected generated code");
  const exports = loadGenerated(code);

  it("compares every named field", () => {
    const same = instance(exports, "myCustomTypeIsSame");

    expect(same.isSame({ foo: 2, bar: "asdf", baz: "qwerty" }, { foo: 2, bar: "asdf", baz: "qwerty" })).toBe(true);
    expect(same.isSame({ foo: 2, bar: "asdf", baz: "qwerty" }, { foo: 2, bar: "asdf", baz: "other" })).toBe(false);
    expect(same.isNotSame({ foo: 2, bar: "asdf", baz: "qwerty" }, { foo: 2, bar: "asdf", baz: "other" })).toBe(true);
  });

  it("compares positional fields", () => {
    const same = instance(exports, "pairIsSame");

    expect(same.isSame([1, "a"], [1, "a"])).toBe(true);
    expect(same.isSame([1, "a"], [2, "a"])).toBe(false);
  });

  it("treats field-less records as always the same", () => {
    const same = instance(exports, "markerIsSame");

    expect(same.isSame({}, {})).toBe(true);
    expect(same.isNotSame({}, {})).toBe(false);
  });

  it("compares optional and array fields", () => {
    const same = instance(exports, "readingIsSame");

    expect(same.isSame({ values: [1, 2] }, { sensor: undefined, values: [1, 2] })).toBe(true);
    expect(same.isSame({ sensor: "t1", values: [1, 2] }, { values: [1, 2] })).toBe(false);
    expect(same.isSame({ sensor: "t1", values: [1, 2] }, { sensor: "t1", values: [1, 2, 3] })).toBe(false);
  });

  it("applies field overrides built from protocol exports", () => {
    const same = instance(exports, "outerIsSame");

    expect(same.isSame({ inner: { x: 1 }, label: "Depot" }, { inner: { x: 1 }, label: "DEPOT" })).toBe(true);
    expect(same.isSame({ inner: { x: 1 }, label: "Depot" }, { inner: { x: 2 }, label: "Depot" })).toBe(false);
  });

  it("compares self-referential records", () => {
    const same = instance(exports, "stopIsSame");
    const route = { name: "a", next: { name: "b", next: { name: "c" } } };

    expect(same.isSame(route, { name: "a", next: { name: "b", next: { name: "c" } } })).toBe(true);
    expect(same.isSame(route, { name: "a", next: { name: "b", next: { name: "d" } } })).toBe(false);
    expect(same.isSame(route, { name: "a", next: { name: "b" } })).toBe(false);
  });
});
