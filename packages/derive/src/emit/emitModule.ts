import { instanceNameFor } from "../analysis/names.js";
import type { AggregateShape, Comparator, DeriveTarget, FieldComparator, ModuleImports } from "../analysis/types.js";
import { assertNever } from "../util/errors.js";

export interface EmitModuleOptions {
  /** File name of the annotated source, for the header. */
  sourceName: string;
  /** Specifier the generated module imports the annotated types from. */
  sourceSpecifier: string;
  importSource: string;
  targets: DeriveTarget[];
  imports: ModuleImports;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function propertyKey(key: string): string {
  return IDENTIFIER.test(key) ? key : JSON.stringify(key);
}

function access(operand: string, key: string | number): string {
  if (typeof key === "number") return `${operand}[${key}]`;
  return IDENTIFIER.test(key) ? `${operand}.${key}` : `${operand}[${JSON.stringify(key)}]`;
}

export function emitComparator(c: Comparator): string {
  switch (c.kind) {
    case "instance":
      return c.name;
    case "factory":
      return `${c.name}(${c.args.map(emitComparator).join(", ")})`;
    case "record":
      if (c.fields.length === 0) return `unitRecord<${c.typeText}>()`;
      return `record<${c.typeText}>({ ${c.fields
        .map((f) => `${propertyKey(String(f.key))}: ${emitComparator(f.comparator)}`)
        .join(", ")} })`;
    case "derived": {
      const name = instanceNameFor(c.typeName);
      return c.typeArgs.length === 0 ? name : `${name}(${c.typeArgs.map(emitComparator).join(", ")})`;
    }
    case "typeParameter":
      return instanceNameFor(c.name);
    case "expression":
      return c.text;
    default:
      return assertNever(c, "Unexpected comparator");
  }
}

function usesTypeParameter(c: Comparator, name: string): boolean {
  switch (c.kind) {
    case "typeParameter":
      return c.name === name;
    case "factory":
      return c.args.some((arg) => usesTypeParameter(arg, name));
    case "derived":
      return c.typeArgs.some((arg) => usesTypeParameter(arg, name));
    case "record":
      return c.fields.some((f) => usesTypeParameter(f.comparator, name));
    case "expression":
      return new RegExp(`\\b${instanceNameFor(name)}\\b`).test(c.text);
    case "instance":
      return false;
    default:
      return assertNever(c, "Unexpected comparator");
  }
}

function shapeFields(shape: AggregateShape): FieldComparator[] {
  return shape.kind === "unit" ? [] : shape.fields;
}

/** Names of the annotated types a comparator refers to. */
function referencedTypes(c: Comparator, typeNames: readonly string[]): Set<string> {
  const out = new Set<string>();
  const walk = (node: Comparator): void => {
    switch (node.kind) {
      case "derived":
        out.add(node.typeName);
        node.typeArgs.forEach(walk);
        return;
      case "factory":
        node.args.forEach(walk);
        return;
      case "record":
        node.fields.forEach((f) => walk(f.comparator));
        return;
      case "expression":
        for (const name of typeNames) {
          if (new RegExp(`\\b${instanceNameFor(name)}\\b`).test(node.text)) out.add(name);
        }
        return;
      case "instance":
      case "typeParameter":
        return;
      default:
        assertNever(node, "Unexpected comparator");
    }
  };
  walk(c);
  return out;
}

/**
 * Hoisting decisions for one module.
 *
 * A field comparator built by a call is hoisted out of the `isSame` closure
 * when evaluating it early cannot reach an instance that is not initialized
 * yet: at module scope every type it reaches must be declared earlier; inside
 * a generic factory it must not reach the factory's own type.
 */
class HoistPlan {
  private readonly order: Map<string, number>;
  private readonly reach = new Map<string, Set<string>>();
  private readonly used: Set<string>;

  constructor(private readonly targets: readonly DeriveTarget[], reserved: Iterable<string>) {
    this.order = new Map(targets.map((t, i) => [t.typeName, i]));
    this.used = new Set(reserved);
    for (const t of targets) {
      this.used.add(instanceNameFor(t.typeName));
      t.typeParameters.forEach((p) => this.used.add(instanceNameFor(p)));
    }
  }

  private typeNames(): string[] {
    return this.targets.map((t) => t.typeName);
  }

  /** Every annotated type reachable from `typeName`'s fields, transitively. */
  private reachable(typeName: string): Set<string> {
    const cached = this.reach.get(typeName);
    if (cached) return cached;

    const out = new Set<string>();
    this.reach.set(typeName, out);
    const target = this.targets.find((t) => t.typeName === typeName);
    for (const f of target ? shapeFields(target.shape) : []) {
      for (const name of referencedTypes(f.comparator, this.typeNames())) {
        out.add(name);
        this.reachable(name).forEach((n) => out.add(n));
      }
    }
    return out;
  }

  private reachFrom(c: Comparator): Set<string> {
    const out = new Set<string>();
    for (const name of referencedTypes(c, this.typeNames())) {
      out.add(name);
      this.reachable(name).forEach((n) => out.add(n));
    }
    return out;
  }

  canHoist(target: DeriveTarget, c: Comparator): boolean {
    const text = emitComparator(c);
    if (IDENTIFIER.test(text)) return false;

    const reached = this.reachFrom(c);
    if (target.typeParameters.length > 0) {
      return !reached.has(target.typeName);
    }
    const index = this.order.get(target.typeName) ?? 0;
    return Array.from(reached).every((name) => (this.order.get(name) ?? index) < index);
  }

  /** A fresh constant name such as `labeledDisplayName` for a field. */
  constantName(target: DeriveTarget, key: string | number): string {
    const base = instanceNameFor(target.typeName).replace(/IsSame$/, "");
    const suffix = String(key)
      .split(/[^A-Za-z0-9]+/)
      .filter((part) => part.length > 0)
      .map((part) => `${part.charAt(0).toUpperCase()}${part.slice(1)}`)
      .join("");

    let name = `${base}${suffix || "Field"}`;
    for (let n = 2; this.used.has(name); n++) {
      name = `${base}${suffix || "Field"}${n}`;
    }
    this.used.add(name);
    return name;
  }
}

type PlannedField = {
  key: string | number;
  /** Expression used inside the closure. */
  ref: string;
};

function planFields(target: DeriveTarget, plan: HoistPlan): { hoisted: string[]; fields: PlannedField[] } {
  const hoisted: string[] = [];
  const fields = shapeFields(target.shape).map((f): PlannedField => {
    if (!plan.canHoist(target, f.comparator)) {
      return { key: f.key, ref: emitComparator(f.comparator) };
    }
    const name = plan.constantName(target, f.key);
    hoisted.push(`const ${name} = ${emitComparator(f.comparator)};`);
    return { key: f.key, ref: name };
  });
  return { hoisted, fields };
}

function conjunction(fields: PlannedField[], indent: string): string {
  const terms = fields.map((f) => `${f.ref}.isSame(${access("left", f.key)}, ${access("right", f.key)})`);
  return `(left, right) =>\n${indent}  ${terms.join(` &&\n${indent}  `)}`;
}

function emitBody(fields: PlannedField[], typeText: string, indent: string): string {
  if (fields.length === 0) {
    return `fromIsSame<${typeText}>(() => true)`;
  }
  return `fromIsSame<${typeText}>(\n${indent}  ${conjunction(fields, `${indent}  `)},\n${indent})`;
}

function emitTarget(target: DeriveTarget, plan: HoistPlan): string {
  const name = instanceNameFor(target.typeName);
  const { hoisted, fields } = planFields(target, plan);

  if (target.typeParameters.length === 0) {
    return [
      ...hoisted,
      `export const ${name}: IsSame<${target.typeName}> = ${emitBody(fields, target.typeName, "")};`
    ].join("\n");
  }

  const shape = shapeFields(target.shape);
  const typeText = `${target.typeName}<${target.typeParameters.join(", ")}>`;
  const params = target.typeParameters.map((p) => {
    const used = shape.some((f) => usesTypeParameter(f.comparator, p));
    return `${used ? "" : "_"}${instanceNameFor(p)}: IsSame<${p}>`;
  });

  return [
    `export function ${name}<${target.typeParameters.join(", ")}>(${params.join(", ")}): IsSame<${typeText}> {`,
    ...hoisted.map((line) => `  ${line}`),
    `  return ${emitBody(fields, typeText, "  ")};`,
    "}"
  ].join("\n");
}

function importSpecifiers(names: Iterable<string>): string {
  return Array.from(names).sort().join(", ");
}

/** Render the generated module for one annotated source file. */
export function emitModule(opts: EmitModuleOptions): string {
  const coreTypes = Array.from(opts.imports.coreTypes, ([local, exported]) =>
    local === exported ? local : `${exported} as ${local}`
  );

  const lines = [
    `// Generated by is-same-derive from ${opts.sourceName}. Do not edit.`,
    `import { ${importSpecifiers(opts.imports.coreValues)} } from ${JSON.stringify(opts.importSource)};`,
    `import type { ${importSpecifiers(["IsSame", ...coreTypes])} } from ${JSON.stringify(opts.importSource)};`,
    "",
    `import type { ${importSpecifiers(opts.targets.map((t) => t.typeName))} } from ${JSON.stringify(opts.sourceSpecifier)};`
  ];

  const plan = new HoistPlan(opts.targets, opts.imports.coreValues);
  for (const target of opts.targets) {
    lines.push("", emitTarget(target, plan));
  }

  return `${lines.join("\n")}\n`;
}
