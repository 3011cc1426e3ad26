import * as ts from "typescript";

import { UnsupportedFieldTypeError } from "../util/errors.js";
import type { DeriveErrorLocation } from "../util/errors.js";
import { instanceNameFor, isCoreTypeExport, isCoreValueExport } from "./names.js";
import type { Comparator, FieldComparator, ModuleImports } from "./types.js";

export interface ResolveContext {
  sf: ts.SourceFile;
  filePath: string;
  typeName: string;
  typeParameters: ReadonlySet<string>;
  /** Derived declarations in this file: name -> type parameter count. */
  derived: ReadonlyMap<string, number>;
  /** Local names imported from the protocol module -> exported name. */
  coreImports: ReadonlyMap<string, string>;
  imports: ModuleImports;
  /** Set while resolving inside an inline object type (whose text is re-emitted). */
  inTypeText?: boolean;
}

export function locationOf(ctx: Pick<ResolveContext, "sf" | "filePath">, node: ts.Node): DeriveErrorLocation {
  const lc = ctx.sf.getLineAndCharacterOfPosition(node.getStart(ctx.sf));
  return { filePath: ctx.filePath, line: lc.line + 1, col: lc.character + 1 };
}

function unsupported(ctx: ResolveContext, node: ts.Node, detail: string): UnsupportedFieldTypeError {
  return new UnsupportedFieldTypeError(ctx.typeName, locationOf(ctx, node), detail);
}

function instance(ctx: ResolveContext, name: string): Comparator {
  ctx.imports.coreValues.add(name);
  return { kind: "instance", name };
}

function factory(ctx: ResolveContext, name: string, args: Comparator[]): Comparator {
  ctx.imports.coreValues.add(name);
  return { kind: "factory", name, args };
}

function isFactory(c: Comparator, name: string): boolean {
  return c.kind === "factory" && c.name === name;
}

/** Wrap for an optional member (`name?: T`), unless the type already admits `undefined`. */
export function optionalComparator(ctx: ResolveContext, inner: Comparator): Comparator {
  return isFactory(inner, "optional") ? inner : factory(ctx, "optional", [inner]);
}

function typeArgument(ctx: ResolveContext, node: ts.TypeReferenceNode, index: number, expected: number): ts.TypeNode {
  const args = node.typeArguments ?? [];
  const arg = args[index];
  if (args.length !== expected || !arg) {
    throw unsupported(ctx, node, `expected ${expected} type argument(s) for ${node.typeName.getText(ctx.sf)}`);
  }
  return arg;
}

function resolveLiteral(ctx: ResolveContext, node: ts.LiteralTypeNode): Comparator {
  const literal = node.literal;
  switch (literal.kind) {
    case ts.SyntaxKind.NullKeyword:
      return instance(ctx, "unit");
    case ts.SyntaxKind.TrueKeyword:
    case ts.SyntaxKind.FalseKeyword:
      return instance(ctx, "boolean");
    case ts.SyntaxKind.StringLiteral:
    case ts.SyntaxKind.NoSubstitutionTemplateLiteral:
      return instance(ctx, "string");
    case ts.SyntaxKind.NumericLiteral:
    case ts.SyntaxKind.PrefixUnaryExpression:
      return instance(ctx, "float64");
    case ts.SyntaxKind.BigIntLiteral:
      return instance(ctx, "bigint");
    default:
      throw unsupported(ctx, node, `unsupported literal type ${node.getText(ctx.sf)}`);
  }
}

function isUndefinedType(node: ts.TypeNode): boolean {
  return node.kind === ts.SyntaxKind.UndefinedKeyword || node.kind === ts.SyntaxKind.VoidKeyword;
}

function isNullType(node: ts.TypeNode): boolean {
  return ts.isLiteralTypeNode(node) && node.literal.kind === ts.SyntaxKind.NullKeyword;
}

function resolveUnion(ctx: ResolveContext, node: ts.UnionTypeNode): Comparator {
  const admitsUndefined = node.types.some(isUndefinedType);
  const admitsNull = node.types.some(isNullType);
  const rest = node.types.filter((t) => !isUndefinedType(t) && !isNullType(t));

  let inner: Comparator;
  const [only] = rest;
  if (!only) {
    return instance(ctx, "unit");
  } else if (rest.length === 1) {
    inner = resolveTypeNode(ctx, only);
  } else {
    // Unions of literals of one primitive kind ("a" | "b", true | false) share its instance.
    const resolved = rest.map((t) => resolveTypeNode(ctx, t));
    const names = new Set(resolved.map((c) => (c.kind === "instance" ? c.name : undefined)));
    const [name] = names;
    if (names.size !== 1 || name === undefined) {
      throw unsupported(ctx, node, `union of ${rest.length} alternatives (${node.getText(ctx.sf)})`);
    }
    inner = instance(ctx, name);
  }

  if (admitsNull) inner = factory(ctx, "nullable", [inner]);
  if (admitsUndefined) inner = factory(ctx, "optional", [inner]);
  return inner;
}

export function memberKey(ctx: ResolveContext, name: ts.PropertyName): string {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  throw unsupported(ctx, name, `unsupported property name ${name.getText(ctx.sf)}`);
}

function resolveTypeLiteral(ctx: ResolveContext, node: ts.TypeLiteralNode): Comparator {
  const inner: ResolveContext = { ...ctx, inTypeText: true };
  const fields: FieldComparator[] = node.members.map((member) => {
    if (!ts.isPropertySignature(member)) {
      throw unsupported(ctx, member, "inline object types may only contain properties");
    }
    return resolvePropertySignature(inner, member);
  });

  if (fields.length === 0) {
    ctx.imports.coreValues.add("unitRecord");
  } else {
    ctx.imports.coreValues.add("record");
  }
  return { kind: "record", typeText: node.getText(ctx.sf), fields };
}

function resolveTuple(ctx: ResolveContext, node: ts.TupleTypeNode): Comparator {
  const elements = node.elements.map((element) => {
    if (ts.isNamedTupleMember(element)) {
      if (element.dotDotDotToken || element.questionToken) {
        throw unsupported(ctx, element, "optional and rest tuple elements are not supported");
      }
      return resolveTypeNode(ctx, element.type);
    }
    if (ts.isOptionalTypeNode(element) || ts.isRestTypeNode(element)) {
      throw unsupported(ctx, element, "optional and rest tuple elements are not supported");
    }
    return resolveTypeNode(ctx, element);
  });
  return factory(ctx, "tuple", elements);
}

function resolveCoreType(ctx: ResolveContext, node: ts.TypeReferenceNode, localName: string, exportName: string): Comparator {
  if (ctx.inTypeText) {
    ctx.imports.coreTypes.set(localName, exportName);
  }

  switch (exportName) {
    case "Shared":
      typeArgument(ctx, node, 0, 1);
      return factory(ctx, "shared", []);
    case "Cow":
      return factory(ctx, "cow", [resolveTypeNode(ctx, typeArgument(ctx, node, 0, 1))]);
    case "PathLike":
      return instance(ctx, "path");
    case "TypeToken":
      return instance(ctx, "typeToken");
    default:
      throw unsupported(ctx, node, `${exportName} has no IsSame instance`);
  }
}

function resolveTypeReference(ctx: ResolveContext, node: ts.TypeReferenceNode): Comparator {
  if (!ts.isIdentifier(node.typeName)) {
    throw unsupported(ctx, node, `qualified type names are not supported (${node.typeName.getText(ctx.sf)})`);
  }
  const name = node.typeName.text;

  if (ctx.typeParameters.has(name)) {
    return { kind: "typeParameter", name };
  }

  const coreExport = ctx.coreImports.get(name);
  if (coreExport !== undefined && isCoreTypeExport(coreExport)) {
    return resolveCoreType(ctx, node, name, coreExport);
  }

  const arity = ctx.derived.get(name);
  if (arity !== undefined) {
    const args = node.typeArguments ?? [];
    if (args.length !== arity) {
      throw unsupported(ctx, node, `${name} expects ${arity} type argument(s), got ${args.length}`);
    }
    return { kind: "derived", typeName: name, typeArgs: args.map((arg) => resolveTypeNode(ctx, arg)) };
  }

  switch (name) {
    case "Array":
    case "ReadonlyArray":
      return factory(ctx, "array", [resolveTypeNode(ctx, typeArgument(ctx, node, 0, 1))]);
    case "Readonly":
      return resolveTypeNode(ctx, typeArgument(ctx, node, 0, 1));
    case "Uint8Array":
      return instance(ctx, "bytes");
    case "Map":
    case "ReadonlyMap":
      typeArgument(ctx, node, 0, 2);
      return factory(ctx, "hashMap", [resolveTypeNode(ctx, typeArgument(ctx, node, 1, 2))]);
    case "Set":
    case "ReadonlySet":
      typeArgument(ctx, node, 0, 1);
      return factory(ctx, "hashSet", []);
    case "URL":
      return instance(ctx, "path");
    default:
      throw unsupported(
        ctx,
        node,
        `no IsSame instance for type ${node.getText(ctx.sf)} (annotate it with @derive IsSame or the field with @isSame)`
      );
  }
}

/** Map a field's type annotation to a comparator tree. */
export function resolveTypeNode(ctx: ResolveContext, node: ts.TypeNode): Comparator {
  switch (node.kind) {
    case ts.SyntaxKind.NumberKeyword:
      return instance(ctx, "float64");
    case ts.SyntaxKind.StringKeyword:
      return instance(ctx, "string");
    case ts.SyntaxKind.BooleanKeyword:
      return instance(ctx, "boolean");
    case ts.SyntaxKind.BigIntKeyword:
      return instance(ctx, "bigint");
    case ts.SyntaxKind.SymbolKeyword:
      return instance(ctx, "identity");
    case ts.SyntaxKind.UndefinedKeyword:
    case ts.SyntaxKind.VoidKeyword:
      return instance(ctx, "unit");
  }

  if (ts.isParenthesizedTypeNode(node)) return resolveTypeNode(ctx, node.type);
  if (ts.isLiteralTypeNode(node)) return resolveLiteral(ctx, node);
  if (ts.isUnionTypeNode(node)) return resolveUnion(ctx, node);
  if (ts.isArrayTypeNode(node)) return factory(ctx, "array", [resolveTypeNode(ctx, node.elementType)]);
  if (ts.isTupleTypeNode(node)) return resolveTuple(ctx, node);
  if (ts.isTypeLiteralNode(node)) return resolveTypeLiteral(ctx, node);
  if (ts.isTypeReferenceNode(node)) return resolveTypeReference(ctx, node);

  if (ts.isTypeOperatorNode(node) && node.operator === ts.SyntaxKind.ReadonlyKeyword) {
    return resolveTypeNode(ctx, node.type);
  }

  throw unsupported(ctx, node, `no IsSame instance for type ${node.getText(ctx.sf)}`);
}

function bindingNames(name: ts.BindingName, out: Set<string>): void {
  if (ts.isIdentifier(name)) {
    out.add(name.text);
    return;
  }
  for (const element of name.elements) {
    if (ts.isBindingElement(element)) bindingNames(element.name, out);
  }
}

function parseOverride(ctx: ResolveContext, node: ts.Node, text: string): Comparator {
  const exprSf = ts.createSourceFile("is-same-override.ts", `(${text});`, ts.ScriptTarget.Latest, false, ts.ScriptKind.TS);
  const [stmt] = exprSf.statements;
  if (exprSf.statements.length !== 1 || !stmt || !ts.isExpressionStatement(stmt)) {
    throw unsupported(ctx, node, `@isSame must be a single expression (got ${text})`);
  }

  const allowedLocal = new Set<string>([
    ...Array.from(ctx.derived.keys(), instanceNameFor),
    ...Array.from(ctx.typeParameters, instanceNameFor)
  ]);

  const check = (id: ts.Identifier, bound: ReadonlySet<string>): void => {
    if (bound.has(id.text)) return;
    if (isCoreValueExport(id.text)) {
      ctx.imports.coreValues.add(id.text);
    } else if (!allowedLocal.has(id.text)) {
      throw unsupported(ctx, node, `@isSame may only reference protocol exports and generated instances (got ${id.text})`);
    }
  };

  // Property names, member names and types are not references; lambda
  // parameters are bound inside the lambda body.
  const visit = (n: ts.Node, bound: ReadonlySet<string>): void => {
    if (ts.isTypeNode(n)) return;
    if (ts.isIdentifier(n)) {
      check(n, bound);
      return;
    }
    if (ts.isPropertyAccessExpression(n)) {
      visit(n.expression, bound);
      return;
    }
    if (ts.isPropertyAssignment(n)) {
      if (ts.isComputedPropertyName(n.name)) visit(n.name, bound);
      visit(n.initializer, bound);
      return;
    }
    if (ts.isShorthandPropertyAssignment(n)) {
      check(n.name, bound);
      return;
    }
    if (ts.isArrowFunction(n) || ts.isFunctionExpression(n)) {
      const inner = new Set(bound);
      for (const param of n.parameters) {
        bindingNames(param.name, inner);
        if (param.initializer) visit(param.initializer, inner);
      }
      visit(n.body, inner);
      return;
    }
    ts.forEachChild(n, (child) => visit(child, bound));
  };
  visit(stmt.expression, new Set());

  const expr = stmt.expression;
  const inner = ts.isParenthesizedExpression(expr) ? expr.expression : expr;
  const simple = ts.isIdentifier(inner) || ts.isCallExpression(inner) || ts.isPropertyAccessExpression(inner);
  const printed = inner.getText(exprSf);
  return { kind: "expression", text: simple ? printed : `(${printed})` };
}

function overrideText(node: ts.Node): string | undefined {
  for (const tag of ts.getJSDocTags(node)) {
    if (tag.tagName.text !== "isSame") continue;
    const text = ts.getTextOfJSDocComment(tag.comment)?.trim();
    if (text) return text;
  }
  return undefined;
}

/**
 * Resolve the comparator of a named member: an `@isSame` override wins,
 * otherwise its type annotation decides.
 */
export function resolveMember(
  ctx: ResolveContext,
  node: ts.PropertySignature | ts.PropertyDeclaration | ts.ParameterDeclaration,
  key: string
): FieldComparator {
  const override = overrideText(node);
  if (override !== undefined) {
    return { key, comparator: parseOverride(ctx, node, override) };
  }

  if (!node.type) {
    throw unsupported(ctx, node, `field ${key} has no type annotation`);
  }

  const comparator = resolveTypeNode(ctx, node.type);
  return { key, comparator: node.questionToken ? optionalComparator(ctx, comparator) : comparator };
}

function resolvePropertySignature(ctx: ResolveContext, member: ts.PropertySignature): FieldComparator {
  return resolveMember(ctx, member, memberKey(ctx, member.name));
}
