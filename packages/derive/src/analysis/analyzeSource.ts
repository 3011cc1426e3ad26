import * as ts from "typescript";

import { DeriveError, UnsupportedShapeError } from "../util/errors.js";
import { locationOf, memberKey, resolveMember, resolveTypeNode } from "./resolveComparator.js";
import type { ResolveContext } from "./resolveComparator.js";
import type { AggregateShape, DeriveTarget, FieldComparator, ModuleImports } from "./types.js";

export interface AnalyzeSourceOptions {
  /** Root-relative path used in diagnostics. */
  filePath: string;
  importSource: string;
}

export interface SourceAnalysis {
  targets: DeriveTarget[];
  imports: ModuleImports;
}

type Annotated = {
  statement: ts.Statement;
  name: string;
};

function hasDeriveTag(node: ts.Node): boolean {
  return ts.getJSDocTags(node).some((tag) => {
    if (tag.tagName.text !== "derive") return false;
    const text = ts.getTextOfJSDocComment(tag.comment) ?? "";
    return /\bIsSame\b/.test(text);
  });
}

function statementName(statement: ts.Statement): string {
  if (
    (ts.isInterfaceDeclaration(statement) ||
      ts.isTypeAliasDeclaration(statement) ||
      ts.isClassDeclaration(statement) ||
      ts.isEnumDeclaration(statement) ||
      ts.isFunctionDeclaration(statement)) &&
    statement.name
  ) {
    return statement.name.text;
  }
  if (ts.isVariableStatement(statement)) {
    const [decl] = statement.declarationList.declarations;
    if (decl && ts.isIdentifier(decl.name)) return decl.name.text;
  }
  return "<anonymous>";
}

function isExported(statement: ts.Statement): boolean {
  const modifiers = ts.canHaveModifiers(statement) ? ts.getModifiers(statement) : undefined;
  return modifiers?.some((m) => m.kind === ts.SyntaxKind.ExportKeyword) ?? false;
}

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined;
  return modifiers?.some((m) => m.kind === kind) ?? false;
}

function collectCoreImports(sf: ts.SourceFile, importSource: string): Map<string, string> {
  const out = new Map<string, string>();
  for (const statement of sf.statements) {
    if (!ts.isImportDeclaration(statement)) continue;
    if (!ts.isStringLiteral(statement.moduleSpecifier) || statement.moduleSpecifier.text !== importSource) continue;

    const bindings = statement.importClause?.namedBindings;
    if (!bindings || !ts.isNamedImports(bindings)) continue;

    for (const element of bindings.elements) {
      out.set(element.name.text, (element.propertyName ?? element.name).text);
    }
  }
  return out;
}

function shapeError(ctx: ResolveContext, node: ts.Node, detail: string): UnsupportedShapeError {
  return new UnsupportedShapeError(ctx.typeName, locationOf(ctx, node), detail);
}

function namedOrUnit(fields: FieldComparator[]): AggregateShape {
  return fields.length === 0 ? { kind: "unit" } : { kind: "named", fields };
}

function typeElementFields(ctx: ResolveContext, members: ts.NodeArray<ts.TypeElement>): FieldComparator[] {
  return members.map((member) => {
    if (ts.isPropertySignature(member)) {
      if (ts.isComputedPropertyName(member.name) || ts.isPrivateIdentifier(member.name)) {
        throw shapeError(ctx, member, `computed property name ${member.name.getText(ctx.sf)}`);
      }
      return resolveMember(ctx, member, memberKey(ctx, member.name));
    }
    if (ts.isIndexSignatureDeclaration(member)) {
      throw shapeError(ctx, member, "index signatures have no fixed field list");
    }
    if (ts.isMethodSignature(member)) {
      throw shapeError(ctx, member, `method signature ${member.name.getText(ctx.sf)} is not a data field`);
    }
    throw shapeError(ctx, member, "call and construct signatures are not data fields");
  });
}

function classFields(ctx: ResolveContext, decl: ts.ClassDeclaration): FieldComparator[] {
  const fields: FieldComparator[] = [];

  for (const member of decl.members) {
    if (ts.isPropertyDeclaration(member)) {
      if (hasModifier(member, ts.SyntaxKind.StaticKeyword)) continue;
      if (ts.isPrivateIdentifier(member.name)) {
        throw shapeError(ctx, member, `private field ${member.name.text} cannot be compared from outside the class`);
      }
      if (hasModifier(member, ts.SyntaxKind.PrivateKeyword) || hasModifier(member, ts.SyntaxKind.ProtectedKeyword)) {
        throw shapeError(ctx, member, `non-public field ${member.name.getText(ctx.sf)} cannot be compared from outside the class`);
      }
      if (ts.isComputedPropertyName(member.name)) {
        throw shapeError(ctx, member, `computed property name ${member.name.getText(ctx.sf)}`);
      }
      fields.push(resolveMember(ctx, member, memberKey(ctx, member.name)));
      continue;
    }

    if (ts.isConstructorDeclaration(member)) {
      for (const param of member.parameters) {
        if (!ts.isParameterPropertyDeclaration(param, member)) continue;
        if (hasModifier(param, ts.SyntaxKind.PrivateKeyword) || hasModifier(param, ts.SyntaxKind.ProtectedKeyword)) {
          throw shapeError(ctx, param, `non-public field ${param.name.getText(ctx.sf)} cannot be compared from outside the class`);
        }
        fields.push(resolveMember(ctx, param, param.name.text));
      }
    }
  }

  return fields;
}

function typeParameterNames(
  ctx: ResolveContext,
  params: ts.NodeArray<ts.TypeParameterDeclaration> | undefined
): string[] {
  return (params ?? []).map((param) => {
    if (param.constraint || param.default) {
      throw shapeError(ctx, param, `type parameter ${param.name.text} has a constraint or default`);
    }
    return param.name.text;
  });
}

function shapeOf(ctx: ResolveContext, statement: ts.Statement): AggregateShape {
  if (ts.isInterfaceDeclaration(statement)) {
    if (statement.heritageClauses && statement.heritageClauses.length > 0) {
      throw shapeError(ctx, statement, "interfaces that extend other types are not supported");
    }
    return namedOrUnit(typeElementFields(ctx, statement.members));
  }

  if (ts.isClassDeclaration(statement)) {
    const extendsClause = statement.heritageClauses?.some((h) => h.token === ts.SyntaxKind.ExtendsKeyword);
    if (extendsClause) {
      throw shapeError(ctx, statement, "classes that extend other classes are not supported");
    }
    return namedOrUnit(classFields(ctx, statement));
  }

  if (ts.isTypeAliasDeclaration(statement)) {
    let type = statement.type;
    while (ts.isParenthesizedTypeNode(type)) type = type.type;

    if (ts.isTypeLiteralNode(type)) {
      return namedOrUnit(typeElementFields(ctx, type.members));
    }
    if (ts.isTupleTypeNode(type)) {
      const fields = type.elements.map((element, index): FieldComparator => {
        if (ts.isOptionalTypeNode(element) || ts.isRestTypeNode(element)) {
          throw shapeError(ctx, element, "optional and rest tuple elements have no fixed position");
        }
        if (ts.isNamedTupleMember(element)) {
          if (element.dotDotDotToken || element.questionToken) {
            throw shapeError(ctx, element, "optional and rest tuple elements have no fixed position");
          }
          return { key: index, comparator: resolveTypeNode(ctx, element.type) };
        }
        return { key: index, comparator: resolveTypeNode(ctx, element) };
      });
      return fields.length === 0 ? { kind: "unit" } : { kind: "positional", fields };
    }
    if (ts.isUnionTypeNode(type)) {
      throw shapeError(ctx, statement, `union with ${type.types.length} alternative variants`);
    }
    throw shapeError(ctx, statement, `type alias of ${ts.SyntaxKind[type.kind]} is not a record or tuple`);
  }

  if (ts.isEnumDeclaration(statement)) {
    throw shapeError(ctx, statement, `enum with ${statement.members.length} alternative variants`);
  }

  throw shapeError(ctx, statement, `${ts.SyntaxKind[statement.kind]} is not a record type`);
}

function typeParametersOf(statement: ts.Statement): ts.NodeArray<ts.TypeParameterDeclaration> | undefined {
  if (ts.isInterfaceDeclaration(statement) || ts.isTypeAliasDeclaration(statement) || ts.isClassDeclaration(statement)) {
    return statement.typeParameters;
  }
  return undefined;
}

/**
 * Find every top-level declaration tagged `@derive IsSame` and resolve its
 * shape.
 *
 * Throws a {@link DeriveError} for the first declaration that cannot be
 * derived.
 */
export function analyzeSource(sf: ts.SourceFile, opts: AnalyzeSourceOptions): SourceAnalysis {
  const annotated: Annotated[] = sf.statements
    .filter(hasDeriveTag)
    .map((statement) => ({ statement, name: statementName(statement) }));

  const derived = new Map<string, number>();
  for (const { statement, name } of annotated) {
    derived.set(name, typeParametersOf(statement)?.length ?? 0);
  }

  const imports: ModuleImports = { coreValues: new Set(), coreTypes: new Map() };
  const coreImports = collectCoreImports(sf, opts.importSource);

  const targets = annotated.map(({ statement, name }): DeriveTarget => {
    const base: ResolveContext = {
      sf,
      filePath: opts.filePath,
      typeName: name,
      typeParameters: new Set(),
      derived,
      coreImports,
      imports
    };

    if (!isExported(statement)) {
      throw new DeriveError(name, locationOf(base, statement), "annotated declarations must be exported");
    }

    const typeParameters = typeParameterNames(base, typeParametersOf(statement));
    const ctx: ResolveContext = { ...base, typeParameters: new Set(typeParameters) };

    return {
      typeName: name,
      typeParameters,
      shape: shapeOf(ctx, statement),
      location: locationOf(ctx, statement)
    };
  });

  if (targets.length > 0) {
    imports.coreValues.add("fromIsSame");
  }

  return { targets, imports };
}
