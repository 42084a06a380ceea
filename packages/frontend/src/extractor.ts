/**
 * Interface extraction.
 *
 * Builds RealInterface values from the interface declarations of parsed
 * TypeScript sources. Only syntax is consulted: supertypes are resolved by
 * name among the interfaces of the same extraction.
 */

import * as ts from "typescript";
import {
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
  realInterface,
  realMethod,
  realParam,
  type AnnotationRegistry,
  type DiagnosticsCollector,
  type ParamFlagName,
  type ParamSpec,
  type RealInterface,
  type RealMethod,
} from "@metaderive/engine";
import { readAnnotations } from "./annotations.js";
import { nodeLocation } from "./location.js";

export type ExtractedInterfaces = {
  readonly interfaces: ReadonlyMap<string, RealInterface>;
  /** Warnings about declarations that were skipped */
  readonly diagnostics: DiagnosticsCollector;
};

type Declaration = {
  readonly node: ts.InterfaceDeclaration;
  readonly file: ts.SourceFile;
};

export const parseSource = (
  sourceText: string,
  fileName: string
): ts.SourceFile =>
  ts.createSourceFile(fileName, sourceText, ts.ScriptTarget.ES2022, true);

export const extractFromSource = (
  sourceText: string,
  fileName: string,
  registry: AnnotationRegistry
): ExtractedInterfaces =>
  extractInterfaces([parseSource(sourceText, fileName)], registry);

/**
 * Extract every top-level interface. Declarations sharing a name are merged
 * in source order.
 */
export const extractInterfaces = (
  files: readonly ts.SourceFile[],
  registry: AnnotationRegistry
): ExtractedInterfaces => {
  const declarations = new Map<string, Declaration[]>();
  for (const file of files) {
    for (const statement of file.statements) {
      if (ts.isInterfaceDeclaration(statement)) {
        const name = statement.name.text;
        const existing = declarations.get(name) ?? [];
        declarations.set(name, [...existing, { node: statement, file }]);
      }
    }
  }

  const built = new Map<string, RealInterface>();
  const inProgress = new Set<string>();
  let diagnostics = createDiagnosticsCollector();

  const build = (name: string): RealInterface | undefined => {
    const done = built.get(name);
    if (done) {
      return done;
    }
    const parts = declarations.get(name);
    if (!parts || inProgress.has(name)) {
      return undefined;
    }
    inProgress.add(name);

    const supertypes = parts.flatMap(({ node, file }) =>
      heritageNames(node, file).flatMap(({ name: superName, expression }) => {
        const supertype = build(superName);
        if (supertype) {
          return [supertype];
        }
        diagnostics = addDiagnostic(
          diagnostics,
          createDiagnostic(
            "MD4003",
            "warning",
            `Supertype ${superName} of interface ${name} could not be resolved; its methods are ignored`,
            nodeLocation(expression, file)
          )
        );
        return [];
      })
    );

    const inherited = supertypes.flatMap((supertype) => supertype.methods);
    const own = parts.flatMap(({ node, file }) =>
      node.members
        .filter(ts.isMethodSignature)
        .map((member) => buildMethod(member, file, name, inherited, registry))
    );
    const ownNames = new Set(own.map((method) => method.name));
    const kept = inherited.filter(
      (method, index) =>
        !ownNames.has(method.name) && inherited.indexOf(method) === index
    );

    const [first] = parts;
    const iface = realInterface(name, {
      annotations: parts.flatMap(({ node, file }) =>
        readAnnotations(node, file, registry)
      ),
      supertypes,
      methods: [...own, ...kept],
      location: first ? nodeLocation(first.node.name, first.file) : undefined,
    });

    inProgress.delete(name);
    built.set(name, iface);
    return iface;
  };

  for (const name of declarations.keys()) {
    build(name);
  }

  return { interfaces: built, diagnostics };
};

const heritageNames = (
  node: ts.InterfaceDeclaration,
  file: ts.SourceFile
): readonly { readonly name: string; readonly expression: ts.Expression }[] =>
  (node.heritageClauses ?? [])
    .filter((clause) => clause.token === ts.SyntaxKind.ExtendsKeyword)
    .flatMap((clause) => clause.types)
    .map((type) => ({
      name: type.expression.getText(file),
      expression: type.expression,
    }));

const memberName = (name: ts.PropertyName, file: ts.SourceFile): string =>
  ts.isIdentifier(name) ||
  ts.isStringLiteral(name) ||
  ts.isNumericLiteral(name) ||
  ts.isPrivateIdentifier(name)
    ? name.text
    : name.getText(file);

const buildMethod = (
  member: ts.MethodSignature,
  file: ts.SourceFile,
  owner: string,
  inherited: readonly RealMethod[],
  registry: AnnotationRegistry
): RealMethod => {
  const name = memberName(member.name, file);
  return realMethod(name, {
    owner,
    annotations: readAnnotations(member, file, registry),
    overrides: inherited.filter((method) => method.name === name),
    groups: [member.parameters.map((param) => buildParam(param, file, registry))],
    resultType: member.type ? member.type.getText(file) : "void",
    location: nodeLocation(member.name, file),
  });
};

const buildParam = (
  param: ts.ParameterDeclaration,
  file: ts.SourceFile,
  registry: AnnotationRegistry
): ParamSpec =>
  realParam(param.name.getText(file), {
    type: param.type ? param.type.getText(file) : "unknown",
    annotations: readAnnotations(param, file, registry),
    flags: paramFlagNames(param, file),
    location: nodeLocation(param.name, file),
  });

export const paramFlagNames = (
  param: ts.ParameterDeclaration,
  file: ts.SourceFile
): readonly ParamFlagName[] => {
  const flags: ParamFlagName[] = [];
  if (param.name.getText(file) === "this") {
    flags.push("contextual");
  }
  if (
    param.type &&
    ts.isFunctionTypeNode(param.type) &&
    param.type.parameters.length === 0
  ) {
    flags.push("lazy");
  }
  if (param.dotDotDotToken) {
    flags.push("variadic");
  }
  if (param.questionToken || param.initializer) {
    flags.push("hasDefault");
  }
  return flags;
};
