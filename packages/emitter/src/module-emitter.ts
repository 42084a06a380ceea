/**
 * Module emitter - one generated TypeScript module per set of derivations
 */

import * as ts from "typescript";
import {
  errorDiagnostic,
  error,
  ok,
  type DerivedTree,
  type DiagnosticsCollector,
  type Result,
} from "@metaderive/engine";
import { generateFileHeader } from "./constants.js";
import { defaultExportName, isIdentifierName } from "./naming.js";
import {
  createContext,
  defaultOptions,
  withDiagnostic,
  type EmitterOptions,
  type ImportBinding,
} from "./types.js";
import { emitNode } from "./value-emitter.js";

const factory = ts.factory;

export type EmitEntry = {
  readonly tree: DerivedTree<unknown>;
  /** Defaults to the camel-cased interface name followed by the schema name */
  readonly exportName?: string;
};

/**
 * Emit the value trees as exported `as const` declarations. Lookups are
 * imported from the registered source modules.
 */
export const emitMetadataModule = (
  entries: readonly EmitEntry[],
  options: Partial<EmitterOptions> = {}
): Result<string, DiagnosticsCollector> => {
  const finalOptions: EmitterOptions = { ...defaultOptions, ...options };
  let context = createContext(finalOptions);
  const statements: ts.Statement[] = [];
  const exported = new Set<string>();

  for (const entry of entries) {
    const name =
      entry.exportName ??
      defaultExportName(entry.tree.iface.name, entry.tree.schema.name);

    if (!isIdentifierName(name) || exported.has(name)) {
      context = withDiagnostic(
        errorDiagnostic(
          "MD5001",
          exported.has(name)
            ? `Export ${name} is emitted more than once`
            : `Export name ${JSON.stringify(name)} is not a valid identifier`
        ),
        context
      );
      continue;
    }
    exported.add(name);

    const [expression, next] = emitNode(entry.tree.root, context);
    context = next;
    statements.push(exportConst(name, expression));
  }

  if (context.diagnostics.hasErrors) {
    return error(context.diagnostics);
  }

  const header = generateFileHeader(finalOptions.source, {
    includeTimestamp: finalOptions.includeTimestamp,
    timestamp: finalOptions.timestamp,
  });
  const imports = importDeclarations(context.imports);
  const sections = [
    header,
    ...(imports.length > 0 ? [imports.map(printNode).join("\n") + "\n"] : []),
    statements.map(printNode).join("\n\n") + "\n",
  ];
  return ok(sections.join("\n"));
};

const exportConst = (name: string, expression: ts.Expression): ts.Statement =>
  factory.createVariableStatement(
    [factory.createModifier(ts.SyntaxKind.ExportKeyword)],
    factory.createVariableDeclarationList(
      [
        factory.createVariableDeclaration(
          name,
          undefined,
          undefined,
          factory.createAsExpression(
            expression,
            factory.createTypeReferenceNode("const")
          )
        ),
      ],
      ts.NodeFlags.Const
    )
  );

/**
 * One declaration per module, in order of first use
 */
const importDeclarations = (
  bindings: readonly ImportBinding[]
): readonly ts.ImportDeclaration[] => {
  const byModule = new Map<string, ImportBinding[]>();
  for (const binding of bindings) {
    byModule.set(binding.module, [...(byModule.get(binding.module) ?? []), binding]);
  }
  return [...byModule.entries()].map(([module, moduleBindings]) =>
    factory.createImportDeclaration(
      undefined,
      factory.createImportClause(
        false,
        undefined,
        factory.createNamedImports(
          moduleBindings.map((binding) =>
            factory.createImportSpecifier(
              false,
              binding.localName === binding.exportName
                ? undefined
                : factory.createIdentifier(binding.exportName),
              factory.createIdentifier(binding.localName)
            )
          )
        )
      ),
      factory.createStringLiteral(module)
    )
  );
};

const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
const printTarget = ts.createSourceFile(
  "metadata.ts",
  "",
  ts.ScriptTarget.ES2022,
  false,
  ts.ScriptKind.TS
);

export const printNode = (node: ts.Node): string =>
  printer.printNode(ts.EmitHint.Unspecified, node, printTarget);
