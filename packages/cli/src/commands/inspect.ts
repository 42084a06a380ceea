/**
 * metaderive inspect command - print extracted interface models
 */

import { resolve } from "node:path";
import {
  describeParamFlags,
  error,
  formatAnnotation,
  ok,
  type Annotation,
  type RealInterface,
  type RealMethod,
  type RealParam,
  type Result,
} from "@metaderive/engine";
import { loadInterfaces } from "@metaderive/frontend";
import { reportDiagnostics } from "../report.js";
import type { ResolvedConfig, SchemaModule } from "../types.js";

const annotationSuffix = (annotations: readonly Annotation[]): string =>
  annotations.map((annotation) => ` ${formatAnnotation(annotation)}`).join("");

const formatParam = (param: RealParam): string =>
  `    param ${param.name}: ${param.type} (flags: ${describeParamFlags(param.flags)})${annotationSuffix(param.annotations)}`;

const formatMethod = (method: RealMethod): readonly string[] => [
  `  method ${method.owner}.${method.name}: ${method.resultType}${annotationSuffix(method.annotations)}`,
  ...method.parameterGroups.flat().map(formatParam),
];

/**
 * One line per interface, method and parameter, with own annotations
 */
export const formatInterface = (iface: RealInterface): readonly string[] => {
  const supertypes = iface.supertypes.map((supertype) => supertype.name);
  return [
    `interface ${iface.name}${supertypes.length > 0 ? ` extends ${supertypes.join(", ")}` : ""}${annotationSuffix(iface.annotations)}`,
    ...iface.methods.flatMap(formatMethod),
  ];
};

/**
 * Print the interfaces of one file, or of every configured source
 */
export const inspectCommand = (
  config: ResolvedConfig,
  schemaModule: SchemaModule,
  file?: string
): Result<readonly RealInterface[], string> => {
  const files = file ? [resolve(file)] : config.sources;
  const loaded = loadInterfaces(files, schemaModule.annotations);
  if (!loaded.ok) {
    reportDiagnostics(loaded.error.diagnostics, config.quiet);
    return error("Failed to load interface sources");
  }
  reportDiagnostics(loaded.value.diagnostics.diagnostics, config.quiet);

  const interfaces = [...loaded.value.interfaces.values()];
  for (const iface of interfaces) {
    for (const line of formatInterface(iface)) {
      console.log(line);
    }
  }
  return ok(interfaces);
};
