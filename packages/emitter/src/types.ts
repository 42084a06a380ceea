/**
 * Emitter types
 */

import {
  addDiagnostic,
  createDiagnosticsCollector,
  emptyResolver,
  type ContextResolver,
  type Diagnostic,
  type DiagnosticsCollector,
  type ValueSource,
} from "@metaderive/engine";

export type EmitterOptions = {
  /** Consulted for lookups left unresolved by matching */
  readonly resolver: ContextResolver;
  /** Where the metadata came from, for the file header */
  readonly source: string;
  readonly includeTimestamp: boolean;
  readonly timestamp?: string;
};

export const defaultOptions: EmitterOptions = {
  resolver: emptyResolver,
  source: "metaderive",
  includeTimestamp: true,
};

export type ImportBinding = ValueSource & {
  readonly localName: string;
};

export type EmitterContext = {
  readonly options: EmitterOptions;
  readonly imports: readonly ImportBinding[];
  readonly diagnostics: DiagnosticsCollector;
};

export const createContext = (options: EmitterOptions): EmitterContext => ({
  options,
  imports: [],
  diagnostics: createDiagnosticsCollector(),
});

/**
 * Local name bound to an imported value, adding the import on first use.
 * A name already bound to another import gets a numeric suffix.
 */
export const withImport = (
  source: ValueSource,
  context: EmitterContext
): [string, EmitterContext] => {
  const existing = context.imports.find(
    (binding) =>
      binding.module === source.module &&
      binding.exportName === source.exportName
  );
  if (existing) {
    return [existing.localName, context];
  }

  const taken = new Set(context.imports.map((binding) => binding.localName));
  let localName = source.exportName;
  for (let suffix = 2; taken.has(localName); suffix++) {
    localName = `${source.exportName}${suffix}`;
  }

  return [
    localName,
    { ...context, imports: [...context.imports, { ...source, localName }] },
  ];
};

export const withDiagnostic = (
  diagnostic: Diagnostic,
  context: EmitterContext
): EmitterContext => ({
  ...context,
  diagnostics: addDiagnostic(context.diagnostics, diagnostic),
});
