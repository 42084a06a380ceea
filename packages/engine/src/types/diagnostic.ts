/**
 * Diagnostic types for metadata derivation
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Schema definition errors (MD1001-MD1099), independent of any interface
  | "MD1001" // Malformed schema parameter or schema option
  | "MD1002" // Schema embeds itself
  // Matching errors (MD2001-MD2099), collected per derivation
  | "MD2001" // No real declaration matches
  | "MD2002" // More than one real declaration matches
  | "MD2003" // Real member consumed by several schema parameters
  | "MD2004" // Two matches share one externally-facing name
  | "MD2005" // Member passes the tag filters but has another declared type
  // Contextual lookup errors (MD3001-MD3099)
  | "MD3001" // No registered instance for the requested type
  // Interface model loading (MD4001-MD4099)
  | "MD4001" // Source file not found
  | "MD4002" // Failed to read source file
  | "MD4003" // Supertype could not be resolved
  | "MD4004" // Interface not found
  // Emission (MD5001-MD5099)
  | "MD5001"; // Value cannot be emitted as source

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
  readonly relatedLocations?: readonly SourceLocation[];
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string,
  relatedLocations?: readonly SourceLocation[]
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
  relatedLocations,
});

/**
 * Shorthand for error diagnostics; undefined related locations are dropped.
 */
export const errorDiagnostic = (
  code: DiagnosticCode,
  message: string,
  location?: SourceLocation,
  related: readonly (SourceLocation | undefined)[] = [],
  hint?: string
): Diagnostic => {
  const relatedLocations = related.filter(
    (loc): loc is SourceLocation => loc !== undefined
  );
  return createDiagnostic(
    code,
    "error",
    message,
    location,
    hint,
    relatedLocations.length > 0 ? relatedLocations : undefined
  );
};

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatLocation = (location: SourceLocation): string =>
  `${location.file}:${location.line}:${location.column}`;

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(formatLocation(diagnostic.location));
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

/**
 * Multi-line rendering for build output: the diagnostic followed by one
 * indented line per related location.
 */
export const formatDiagnosticWithRelated = (diagnostic: Diagnostic): string =>
  [
    formatDiagnostic(diagnostic),
    ...(diagnostic.relatedLocations ?? []).map(
      (loc) => `  related: ${formatLocation(loc)}`
    ),
  ].join("\n");

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

export const mergeDiagnostics = (
  collector1: DiagnosticsCollector,
  collector2: DiagnosticsCollector
): DiagnosticsCollector => ({
  diagnostics: [...collector1.diagnostics, ...collector2.diagnostics],
  hasErrors: collector1.hasErrors || collector2.hasErrors,
});
