/**
 * Console output of diagnostics
 */

import {
  formatDiagnosticWithRelated,
  isError,
  type Diagnostic,
} from "@metaderive/engine";

/**
 * Errors are always printed; warnings and infos unless quiet.
 */
export const reportDiagnostics = (
  diagnostics: readonly Diagnostic[],
  quiet: boolean
): void => {
  for (const diagnostic of diagnostics) {
    if (isError(diagnostic) || !quiet) {
      console.error(formatDiagnosticWithRelated(diagnostic));
    }
  }
};
