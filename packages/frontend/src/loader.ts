/**
 * Loading interface models from files on disk
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
  error,
  mergeDiagnostics,
  ok,
  type AnnotationRegistry,
  type Diagnostic,
  type DiagnosticsCollector,
  type RealInterface,
  type Result,
} from "@metaderive/engine";
import {
  extractInterfaces,
  parseSource,
  type ExtractedInterfaces,
} from "./extractor.js";

/**
 * Read, parse and extract the given files together, so interfaces may
 * extend interfaces of other files in the set.
 */
export const loadInterfaces = (
  filePaths: readonly string[],
  registry: AnnotationRegistry
): Result<ExtractedInterfaces, DiagnosticsCollector> => {
  const files: ReturnType<typeof parseSource>[] = [];
  let diagnostics = createDiagnosticsCollector();

  for (const filePath of filePaths) {
    const absolutePath = path.resolve(filePath);
    if (!fs.existsSync(absolutePath)) {
      diagnostics = addDiagnostic(
        diagnostics,
        createDiagnostic("MD4001", "error", `Source file not found: ${filePath}`)
      );
      continue;
    }
    try {
      files.push(parseSource(fs.readFileSync(absolutePath, "utf-8"), absolutePath));
    } catch (e) {
      diagnostics = addDiagnostic(
        diagnostics,
        createDiagnostic(
          "MD4002",
          "error",
          `Failed to read ${filePath}: ${e instanceof Error ? e.message : String(e)}`
        )
      );
    }
  }

  if (diagnostics.hasErrors) {
    return error(diagnostics);
  }

  const extracted = extractInterfaces(files, registry);
  return ok({
    interfaces: extracted.interfaces,
    diagnostics: mergeDiagnostics(diagnostics, extracted.diagnostics),
  });
};

export const findInterface = (
  extracted: ExtractedInterfaces,
  name: string
): Result<RealInterface, Diagnostic> => {
  const found = extracted.interfaces.get(name);
  if (found) {
    return ok(found);
  }
  const known = [...extracted.interfaces.keys()];
  return error(
    createDiagnostic(
      "MD4004",
      "error",
      `Interface ${name} not found`,
      undefined,
      known.length > 0 ? `Declared interfaces: ${known.join(", ")}` : undefined
    )
  );
};
