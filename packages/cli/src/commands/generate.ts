/**
 * metaderive generate command - derive every target and write its module
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join, relative } from "node:path";
import {
  deriveTree,
  emptyResolver,
  error,
  ok,
  type Diagnostic,
  type RealInterface,
  type Result,
  type Schema,
} from "@metaderive/engine";
import { findInterface, loadInterfaces } from "@metaderive/frontend";
import { emitMetadataModule, type EmitEntry } from "@metaderive/emitter";
import { METADATA_FILE_SUFFIX } from "../cli/constants.js";
import { reportDiagnostics } from "../report.js";
import type { ResolvedConfig, SchemaModule, TargetConfig } from "../types.js";

type GeneratedModule = {
  readonly path: string;
  readonly content: string;
};

const isInterfaceSchema = (
  schema: Schema<unknown>
): schema is Schema<unknown, "interface"> => schema.scope === "interface";

/**
 * Group targets by interface, keeping the configured order
 */
const targetsByInterface = (
  targets: readonly TargetConfig[]
): ReadonlyMap<string, readonly TargetConfig[]> => {
  const grouped = new Map<string, TargetConfig[]>();
  for (const target of targets) {
    grouped.set(target.interface, [...(grouped.get(target.interface) ?? []), target]);
  }
  return grouped;
};

const deriveTarget = (
  target: TargetConfig,
  iface: RealInterface,
  schemaModule: SchemaModule
): Result<EmitEntry, readonly Diagnostic[] | string> => {
  const schema = schemaModule.schemas.get(target.schema);
  if (!schema) {
    return error(`Schema '${target.schema}' is not exported by the schema module`);
  }
  if (!isInterfaceSchema(schema)) {
    return error(
      `Schema '${target.schema}' has ${schema.scope} scope; targets need an interface-scope schema`
    );
  }

  const tree = deriveTree(schema, iface, { resolver: schemaModule.context });
  return tree.ok
    ? ok({ tree: tree.value, exportName: target.exportName })
    : error(tree.error.diagnostics);
};

/**
 * Derive and emit every configured target. Nothing is written unless every
 * target succeeds.
 */
export const generateCommand = (
  config: ResolvedConfig,
  schemaModule: SchemaModule
): Result<readonly string[], string> => {
  const loaded = loadInterfaces(config.sources, schemaModule.annotations);
  if (!loaded.ok) {
    reportDiagnostics(loaded.error.diagnostics, config.quiet);
    return error("Failed to load interface sources");
  }
  reportDiagnostics(loaded.value.diagnostics.diagnostics, config.quiet);

  const modules: GeneratedModule[] = [];
  let failures = 0;

  for (const [interfaceName, targets] of targetsByInterface(config.targets)) {
    const iface = findInterface(loaded.value, interfaceName);
    if (!iface.ok) {
      reportDiagnostics([iface.error], config.quiet);
      failures += targets.length;
      continue;
    }

    const entries: EmitEntry[] = [];
    for (const target of targets) {
      if (config.verbose) {
        console.log(`  Deriving ${target.schema} for ${interfaceName}`);
      }
      const derived = deriveTarget(target, iface.value, schemaModule);
      if (derived.ok) {
        entries.push(derived.value);
      } else if (typeof derived.error === "string") {
        console.error(`Error: ${derived.error}`);
        failures++;
      } else {
        reportDiagnostics(derived.error, config.quiet);
        failures++;
      }
    }
    if (entries.length < targets.length) {
      continue;
    }

    const location = iface.value.location;
    const emitted = emitMetadataModule(entries, {
      resolver: schemaModule.context ?? emptyResolver,
      source: location ? relative(config.projectRoot, location.file) : interfaceName,
      includeTimestamp: config.includeTimestamp,
    });
    if (!emitted.ok) {
      reportDiagnostics(emitted.error.diagnostics, config.quiet);
      failures += targets.length;
      continue;
    }

    modules.push({
      path: join(config.outputDirectory, `${interfaceName}${METADATA_FILE_SUFFIX}`),
      content: emitted.value,
    });
  }

  if (failures > 0) {
    return error(
      `${failures} of ${config.targets.length} target(s) failed; no files were written`
    );
  }

  mkdirSync(config.outputDirectory, { recursive: true });
  for (const generated of modules) {
    writeFileSync(generated.path, generated.content, "utf-8");
    if (!config.quiet) {
      console.log(`✓ Generated ${relative(config.projectRoot, generated.path)}`);
    }
  }

  return ok(modules.map((generated) => generated.path));
};
