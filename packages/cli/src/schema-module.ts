/**
 * Loading the schema module named by metaderive.json
 */

import { existsSync } from "node:fs";
import { pathToFileURL } from "node:url";
import {
  AnnotationRegistry,
  error,
  ok,
  type ContextResolver,
  type Result,
  type Schema,
} from "@metaderive/engine";
import type { SchemaModule } from "./types.js";

const SCOPES: ReadonlySet<unknown> = new Set(["interface", "method", "parameter"]);

export const isSchema = (value: unknown): value is Schema<unknown> =>
  typeof value === "object" &&
  value !== null &&
  "name" in value &&
  typeof value.name === "string" &&
  "scope" in value &&
  SCOPES.has(value.scope) &&
  "params" in value &&
  Array.isArray(value.params) &&
  "construct" in value &&
  typeof value.construct === "function";

const isContextResolver = (value: unknown): value is ContextResolver =>
  typeof value === "object" &&
  value !== null &&
  "lookup" in value &&
  typeof value.lookup === "function";

/**
 * Build a SchemaModule from a module namespace: every export that is a
 * schema, the `annotations` registry and the optional `context`.
 */
export const readSchemaModule = (
  exports: Readonly<Record<string, unknown>>,
  modulePath: string
): Result<SchemaModule, string> => {
  const annotations = exports.annotations;
  if (!(annotations instanceof AnnotationRegistry)) {
    return error(
      `Schema module ${modulePath} must export 'annotations' as an AnnotationRegistry`
    );
  }

  const context = exports.context;
  if (context !== undefined && !isContextResolver(context)) {
    return error(
      `Schema module ${modulePath}: 'context' must be a ContextRegistry`
    );
  }

  const schemas = new Map<string, Schema<unknown>>();
  for (const [name, value] of Object.entries(exports)) {
    if (isSchema(value)) {
      schemas.set(name, value);
    }
  }

  return ok({ schemas, annotations, context });
};

export const loadSchemaModule = async (
  modulePath: string
): Promise<Result<SchemaModule, string>> => {
  if (!existsSync(modulePath)) {
    return error(`Schema module not found: ${modulePath}`);
  }

  try {
    const exports: Readonly<Record<string, unknown>> = await import(
      pathToFileURL(modulePath).href
    );
    return readSchemaModule(exports, modulePath);
  } catch (e) {
    return error(
      `Failed to load schema module ${modulePath}: ${e instanceof Error ? e.message : String(e)}`
    );
  }
};
