/**
 * Derivation orchestrator.
 *
 * Drives one (schema, interface) derivation: schema compilation (fatal,
 * cached per schema), matching (all independent failures collected) and
 * finalization of deferred lookups.
 */

import type { Diagnostic } from "../types/diagnostic.js";
import { error, ok, type Result } from "../types/result.js";
import type { RealInterface } from "../model/interface-model.js";
import { emptyResolver, type ContextResolver } from "../context/registry.js";
import { compileSchema } from "../schema/compile.js";
import type { Schema } from "../schema/types.js";
import type { DerivedTree } from "../tree/types.js";
import { finalizeTree } from "../tree/finalize.js";
import { deriveAt } from "./construct.js";

export type DerivationStage = "schema" | "matching" | "finalization";

export type DerivationError = {
  readonly stage: DerivationStage;
  readonly diagnostics: readonly Diagnostic[];
};

export type DeriveOptions = {
  /** Instances for contextual lookups; none are registered by default */
  readonly resolver?: ContextResolver;
};

/**
 * Compile and match, leaving non-strict lookups unresolved
 */
export const deriveTree = <V>(
  schema: Schema<V, "interface">,
  iface: RealInterface,
  options: DeriveOptions = {}
): Result<DerivedTree<V>, DerivationError> => {
  const compiled = compileSchema(schema);
  if (!compiled.ok) {
    return error({ stage: "schema", diagnostics: compiled.error });
  }

  const built = deriveAt(
    compiled.value,
    { kind: "interface", iface },
    { resolver: options.resolver ?? emptyResolver }
  );
  if (!built.ok) {
    return error({ stage: "matching", diagnostics: built.error });
  }

  return ok({ schema, iface, root: built.value(0) });
};

export const derive = <V>(
  schema: Schema<V, "interface">,
  iface: RealInterface,
  options: DeriveOptions = {}
): Result<V, DerivationError> => {
  const tree = deriveTree(schema, iface, options);
  if (!tree.ok) {
    return tree;
  }
  const value = finalizeTree(tree.value, options.resolver);
  return value.ok
    ? value
    : error({ stage: "finalization", diagnostics: value.error });
};
