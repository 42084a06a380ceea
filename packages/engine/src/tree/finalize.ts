/**
 * Value tree finalization.
 *
 * Resolves the lookups left symbolic by matching and builds the plain,
 * frozen value. Every unresolved lookup is reported, not only the first.
 */

import { errorDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import { error, ok, type Result } from "../types/result.js";
import {
  emptyResolver,
  type ContextResolver,
  type ValueRef,
} from "../context/registry.js";
import type { SchemaArgs } from "../schema/types.js";
import {
  collectLookups,
  type ConstructNode,
  type DerivedTree,
  type LookupNode,
  type MetadataNode,
} from "./types.js";

type Resolved = ReadonlyMap<LookupNode, ValueRef<unknown>>;

/**
 * Resolve every lookup of a tree: the instance found while matching, else
 * one registered with `resolver` since.
 */
export const resolveLookups = (
  root: MetadataNode,
  resolver: ContextResolver
): Result<Resolved, readonly Diagnostic[]> => {
  const resolved = new Map<LookupNode, ValueRef<unknown>>();
  const diagnostics: Diagnostic[] = [];
  for (const node of collectLookups(root)) {
    const ref = node.ref ?? resolver.lookup(node.token);
    if (ref) {
      resolved.set(node, ref);
    } else {
      diagnostics.push(
        errorDiagnostic(
          "MD3001",
          `${node.requestedBy}: no instance of ${node.token.name} is registered`,
          node.location
        )
      );
    }
  }
  return diagnostics.length > 0 ? error(diagnostics) : ok(resolved);
};

export const finalizeNode = (
  node: MetadataNode,
  resolver: ContextResolver = emptyResolver
): Result<unknown, readonly Diagnostic[]> => {
  const resolved = resolveLookups(node, resolver);
  return resolved.ok ? ok(valueOf(node, resolved.value)) : resolved;
};

export const finalizeTree = <V>(
  tree: DerivedTree<V>,
  resolver: ContextResolver = emptyResolver
): Result<V, readonly Diagnostic[]> => {
  const resolved = resolveLookups(tree.root, resolver);
  if (!resolved.ok) {
    return resolved;
  }
  return ok(tree.schema.construct(argsOf(tree.root, resolved.value)));
};

const argsOf = (node: ConstructNode, resolved: Resolved): SchemaArgs =>
  Object.fromEntries(
    node.args.map((arg) => [arg.name, valueOf(arg.node, resolved)])
  );

const valueOf = (node: MetadataNode, resolved: Resolved): unknown => {
  switch (node.kind) {
    case "literal":
      return node.value;
    case "absent":
      return undefined;
    case "annotation":
      return node.annotation;
    case "position":
      return node.position;
    case "lookup":
      return resolved.get(node)?.value;
    case "list":
      return Object.freeze(node.items.map((item) => valueOf(item, resolved)));
    case "record":
      return Object.freeze(
        Object.fromEntries(
          node.entries.map((entry) => [entry.key, valueOf(entry.node, resolved)])
        )
      );
    case "construct":
      return node.schema.construct(argsOf(node, resolved));
  }
};
