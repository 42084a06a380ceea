/**
 * Value tree produced by matching.
 *
 * The tree mirrors the requested schema. Contextual lookups stay symbolic
 * until finalization so that a structurally matched tree can still carry an
 * unresolved reference; the emitter prints the same tree as source.
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type { Annotation } from "../model/annotations.js";
import type { ParamPosition, RealInterface } from "../model/interface-model.js";
import type { TypeToken, ValueRef } from "../context/registry.js";
import type { AnySchema, Schema } from "../schema/types.js";

export type LiteralNode = {
  readonly kind: "literal";
  readonly value: string | number | boolean;
};

export type AbsentNode = { readonly kind: "absent" };

export type AnnotationNode = {
  readonly kind: "annotation";
  readonly annotation: Annotation;
};

export type PositionNode = {
  readonly kind: "position";
  readonly position: ParamPosition;
};

export type LookupNode = {
  readonly kind: "lookup";
  readonly token: TypeToken<unknown>;
  /** Instance found while matching, if any */
  readonly ref?: ValueRef<unknown>;
  /** Description of the schema parameter that asked for it */
  readonly requestedBy: string;
  readonly location?: SourceLocation;
};

export type ListNode = {
  readonly kind: "list";
  readonly items: readonly MetadataNode[];
};

export type RecordNode = {
  readonly kind: "record";
  readonly entries: readonly { readonly key: string; readonly node: MetadataNode }[];
};

export type ConstructNode = {
  readonly kind: "construct";
  readonly schema: AnySchema;
  /** Real declaration the schema was derived from */
  readonly subject: string;
  readonly args: readonly { readonly name: string; readonly node: MetadataNode }[];
};

export type MetadataNode =
  | LiteralNode
  | AbsentNode
  | AnnotationNode
  | PositionNode
  | LookupNode
  | ListNode
  | RecordNode
  | ConstructNode;

/**
 * Matched but not yet finalized derivation of one (schema, interface) pair
 */
export type DerivedTree<V> = {
  readonly schema: Schema<V, "interface">;
  readonly iface: RealInterface;
  readonly root: ConstructNode;
};

/**
 * Unresolved lookups in declaration order
 */
export const collectLookups = (node: MetadataNode): readonly LookupNode[] => {
  switch (node.kind) {
    case "lookup":
      return [node];
    case "list":
      return node.items.flatMap(collectLookups);
    case "record":
      return node.entries.flatMap((entry) => collectLookups(entry.node));
    case "construct":
      return node.args.flatMap((arg) => collectLookups(arg.node));
    case "literal":
    case "absent":
    case "annotation":
    case "position":
      return [];
  }
};
