/**
 * Strategy classification for schema parameters
 */

import type { AnnotationClass } from "../model/annotations.js";
import {
  isStrategyQualifier,
  type ParamDecl,
  type StrategyQualifier,
} from "./types.js";

export type Strategy =
  | { readonly kind: "contextual"; readonly strict: boolean }
  | { readonly kind: "annotation" }
  | { readonly kind: "name"; readonly useAlias: boolean }
  | { readonly kind: "position" }
  | { readonly kind: "flags" }
  | { readonly kind: "presence"; readonly annotationClass: AnnotationClass }
  | { readonly kind: "embedded" }
  | { readonly kind: "perMethod" }
  | { readonly kind: "perParameter" }
  | { readonly kind: "unrecognized"; readonly reason: string };

export type StrategyKind = Strategy["kind"];

const fromQualifier = (
  qualifier: StrategyQualifier,
  strict: boolean
): Strategy => {
  switch (qualifier.kind) {
    case "contextual":
      return { kind: "contextual", strict };
    case "name":
      return { kind: "name", useAlias: qualifier.useAlias };
    case "presence":
      return { kind: "presence", annotationClass: qualifier.annotationClass };
    case "embedded":
    case "annotation":
    case "position":
    case "flags":
    case "perMethod":
    case "perParameter":
      return { kind: qualifier.kind };
  }
};

/**
 * Decide how a schema parameter is derived. Precedence: an embedded marker,
 * then an explicit strategy qualifier, then the lookup default of contextual
 * parameters. Anything else is unrecognized.
 */
export const classify = (decl: ParamDecl<unknown>): Strategy => {
  const strategies = decl.qualifiers.filter(isStrategyQualifier);
  const strict = decl.qualifiers.some((q) => q.kind === "strict");
  const [first, ...rest] = strategies;

  const embeddedMarker = strategies.find((q) => q.kind === "embedded");
  if (embeddedMarker) {
    const others = strategies.filter((q) => q !== embeddedMarker);
    return others.length === 0
      ? { kind: "embedded" }
      : {
          kind: "unrecognized",
          reason: `embedded cannot be combined with ${others.map((q) => q.kind).join(", ")}`,
        };
  }

  if (first) {
    return rest.length === 0
      ? fromQualifier(first, strict)
      : {
          kind: "unrecognized",
          reason: `conflicting strategies: ${strategies.map((q) => q.kind).join(", ")}`,
        };
  }

  if (decl.implicit) {
    return { kind: "contextual", strict };
  }

  return {
    kind: "unrecognized",
    reason: "no derivation strategy declared and not a contextual parameter",
  };
};
