/**
 * InterfaceModel - the reflected description of a real interface.
 *
 * Produced by the frontend (or built by hand with ./builders.ts) and consumed
 * read-only by the derivation engine.
 */

import type { SourceLocation } from "../types/diagnostic.js";
import { ALIAS, type Annotation, annotationsOf } from "./annotations.js";

/**
 * Parameter flag bits
 */
export const ParamFlag = {
  contextual: 1 << 0,
  lazy: 1 << 1,
  variadic: 1 << 2,
  hasDefault: 1 << 3,
  synthetic: 1 << 4,
} as const;

export type ParamFlagName = keyof typeof ParamFlag;

const PARAM_FLAG_NAMES: readonly ParamFlagName[] = [
  "contextual",
  "lazy",
  "variadic",
  "hasDefault",
  "synthetic",
];

/**
 * Bit set of ParamFlag values
 */
export type ParamFlags = number;

export type RealParam = {
  readonly name: string;
  readonly type: string;
  readonly annotations: readonly Annotation[];
  /** Index across every parameter group */
  readonly index: number;
  readonly indexOfGroup: number;
  readonly indexInGroup: number;
  readonly flags: ParamFlags;
  readonly location?: SourceLocation;
};

export type RealMethod = {
  readonly name: string;
  /** Name of the declaring interface */
  readonly owner: string;
  readonly annotations: readonly Annotation[];
  /** Declarations this method overrides or implements */
  readonly overrides: readonly RealMethod[];
  readonly parameterGroups: readonly (readonly RealParam[])[];
  readonly resultType: string;
  readonly location?: SourceLocation;
};

export type RealInterface = {
  readonly name: string;
  readonly annotations: readonly Annotation[];
  readonly supertypes: readonly RealInterface[];
  /** Own and inherited methods, in declaration order */
  readonly methods: readonly RealMethod[];
  readonly location?: SourceLocation;
};

/**
 * Where a real parameter sits: in its method's parameter list and among
 * the parameters matched by one schema parameter.
 */
export type ParamPosition = {
  readonly index: number;
  readonly indexOfGroup: number;
  readonly indexInGroup: number;
  readonly indexInMatch: number;
};

export const paramPosition = (
  param: RealParam,
  indexInMatch: number
): ParamPosition => ({
  index: param.index,
  indexOfGroup: param.indexOfGroup,
  indexInGroup: param.indexInGroup,
  indexInMatch,
});

export const hasParamFlag = (
  flags: ParamFlags,
  flag: ParamFlagName
): boolean => (flags & ParamFlag[flag]) !== 0;

export const paramFlags = (
  names: readonly ParamFlagName[]
): ParamFlags => names.reduce((bits, name) => bits | ParamFlag[name], 0);

export const describeParamFlags = (flags: ParamFlags): string => {
  const names = PARAM_FLAG_NAMES.filter((name) => hasParamFlag(flags, name));
  return names.length > 0 ? names.join(", ") : "none";
};

export const allParams = (method: RealMethod): readonly RealParam[] =>
  method.parameterGroups.flat();

/**
 * Own annotations first, then those of every supertype, depth first.
 * A supertype reachable through several paths contributes once.
 */
export const interfaceAnnotations = (
  iface: RealInterface
): readonly Annotation[] => {
  const seen = new Set<RealInterface>();
  const result: Annotation[] = [];
  const visit = (current: RealInterface): void => {
    if (seen.has(current)) return;
    seen.add(current);
    result.push(...current.annotations);
    current.supertypes.forEach(visit);
  };
  visit(iface);
  return result;
};

/**
 * Own annotations first, then those of every overridden declaration.
 */
export const methodAnnotations = (
  method: RealMethod
): readonly Annotation[] => {
  const seen = new Set<RealMethod>();
  const result: Annotation[] = [];
  const visit = (current: RealMethod): void => {
    if (seen.has(current)) return;
    seen.add(current);
    result.push(...current.annotations);
    current.overrides.forEach(visit);
  };
  visit(method);
  return result;
};

/**
 * Own annotations first, then those of the parameter at the same global
 * index in every method the owning method overrides.
 */
export const paramAnnotations = (
  param: RealParam,
  owner: RealMethod
): readonly Annotation[] => {
  const inherited = methodChain(owner)
    .slice(1)
    .flatMap((overridden) => {
      const counterpart = allParams(overridden)[param.index];
      return counterpart ? counterpart.annotations : [];
    });
  return [...param.annotations, ...inherited];
};

const methodChain = (method: RealMethod): readonly RealMethod[] => {
  const seen = new Set<RealMethod>();
  const result: RealMethod[] = [];
  const visit = (current: RealMethod): void => {
    if (seen.has(current)) return;
    seen.add(current);
    result.push(current);
    current.overrides.forEach(visit);
  };
  visit(method);
  return result;
};

/**
 * The alias given by the first ALIAS annotation, else the declared name.
 * Only own annotations are consulted; callers pass inherited ones when an
 * inherited alias should count.
 */
export const externalName = (
  name: string,
  annotations: readonly Annotation[]
): string => {
  const alias = annotationsOf(annotations, ALIAS)[0];
  return alias?.args["name"] ?? name;
};
