/**
 * Builders for InterfaceModel values.
 *
 * Positional indices of parameters are computed from the group layout, so
 * callers only describe names, types and annotations.
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type { Annotation } from "./annotations.js";
import {
  paramFlags,
  type ParamFlagName,
  type RealInterface,
  type RealMethod,
  type RealParam,
} from "./interface-model.js";

export type ParamSpec = {
  readonly name: string;
  readonly type?: string;
  readonly annotations?: readonly Annotation[];
  readonly flags?: readonly ParamFlagName[];
  readonly location?: SourceLocation;
};

export type MethodSpec = {
  readonly owner?: string;
  readonly annotations?: readonly Annotation[];
  readonly overrides?: readonly RealMethod[];
  readonly groups?: readonly (readonly ParamSpec[])[];
  readonly resultType?: string;
  readonly location?: SourceLocation;
};

export type InterfaceSpec = {
  readonly annotations?: readonly Annotation[];
  readonly supertypes?: readonly RealInterface[];
  readonly methods?: readonly RealMethod[];
  readonly location?: SourceLocation;
};

export const realParam = (
  name: string,
  options: Omit<ParamSpec, "name"> = {}
): ParamSpec => ({ name, ...options });

export const realMethod = (
  name: string,
  spec: MethodSpec = {}
): RealMethod => {
  let index = 0;
  const parameterGroups = (spec.groups ?? []).map((group, indexOfGroup) =>
    group.map(
      (param, indexInGroup): RealParam => ({
        name: param.name,
        type: param.type ?? "unknown",
        annotations: param.annotations ?? [],
        index: index++,
        indexOfGroup,
        indexInGroup,
        flags: paramFlags(param.flags ?? []),
        location: param.location,
      })
    )
  );

  return {
    name,
    owner: spec.owner ?? "",
    annotations: spec.annotations ?? [],
    overrides: spec.overrides ?? [],
    parameterGroups,
    resultType: spec.resultType ?? "void",
    location: spec.location,
  };
};

export const realInterface = (
  name: string,
  spec: InterfaceSpec = {}
): RealInterface => ({
  name,
  annotations: spec.annotations ?? [],
  supertypes: spec.supertypes ?? [],
  methods: (spec.methods ?? []).map((method) =>
    method.owner === "" ? { ...method, owner: name } : method
  ),
  location: spec.location,
});
