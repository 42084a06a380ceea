/**
 * Member mapper.
 *
 * Matches the member parameters of a schema against the members of one real
 * declaration: the methods of an interface or the parameters of a method.
 * One routine serves both scopes; a MemberKind tells it how to read members.
 */

import {
  errorDiagnostic,
  type Diagnostic,
  type SourceLocation,
} from "../types/diagnostic.js";
import { error, ok, type Result } from "../types/result.js";
import type { Annotation } from "../model/annotations.js";
import {
  externalName,
  methodAnnotations,
  paramAnnotations,
  type RealMethod,
  type RealParam,
} from "../model/interface-model.js";
import type { CompiledMemberParam } from "../schema/compile.js";
import type { MetadataNode } from "../tree/types.js";
import type { NodeBuilder } from "../derivation/materializer.js";
import { describeMethod } from "../derivation/subject.js";
import {
  resolveCardinality,
  type Candidate,
  type CardinalityError,
  type MatchedSet,
} from "./cardinality.js";
import { acceptsTag, effectiveTag } from "./tags.js";

export type MemberKind<M> = {
  readonly noun: string;
  /** Own and inherited annotations */
  readonly annotationsOf: (member: M) => readonly Annotation[];
  readonly externalNameOf: (member: M) => string;
  readonly describe: (member: M) => string;
  readonly locationOf: (member: M) => SourceLocation | undefined;
  /** Declared result type of a method, declared type of a parameter */
  readonly typeOf: (member: M) => string;
};

export const METHOD_MEMBERS: MemberKind<RealMethod> = {
  noun: "method",
  annotationsOf: methodAnnotations,
  externalNameOf: (method) =>
    externalName(method.name, methodAnnotations(method)),
  describe: (method) => `method ${describeMethod(method)}`,
  locationOf: (method) => method.location,
  typeOf: (method) => method.resultType,
};

export type ParamMember = {
  readonly param: RealParam;
  readonly method: RealMethod;
};

export const PARAMETER_MEMBERS: MemberKind<ParamMember> = {
  noun: "parameter",
  annotationsOf: ({ param, method }) => paramAnnotations(param, method),
  externalNameOf: ({ param, method }) =>
    externalName(param.name, paramAnnotations(param, method)),
  describe: ({ param, method }) =>
    `parameter ${param.name} of method ${describeMethod(method)}`,
  locationOf: ({ param }) => param.location,
  typeOf: ({ param }) => param.type,
};

export type MemberOwner = {
  readonly description: string;
  readonly location?: SourceLocation;
};

export type Materialize<M> = (
  param: CompiledMemberParam,
  member: M
) => Result<NodeBuilder, readonly Diagnostic[]>;

type Match<M> = {
  readonly member: M;
  readonly build: NodeBuilder;
};

type ParamMatches<M> = {
  readonly param: CompiledMemberParam;
  candidates: readonly Candidate<Match<M>>[];
};

const passesFilters = <M>(
  kind: MemberKind<M>,
  param: CompiledMemberParam,
  member: M
): boolean =>
  acceptsTag(
    param.restriction,
    effectiveTag(kind.annotationsOf(member), param.memberTags)
  ) &&
  (param.matchName === undefined ||
    kind.externalNameOf(member) === param.matchName);

const hasMemberType = <M>(
  kind: MemberKind<M>,
  param: CompiledMemberParam,
  member: M
): boolean =>
  param.memberType === undefined || kind.typeOf(member) === param.memberType;

/**
 * True when the member passes the parameter's tag, name and type filters
 */
export const accepts = <M>(
  kind: MemberKind<M>,
  param: CompiledMemberParam,
  member: M
): boolean =>
  passesFilters(kind, param, member) && hasMemberType(kind, param, member);

const typeMismatch = <M>(
  kind: MemberKind<M>,
  param: CompiledMemberParam,
  member: M
): Diagnostic =>
  errorDiagnostic(
    "MD2005",
    `${param.description}: ${kind.describe(member)} has type ${kind.typeOf(member)}, expected ${param.memberType ?? "any type"}`,
    kind.locationOf(member),
    [param.location]
  );

/**
 * Map every member parameter to its value node. A member qualifies for a
 * parameter when it passes the filters and its nested schema materializes;
 * failures of members that qualify nowhere are reported, failures of members
 * claimed by another parameter are not.
 */
export const mapMembers = <M>(
  kind: MemberKind<M>,
  params: readonly CompiledMemberParam[],
  members: readonly M[],
  owner: MemberOwner,
  materialize: Materialize<M>
): Result<ReadonlyMap<CompiledMemberParam, MetadataNode>, readonly Diagnostic[]> => {
  const diagnostics: Diagnostic[] = [];
  const failures = members.map((): Diagnostic[] => []);

  const matches = params.map((param): ParamMatches<M> => {
    const candidates: Candidate<Match<M>>[] = [];
    members.forEach((member, index) => {
      if (!passesFilters(kind, param, member)) {
        return;
      }
      if (!hasMemberType(kind, param, member)) {
        failures[index]?.push(typeMismatch(kind, param, member));
        return;
      }
      const built = materialize(param, member);
      if (built.ok) {
        candidates.push({
          item: { member, build: built.value },
          index,
          name: kind.externalNameOf(member),
        });
      } else {
        failures[index]?.push(...built.error);
      }
    });
    return { param, candidates };
  });

  const contested = new Set<CompiledMemberParam>();
  members.forEach((member, index) => {
    const claimants = matches.filter((entry) =>
      entry.candidates.some((candidate) => candidate.index === index)
    );
    if (claimants.length === 0) {
      diagnostics.push(...(failures[index] ?? []));
      return;
    }

    const consumers = claimants.filter((entry) => !entry.param.auxiliary);
    if (consumers.length < 2) {
      return;
    }
    diagnostics.push(
      errorDiagnostic(
        "MD2003",
        `${kind.describe(member)} of ${owner.description} is consumed by several schema parameters: ${consumers
          .map((entry) => entry.param.description)
          .join("; ")}`,
        kind.locationOf(member),
        consumers.map((entry) => entry.param.location),
        "restrict the parameters with distinct tags or mark all but one auxiliary"
      )
    );
    for (const entry of consumers) {
      contested.add(entry.param);
      entry.candidates = entry.candidates.filter(
        (candidate) => candidate.index !== index
      );
    }
  });

  const nodes = new Map<CompiledMemberParam, MetadataNode>();
  for (const { param, candidates } of matches) {
    if (contested.has(param)) {
      continue;
    }
    const resolved = resolveCardinality(param.cardinality, candidates);
    if (resolved.ok) {
      nodes.set(param, assemble(resolved.value));
    } else {
      diagnostics.push(
        ...resolved.error.map((problem) =>
          cardinalityProblem(kind, param, owner, problem)
        )
      );
    }
  }

  return diagnostics.length > 0 ? error(diagnostics) : ok(nodes);
};

const assemble = <M>(matched: MatchedSet<Match<M>>): MetadataNode => {
  switch (matched.kind) {
    case "single":
      return matched.match.item.build(0);
    case "optional":
      return matched.match ? matched.match.item.build(0) : { kind: "absent" };
    case "many":
      return {
        kind: "list",
        items: matched.matches.map((candidate, index) =>
          candidate.item.build(index)
        ),
      };
    case "named":
      return {
        kind: "record",
        entries: matched.matches.map((candidate, index) => ({
          key: candidate.name,
          node: candidate.item.build(index),
        })),
      };
  }
};

const cardinalityProblem = <M>(
  kind: MemberKind<M>,
  param: CompiledMemberParam,
  owner: MemberOwner,
  problem: CardinalityError<Match<M>>
): Diagnostic => {
  const describeAll = (candidates: readonly Candidate<Match<M>>[]): string =>
    candidates.map((c) => kind.describe(c.item.member)).join(", ");
  const locations = (candidates: readonly Candidate<Match<M>>[]) =>
    candidates.map((c) => kind.locationOf(c.item.member));

  switch (problem.kind) {
    case "noMatch":
      return errorDiagnostic(
        "MD2001",
        `${param.description}: no ${kind.noun} of ${owner.description} matches`,
        owner.location,
        [param.location]
      );
    case "ambiguous": {
      const [first, ...rest] = problem.candidates;
      return errorDiagnostic(
        "MD2002",
        `${param.description}: several ${kind.noun}s of ${owner.description} match: ${describeAll(problem.candidates)}`,
        first ? kind.locationOf(first.item.member) : owner.location,
        [param.location, ...locations(rest)]
      );
    }
    case "duplicateName": {
      const [first, ...rest] = problem.candidates;
      return errorDiagnostic(
        "MD2004",
        `${param.description}: ${describeAll(problem.candidates)} share the name "${problem.name}"`,
        first ? kind.locationOf(first.item.member) : owner.location,
        [param.location, ...locations(rest)],
        "give all but one of them a distinct alias"
      );
    }
  }
};
