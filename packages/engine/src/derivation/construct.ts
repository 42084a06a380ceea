/**
 * Embedded and nested construction.
 *
 * Derives one compiled schema for one subject: member parameters are
 * matched first (crossing into the next scope), then every parameter is
 * materialized and the schema's construct node assembled. Embedded schemas
 * share the subject and the member matches of the schema embedding them.
 */

import type { Diagnostic } from "../types/diagnostic.js";
import { collectResults, error, ok, type Result } from "../types/result.js";
import { allParams } from "../model/interface-model.js";
import type { ContextResolver } from "../context/registry.js";
import type {
  CompiledMemberParam,
  CompiledParam,
  CompiledSchema,
} from "../schema/compile.js";
import {
  METHOD_MEMBERS,
  PARAMETER_MEMBERS,
  mapMembers,
  type ParamMember,
} from "../matching/member-mapper.js";
import type { ConstructNode, MetadataNode } from "../tree/types.js";
import { materializeDirect, type NodeBuilder } from "./materializer.js";
import { describeSubject, subjectLocation, type Subject } from "./subject.js";

export type ConstructBuilder = (indexInMatch: number) => ConstructNode;

type MemberNodes = ReadonlyMap<CompiledMemberParam, MetadataNode>;

const NO_MEMBER_NODES: MemberNodes = new Map<CompiledMemberParam, MetadataNode>();

export type DeriveContext = {
  readonly resolver: ContextResolver;
};

/**
 * Derive a schema for a subject. Failures of member matching and of the
 * schema's own direct parameters are reported together.
 */
export const deriveAt = (
  compiled: CompiledSchema,
  subject: Subject,
  ctx: DeriveContext
): Result<ConstructBuilder, readonly Diagnostic[]> => {
  const mapped = mapMembersOf(compiled, subject, ctx);
  const built = constructSchema(
    compiled,
    subject,
    mapped.ok ? mapped.value : NO_MEMBER_NODES,
    ctx,
    false
  );
  if (!mapped.ok) {
    return error([...mapped.error, ...(built.ok ? [] : built.error)]);
  }
  return built;
};

const mapMembersOf = (
  compiled: CompiledSchema,
  subject: Subject,
  ctx: DeriveContext
): Result<MemberNodes, readonly Diagnostic[]> => {
  if (compiled.memberParams.length === 0) {
    return ok(NO_MEMBER_NODES);
  }
  const owner = {
    description: describeSubject(subject),
    location: subjectLocation(subject),
  };

  switch (subject.kind) {
    case "interface": {
      const { iface } = subject;
      return mapMembers(
        METHOD_MEMBERS,
        compiled.memberParams,
        iface.methods,
        owner,
        (param, method) =>
          deriveAt(param.schema, { kind: "method", method, iface }, ctx)
      );
    }
    case "method": {
      const { method } = subject;
      const members = allParams(method).map(
        (param): ParamMember => ({ param, method })
      );
      return mapMembers(
        PARAMETER_MEMBERS,
        compiled.memberParams,
        members,
        owner,
        (param, member) =>
          deriveAt(
            param.schema,
            { kind: "parameter", param: member.param, method: member.method },
            ctx
          )
      );
    }
    case "parameter":
      return ok(NO_MEMBER_NODES);
  }
};

/**
 * Materialize every parameter of a compiled schema. A member parameter
 * without a node has already reported why, so it fails without diagnostics.
 */
export const constructSchema = (
  compiled: CompiledSchema,
  subject: Subject,
  memberNodes: MemberNodes,
  ctx: DeriveContext,
  embedded: boolean
): Result<ConstructBuilder, readonly Diagnostic[]> => {
  const args = collectResults(
    compiled.params.map((param) =>
      buildParam(param, subject, memberNodes, ctx, embedded)
    )
  );
  if (!args.ok) {
    return args;
  }

  const builders = args.value;
  const description = describeSubject(subject);
  return ok((indexInMatch) => ({
    kind: "construct",
    schema: compiled.schema,
    subject: description,
    args: compiled.params.map((param, index) => ({
      name: param.name,
      node: builders[index]?.(indexInMatch) ?? { kind: "absent" },
    })),
  }));
};

const buildParam = (
  param: CompiledParam,
  subject: Subject,
  memberNodes: MemberNodes,
  ctx: DeriveContext,
  embedded: boolean
): Result<NodeBuilder, readonly Diagnostic[]> => {
  switch (param.kind) {
    case "embedded":
      return constructSchema(param.schema, subject, memberNodes, ctx, true);
    case "perMethod":
    case "perParameter": {
      const node = memberNodes.get(param);
      return node ? ok(() => node) : error([]);
    }
    default:
      return materializeDirect(param, subject, {
        resolver: ctx.resolver,
        embedded,
      });
  }
};
