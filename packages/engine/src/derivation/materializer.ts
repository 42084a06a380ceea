/**
 * Direct value materializer.
 *
 * Produces the value of one non-recursive schema parameter for one real
 * declaration. Values are returned as builders taking the declaration's
 * index among the matches of its schema parameter, which is only known once
 * matching of the whole scope has finished.
 */

import { errorDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import { error, ok, type Result } from "../types/result.js";
import {
  annotationsOf,
  formatAnnotation,
  type Annotation,
  type AnnotationClass,
} from "../model/annotations.js";
import { paramPosition } from "../model/interface-model.js";
import type { ContextResolver } from "../context/registry.js";
import type { CompiledDirectParam } from "../schema/compile.js";
import {
  matchedCandidates,
  resolveCardinality,
  type Candidate,
  type CardinalityError,
} from "../matching/cardinality.js";
import type { MetadataNode } from "../tree/types.js";
import {
  describeSubject,
  enclosingAnnotations,
  subjectAnnotations,
  subjectExternalName,
  subjectLocation,
  subjectName,
  type Subject,
} from "./subject.js";

export type NodeBuilder = (indexInMatch: number) => MetadataNode;

export type MaterializeContext = {
  readonly resolver: ContextResolver;
  /**
   * Set inside embedded schemas, where annotation lookups fall back to the
   * declaration enclosing the subject.
   */
  readonly embedded: boolean;
};

const constant =
  (node: MetadataNode): NodeBuilder =>
  () =>
    node;

export const materializeDirect = (
  param: CompiledDirectParam,
  subject: Subject,
  ctx: MaterializeContext
): Result<NodeBuilder, readonly Diagnostic[]> => {
  switch (param.kind) {
    case "contextual": {
      const ref = ctx.resolver.lookup(param.token);
      if (!ref && param.strict) {
        return error([
          errorDiagnostic(
            "MD3001",
            `${param.description}: no instance of ${param.token.name} is registered (required by ${describeSubject(subject)})`,
            subjectLocation(subject),
            [param.location]
          ),
        ]);
      }
      return ok(
        constant({
          kind: "lookup",
          token: param.token,
          ref,
          requestedBy: param.description,
          location: param.location,
        })
      );
    }

    case "annotation":
      return captureAnnotations(param, subject, ctx);

    case "name":
      return ok(
        constant({
          kind: "literal",
          value: param.useAlias
            ? subjectExternalName(subject)
            : subjectName(subject),
        })
      );

    case "position": {
      if (subject.kind !== "parameter") {
        return error([
          errorDiagnostic(
            "MD1001",
            `${param.description}: position capture needs a parameter, found ${describeSubject(subject)}`,
            param.location
          ),
        ]);
      }
      const realParam = subject.param;
      return ok((indexInMatch) => ({
        kind: "position",
        position: paramPosition(realParam, indexInMatch),
      }));
    }

    case "flags":
      return ok(
        constant({
          kind: "literal",
          value: subject.kind === "parameter" ? subject.param.flags : 0,
        })
      );

    case "presence":
      return ok(
        constant({
          kind: "literal",
          value:
            visibleAnnotations(subject, ctx, param.annotationClass).length > 0,
        })
      );
  }
};

/**
 * Annotations of the requested class on the subject. Inside an embedded
 * schema the enclosing declaration is consulted only when the subject
 * carries none.
 */
const visibleAnnotations = (
  subject: Subject,
  ctx: MaterializeContext,
  annotationClass: AnnotationClass
): readonly Annotation[] => {
  const own = annotationsOf(subjectAnnotations(subject), annotationClass);
  return own.length === 0 && ctx.embedded
    ? annotationsOf(enclosingAnnotations(subject), annotationClass)
    : own;
};

const captureAnnotations = (
  param: Extract<CompiledDirectParam, { readonly kind: "annotation" }>,
  subject: Subject,
  ctx: MaterializeContext
): Result<NodeBuilder, readonly Diagnostic[]> => {
  const found = visibleAnnotations(subject, ctx, param.annotationClass);
  const candidates = found.map(
    (annotation, index): Candidate<Annotation> => ({
      item: annotation,
      index,
      name: annotation.annotationClass.name,
    })
  );

  const resolved = resolveCardinality(param.cardinality, candidates);
  if (!resolved.ok) {
    return error(
      resolved.error.map((problem) =>
        annotationProblem(param, subject, problem)
      )
    );
  }

  const nodes = matchedCandidates(resolved.value).map(
    (candidate): MetadataNode => ({
      kind: "annotation",
      annotation: candidate.item,
    })
  );
  switch (resolved.value.kind) {
    case "single":
    case "optional":
      return ok(constant(nodes[0] ?? { kind: "absent" }));
    case "many":
    case "named":
      return ok(constant({ kind: "list", items: nodes }));
  }
};

const annotationProblem = (
  param: CompiledDirectParam,
  subject: Subject,
  problem: CardinalityError<Annotation>
): Diagnostic => {
  const where = describeSubject(subject);
  switch (problem.kind) {
    case "noMatch":
      return errorDiagnostic(
        "MD2001",
        `${param.description}: no matching annotation found on ${where}`,
        subjectLocation(subject),
        [param.location]
      );
    case "ambiguous":
      return errorDiagnostic(
        "MD2002",
        `${param.description}: several matching annotations found on ${where}: ${problem.candidates
          .map((c) => formatAnnotation(c.item))
          .join(", ")}`,
        subjectLocation(subject),
        [param.location, ...problem.candidates.map((c) => c.item.location)]
      );
    case "duplicateName":
      return errorDiagnostic(
        "MD2004",
        `${param.description}: annotations on ${where} share the name ${problem.name}`,
        subjectLocation(subject),
        [param.location]
      );
  }
};
