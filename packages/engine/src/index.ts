/**
 * @metaderive/engine - declarative metadata derivation
 */

export * from "./types/diagnostic.js";
export * from "./types/result.js";
export * from "./model/annotations.js";
export * from "./model/interface-model.js";
export * from "./model/builders.js";
export * from "./context/registry.js";
export * from "./schema/types.js";
export * from "./schema/dsl.js";
export { classify, type Strategy, type StrategyKind } from "./schema/strategy.js";
export {
  compileSchema,
  describeDeclaredType,
  type CompiledDirectParam,
  type CompiledEmbeddedParam,
  type CompiledMemberParam,
  type CompiledParam,
  type CompiledSchema,
} from "./schema/compile.js";
export {
  resolveCardinality,
  matchedCandidates,
  type Candidate,
  type CardinalityError,
  type MatchedSet,
} from "./matching/cardinality.js";
export { acceptsTag, effectiveTag } from "./matching/tags.js";
export {
  METHOD_MEMBERS,
  PARAMETER_MEMBERS,
  accepts,
  mapMembers,
  type MemberKind,
  type MemberOwner,
  type ParamMember,
} from "./matching/member-mapper.js";
export * from "./tree/types.js";
export { finalizeNode, finalizeTree, resolveLookups } from "./tree/finalize.js";
export {
  describeSubject,
  type Subject,
} from "./derivation/subject.js";
export { materializeDirect, type NodeBuilder } from "./derivation/materializer.js";
export {
  derive,
  deriveTree,
  type DerivationError,
  type DerivationStage,
  type DeriveOptions,
} from "./derivation/derive.js";
