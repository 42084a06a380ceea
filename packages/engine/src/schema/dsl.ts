/**
 * Schema definition helpers.
 *
 * Each helper returns a ParamDecl whose declared type and qualifiers agree,
 * and whose phantom type is the value the parameter receives:
 *
 *   const methodInfo = defineSchema("MethodInfo", "method", {
 *     name: captureName({ alias: true }),
 *     params: perParameter(paramInfo, { cardinality: manyNamed }),
 *   });
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type { Annotation, AnnotationClass } from "../model/annotations.js";
import type { ParamFlags, ParamPosition } from "../model/interface-model.js";
import type { TypeToken } from "../context/registry.js";
import type {
  Cardinality,
  Collected,
  DeclaredType,
  Many,
  ManyNamed,
  Optional,
  ParamDecl,
  Qualifier,
  Schema,
  SchemaArgs,
  SchemaRefOf,
  SchemaScope,
  Single,
  TagConfig,
} from "./types.js";

export const single: Single = { kind: "single" };
export const optional: Optional = { kind: "optional" };
export const many: Many = { kind: "many", named: false };
export const manyNamed: ManyNamed = { kind: "many", named: true };

type DeclOptions = {
  readonly location?: SourceLocation;
};

export type MemberOptions<C extends Cardinality> = DeclOptions & {
  readonly cardinality?: C;
  /** Accept only members whose effective tag refines this one */
  readonly tagged?: AnnotationClass;
  /** Match without consuming the member */
  readonly auxiliary?: boolean;
  /** Accept only members with this externally-facing name */
  readonly matchName?: string;
};

export type SchemaOptions = {
  readonly methodTag?: TagConfig;
  readonly paramTag?: TagConfig;
  readonly location?: SourceLocation;
};

export type ParamDecls = Readonly<Record<string, ParamDecl<unknown>>>;

export type ValuesOf<P extends ParamDecls> = {
  readonly [K in keyof P]: P[K] extends ParamDecl<infer V> ? V : never;
};

/**
 * Hand-assembled parameter declaration; the helpers below cover the
 * well-formed combinations.
 */
export const param = (
  declaredType: DeclaredType,
  qualifiers: readonly Qualifier[],
  options: DeclOptions & { readonly implicit?: boolean } = {}
): ParamDecl<unknown> => ({
  declaredType,
  qualifiers,
  implicit: options.implicit ?? false,
  location: options.location,
});

const decl = <V>(
  declaredType: DeclaredType,
  qualifiers: readonly Qualifier[],
  options: DeclOptions,
  implicit = false
): ParamDecl<V> => ({
  declaredType,
  qualifiers,
  implicit,
  location: options.location,
});

const cardinalityQualifiers = (
  cardinality: Cardinality | undefined
): readonly Qualifier[] =>
  cardinality ? [{ kind: "cardinality", cardinality }] : [];

const memberQualifiers = (
  options: MemberOptions<Cardinality>
): readonly Qualifier[] => [
  ...cardinalityQualifiers(options.cardinality),
  ...(options.tagged ? [{ kind: "tagged", tag: options.tagged } as const] : []),
  ...(options.auxiliary ? [{ kind: "auxiliary" } as const] : []),
  ...(options.matchName !== undefined
    ? [{ kind: "matchName", name: options.matchName } as const]
    : []),
];

/**
 * Name of the real declaration; with `alias`, its externally-facing alias
 * when one is declared.
 */
export const captureName = (
  options: DeclOptions & { readonly alias?: boolean } = {}
): ParamDecl<string> =>
  decl(
    { kind: "string" },
    [{ kind: "name", useAlias: options.alias ?? false }],
    options
  );

export const captureAnnotation = <C extends Cardinality = Single>(
  annotationClass: AnnotationClass,
  options: DeclOptions & { readonly cardinality?: C } = {}
): ParamDecl<Collected<C, Annotation>> =>
  decl(
    { kind: "annotation", annotationClass },
    [{ kind: "annotation" }, ...cardinalityQualifiers(options.cardinality)],
    options
  );

export const capturePosition = (
  options: DeclOptions = {}
): ParamDecl<ParamPosition> =>
  decl({ kind: "position" }, [{ kind: "position" }], options);

export const captureFlags = (options: DeclOptions = {}): ParamDecl<ParamFlags> =>
  decl({ kind: "flags" }, [{ kind: "flags" }], options);

export const hasAnnotation = (
  annotationClass: AnnotationClass,
  options: DeclOptions = {}
): ParamDecl<boolean> =>
  decl({ kind: "boolean" }, [{ kind: "presence", annotationClass }], options);

/**
 * Explicit contextual lookup. A strict lookup that finds nothing makes the
 * surrounding declaration fail to match; otherwise absence is only reported
 * when the derived value is finalized.
 */
export const lookup = <T>(
  token: TypeToken<T>,
  options: DeclOptions & { readonly strict?: boolean } = {}
): ParamDecl<T> =>
  decl(
    { kind: "token", token },
    [{ kind: "contextual" }, ...(options.strict ? [{ kind: "strict" } as const] : [])],
    options
  );

/**
 * Contextual parameter: looked up by default, without a strategy qualifier.
 */
export const contextual = <T>(
  token: TypeToken<T>,
  options: DeclOptions & { readonly strict?: boolean } = {}
): ParamDecl<T> =>
  decl(
    { kind: "token", token },
    options.strict ? [{ kind: "strict" }] : [],
    options,
    true
  );

export const embedded = <V>(
  schema: SchemaRefOf<V>,
  options: DeclOptions = {}
): ParamDecl<V> =>
  decl({ kind: "schema", schema }, [{ kind: "embedded" }], options);

const memberTypeQualifiers = (
  typeName: string | undefined
): readonly Qualifier[] =>
  typeName !== undefined ? [{ kind: "memberType", typeName }] : [];

export const perMethod = <V, C extends Cardinality = Single>(
  schema: SchemaRefOf<V, "method">,
  options: MemberOptions<C> & {
    readonly paramTag?: TagConfig;
    /** Accept only methods declaring this result type */
    readonly resultType?: string;
  } = {}
): ParamDecl<Collected<C, V>> =>
  decl(
    { kind: "schema", schema },
    [
      { kind: "perMethod" },
      ...memberQualifiers(options),
      ...memberTypeQualifiers(options.resultType),
      ...(options.paramTag
        ? [{ kind: "paramTag", config: options.paramTag } as const]
        : []),
    ],
    options
  );

export const perParameter = <V, C extends Cardinality = Single>(
  schema: SchemaRefOf<V, "parameter">,
  options: MemberOptions<C> & {
    /** Accept only parameters declaring this type */
    readonly paramType?: string;
  } = {}
): ParamDecl<Collected<C, V>> =>
  decl(
    { kind: "schema", schema },
    [
      { kind: "perParameter" },
      ...memberQualifiers(options),
      ...memberTypeQualifiers(options.paramType),
    ],
    options
  );

/**
 * Define a schema. Without `construct` the derived value is a frozen record
 * keyed by parameter name; with it, the record is passed to `construct`.
 * Generated metadata modules always hold the record, never the constructed
 * value.
 */
export function defineSchema<S extends SchemaScope, P extends ParamDecls>(
  name: string,
  scope: S,
  params: P,
  options?: SchemaOptions
): Schema<ValuesOf<P>, S>;
export function defineSchema<S extends SchemaScope, P extends ParamDecls, V>(
  name: string,
  scope: S,
  params: P,
  options: SchemaOptions & { readonly construct: (values: ValuesOf<P>) => V }
): Schema<V, S>;
export function defineSchema<S extends SchemaScope, P extends ParamDecls, V>(
  name: string,
  scope: S,
  params: P,
  options: SchemaOptions & {
    readonly construct?: (values: ValuesOf<P>) => V;
  } = {}
): Schema<V | ValuesOf<P>, S> {
  const construct = options.construct;
  return {
    name,
    scope,
    params: Object.entries(params).map(([paramName, paramDecl]) => ({
      name: paramName,
      decl: paramDecl,
    })),
    methodTag: options.methodTag,
    paramTag: options.paramTag,
    location: options.location,
    construct: (args: SchemaArgs) => {
      if (!hasEveryParam(args, params)) {
        throw new Error(`Schema ${name} was constructed without all of its parameters`);
      }
      Object.freeze(args);
      return construct ? construct(args) : args;
    },
  };
}

/**
 * Every argument is produced by its parameter's own declaration, so a
 * complete record carries the declared value types.
 */
const hasEveryParam = <P extends ParamDecls>(
  args: SchemaArgs,
  params: P
): args is SchemaArgs & ValuesOf<P> =>
  Object.keys(params).every((key) => key in args);
