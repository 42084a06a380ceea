/**
 * Metadata schema types.
 *
 * A schema is an ordered set of named parameters; each parameter declares
 * the type of value it holds and a list of qualifiers saying how that value
 * is derived from a real interface, method or parameter.
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type { AnnotationClass } from "../model/annotations.js";
import type { TypeToken } from "../context/registry.js";

export type SchemaScope = "interface" | "method" | "parameter";

export type Single = { readonly kind: "single" };
export type Optional = { readonly kind: "optional" };
export type Many = { readonly kind: "many"; readonly named: false };
export type ManyNamed = { readonly kind: "many"; readonly named: true };

export type Cardinality = Single | Optional | Many | ManyNamed;

/**
 * Value shape produced for a cardinality over element type V
 */
export type Collected<C extends Cardinality, V> = C extends Single
  ? V
  : C extends Optional
    ? V | undefined
    : C extends ManyNamed
      ? Readonly<Record<string, V>>
      : readonly V[];

/**
 * Tag hierarchy used to classify real members. Members without a tag
 * annotation refining `base` get `defaultTag`, which itself defaults to
 * `base`.
 */
export type TagConfig = {
  readonly base: AnnotationClass;
  readonly defaultTag?: AnnotationClass;
};

export type DeclaredType =
  | { readonly kind: "boolean" }
  | { readonly kind: "string" }
  | { readonly kind: "position" }
  | { readonly kind: "flags" }
  | { readonly kind: "annotation"; readonly annotationClass: AnnotationClass }
  | { readonly kind: "schema"; readonly schema: SchemaRef }
  | { readonly kind: "token"; readonly token: TypeToken<unknown> };

export type StrategyQualifier =
  | { readonly kind: "embedded" }
  | { readonly kind: "contextual" }
  | { readonly kind: "annotation" }
  | { readonly kind: "name"; readonly useAlias: boolean }
  | { readonly kind: "position" }
  | { readonly kind: "flags" }
  | { readonly kind: "presence"; readonly annotationClass: AnnotationClass }
  | { readonly kind: "perMethod" }
  | { readonly kind: "perParameter" };

export type ModifierQualifier =
  | { readonly kind: "cardinality"; readonly cardinality: Cardinality }
  | { readonly kind: "tagged"; readonly tag: AnnotationClass }
  | { readonly kind: "auxiliary" }
  | { readonly kind: "strict" }
  | { readonly kind: "paramTag"; readonly config: TagConfig }
  | { readonly kind: "matchName"; readonly name: string }
  /** Declared result type of a method, or declared type of a parameter */
  | { readonly kind: "memberType"; readonly typeName: string };

export type Qualifier = StrategyQualifier | ModifierQualifier;

export type ModifierKind = ModifierQualifier["kind"];

export const STRATEGY_KINDS: ReadonlySet<string> = new Set<
  StrategyQualifier["kind"]
>([
  "embedded",
  "contextual",
  "annotation",
  "name",
  "position",
  "flags",
  "presence",
  "perMethod",
  "perParameter",
]);

export const isStrategyQualifier = (
  qualifier: Qualifier
): qualifier is StrategyQualifier => STRATEGY_KINDS.has(qualifier.kind);

export const isModifierQualifier = (
  qualifier: Qualifier
): qualifier is ModifierQualifier => !isStrategyQualifier(qualifier);

export type ParamDecl<V> = {
  readonly declaredType: DeclaredType;
  readonly qualifiers: readonly Qualifier[];
  /** Contextual parameter: derived by lookup unless a strategy says otherwise */
  readonly implicit: boolean;
  readonly location?: SourceLocation;
  /** Phantom member carrying the parameter's value type */
  readonly __value?: V;
};

export type SchemaParam = {
  readonly name: string;
  readonly decl: ParamDecl<unknown>;
};

export type SchemaArgs = Readonly<Record<string, unknown>>;

export type Schema<V, S extends SchemaScope = SchemaScope> = {
  readonly name: string;
  readonly scope: S;
  readonly params: readonly SchemaParam[];
  readonly methodTag?: TagConfig;
  readonly paramTag?: TagConfig;
  readonly location?: SourceLocation;
  readonly construct: (args: SchemaArgs) => V;
};

export type AnySchema = Schema<unknown>;

export type SchemaValue<S> = S extends Schema<infer V> ? V : never;

/**
 * Schema or a thunk returning it; thunks allow schemas that refer to
 * themselves or to schemas declared later.
 */
export type SchemaRefOf<V, S extends SchemaScope = SchemaScope> =
  | Schema<V, S>
  | (() => Schema<V, S>);

export type SchemaRef = SchemaRefOf<unknown>;

export const resolveSchemaRef = <V, S extends SchemaScope>(
  ref: SchemaRefOf<V, S>
): Schema<V, S> => (typeof ref === "function" ? ref() : ref);
