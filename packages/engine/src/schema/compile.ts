/**
 * Schema compilation.
 *
 * Classifies every parameter of a schema tree, checks that declared types,
 * scopes and modifiers agree with the strategies, resolves tag
 * configuration and detects schemas that embed themselves. Compilation does
 * not look at any real interface, so its result is cached per schema.
 */

import {
  errorDiagnostic,
  type Diagnostic,
  type SourceLocation,
} from "../types/diagnostic.js";
import { error, ok, type Result } from "../types/result.js";
import {
  TAG,
  isRefinementOf,
  type AnnotationClass,
} from "../model/annotations.js";
import type { TypeToken } from "../context/registry.js";
import { classify, type Strategy } from "./strategy.js";
import {
  isModifierQualifier,
  resolveSchemaRef,
  type AnySchema,
  type Cardinality,
  type DeclaredType,
  type ModifierKind,
  type ModifierQualifier,
  type SchemaParam,
  type SchemaScope,
  type TagConfig,
} from "./types.js";

type ParamBase = {
  readonly name: string;
  /** Parameter name with its owner chain, for diagnostics */
  readonly description: string;
  readonly location?: SourceLocation;
};

export type CompiledDirectParam = ParamBase &
  (
    | {
        readonly kind: "contextual";
        readonly token: TypeToken<unknown>;
        readonly strict: boolean;
      }
    | {
        readonly kind: "annotation";
        readonly annotationClass: AnnotationClass;
        readonly cardinality: Cardinality;
      }
    | { readonly kind: "name"; readonly useAlias: boolean }
    | { readonly kind: "position" }
    | { readonly kind: "flags" }
    | { readonly kind: "presence"; readonly annotationClass: AnnotationClass }
  );

export type CompiledEmbeddedParam = ParamBase & {
  readonly kind: "embedded";
  readonly schema: CompiledSchema;
};

export type CompiledMemberParam = ParamBase & {
  readonly kind: "perMethod" | "perParameter";
  readonly schema: CompiledSchema;
  readonly cardinality: Cardinality;
  /** Tag a member must refine to be accepted; undefined accepts every member */
  readonly restriction?: AnnotationClass;
  /** Tag configuration classifying the members this parameter sees */
  readonly memberTags?: TagConfig;
  readonly auxiliary: boolean;
  readonly matchName?: string;
  /** Declared type a member must have to be accepted */
  readonly memberType?: string;
};

export type CompiledParam =
  | CompiledDirectParam
  | CompiledEmbeddedParam
  | CompiledMemberParam;

export type CompiledSchema = {
  readonly schema: AnySchema;
  readonly scope: SchemaScope;
  readonly description: string;
  readonly params: readonly CompiledParam[];
  /** Member parameters of this schema and of every schema embedded in it */
  readonly memberParams: readonly CompiledMemberParam[];
  readonly methodTag?: TagConfig;
  readonly paramTag?: TagConfig;
};

type InheritedTags = {
  readonly methodTag?: TagConfig;
  readonly paramTag?: TagConfig;
};

type Enclosing = {
  readonly description: string;
  /** Schemas on the path from the root, with the parameter leading out of each */
  readonly path: readonly { readonly schema: AnySchema; readonly via: string }[];
  readonly tags: InheritedTags;
  /** paramTag qualifier of the perMethod parameter leading here */
  readonly paramTagOverride?: TagConfig;
};

type Problems = Diagnostic[];

const ALLOWED_MODIFIERS: Readonly<
  Record<Exclude<Strategy["kind"], "unrecognized">, readonly ModifierKind[]>
> = {
  contextual: ["strict"],
  annotation: ["cardinality"],
  name: [],
  position: [],
  flags: [],
  presence: [],
  embedded: [],
  perMethod: [
    "cardinality",
    "tagged",
    "auxiliary",
    "matchName",
    "memberType",
    "paramTag",
  ],
  perParameter: ["cardinality", "tagged", "auxiliary", "matchName", "memberType"],
};

const SINGLE: Cardinality = { kind: "single" };

const cache = new WeakMap<AnySchema, Result<CompiledSchema, readonly Diagnostic[]>>();

/**
 * Compile a root schema. Every problem found anywhere in the schema tree is
 * reported; any problem makes the schema unusable.
 */
export const compileSchema = (
  schema: AnySchema
): Result<CompiledSchema, readonly Diagnostic[]> => {
  const cached = cache.get(schema);
  if (cached) {
    return cached;
  }

  const problems: Problems = [];
  if (schema.scope !== "interface") {
    problems.push(
      errorDiagnostic(
        "MD1001",
        `schema ${schema.name} has ${schema.scope} scope; derivation starts from an interface-scope schema`,
        schema.location
      )
    );
  }
  const compiled = compileNode(
    schema,
    { description: "", path: [], tags: {} },
    problems
  );
  const result: Result<CompiledSchema, readonly Diagnostic[]> =
    problems.length > 0 ? error(problems) : ok(compiled);
  cache.set(schema, result);
  return result;
};

const compileNode = (
  schema: AnySchema,
  enclosing: Enclosing,
  problems: Problems
): CompiledSchema => {
  const description = `schema ${schema.name}${enclosing.description ? ` at ${enclosing.description}` : ""}`;

  checkTagOptions(schema, description, problems);

  const methodTag = schema.methodTag ?? enclosing.tags.methodTag;
  const paramTag =
    enclosing.paramTagOverride ?? schema.paramTag ?? enclosing.tags.paramTag;

  const node = {
    schema,
    scope: schema.scope,
    description,
    methodTag,
    paramTag,
  };

  const params = schema.params.flatMap((param): readonly CompiledParam[] => {
    const compiled = compileParam(param, node, enclosing, problems);
    return compiled ? [compiled] : [];
  });

  const memberParams = params.flatMap(
    (param): readonly CompiledMemberParam[] => {
      switch (param.kind) {
        case "perMethod":
        case "perParameter":
          return [param];
        case "embedded":
          return param.schema.memberParams;
        default:
          return [];
      }
    }
  );

  return { ...node, params, memberParams };
};

type NodeHeader = Omit<CompiledSchema, "params" | "memberParams">;

const compileParam = (
  param: SchemaParam,
  owner: NodeHeader,
  enclosing: Enclosing,
  problems: Problems
): CompiledParam | undefined => {
  const { decl } = param;
  const description = `parameter \`${param.name}\` of ${owner.description}`;
  const location = decl.location ?? owner.schema.location;
  const base: ParamBase = { name: param.name, description, location };
  const report = (message: string): undefined => {
    problems.push(errorDiagnostic("MD1001", `${description}: ${message}`, location));
    return undefined;
  };

  const strategy = classify(decl);
  if (strategy.kind === "unrecognized") {
    return report(strategy.reason);
  }

  const modifiers = decl.qualifiers.filter(isModifierQualifier);
  const modifierProblems = checkModifiers(strategy.kind, modifiers);
  modifierProblems.forEach((message) => report(message));

  const typeName = describeDeclaredType(decl.declaredType);
  const cardinality = findModifier(modifiers, "cardinality")?.cardinality ?? SINGLE;

  switch (strategy.kind) {
    case "contextual": {
      if (decl.declaredType.kind !== "token") {
        return report(`contextual lookup needs a type token, found ${typeName}`);
      }
      return modifierProblems.length > 0
        ? undefined
        : { ...base, kind: "contextual", token: decl.declaredType.token, strict: strategy.strict };
    }

    case "annotation": {
      if (decl.declaredType.kind !== "annotation") {
        return report(`annotation capture needs an annotation type, found ${typeName}`);
      }
      if (cardinality.kind === "many" && cardinality.named) {
        return report("captured annotations cannot be collected by name");
      }
      return modifierProblems.length > 0
        ? undefined
        : {
            ...base,
            kind: "annotation",
            annotationClass: decl.declaredType.annotationClass,
            cardinality,
          };
    }

    case "name":
      return expectType(decl.declaredType, "string", report, () => ({
        ...base,
        kind: "name",
        useAlias: strategy.useAlias,
      }));

    case "presence":
      return expectType(decl.declaredType, "boolean", report, () => ({
        ...base,
        kind: "presence",
        annotationClass: strategy.annotationClass,
      }));

    case "position":
    case "flags": {
      if (owner.scope !== "parameter") {
        return report(
          `${strategy.kind} capture is only available in parameter-scope schemas, not ${owner.scope} scope`
        );
      }
      const kind = strategy.kind;
      return expectType(decl.declaredType, kind, report, () => ({ ...base, kind }));
    }

    case "embedded":
    case "perMethod":
    case "perParameter": {
      if (decl.declaredType.kind !== "schema") {
        return report(`${strategy.kind} needs a schema type, found ${typeName}`);
      }
      const nested = resolveSchemaRef(decl.declaredType.schema);
      const expectedScope = nestedScope(strategy.kind, owner.scope);
      if (expectedScope === undefined) {
        return report(`${strategy.kind} is not available in ${owner.scope}-scope schemas`);
      }
      if (nested.scope !== expectedScope) {
        return report(
          `${strategy.kind} schema ${nested.name} has ${nested.scope} scope, expected ${expectedScope}`
        );
      }

      const onPath = enclosing.path.find((entry) => entry.schema === nested);
      if (nested === owner.schema || onPath) {
        const cycle = [...enclosing.path, { schema: owner.schema, via: param.name }];
        const start = cycle.findIndex((entry) => entry.schema === nested);
        problems.push(
          errorDiagnostic(
            "MD1002",
            `${description}: schema ${nested.name} embeds itself: ${cycle
              .slice(start)
              .map((entry) => `${entry.schema.name}.${entry.via}`)
              .join(" -> ")} -> ${nested.name}`,
            location,
            [nested.location]
          )
        );
        return undefined;
      }

      const paramTagQualifier = findModifier(modifiers, "paramTag")?.config;
      if (paramTagQualifier) {
        checkTagConfig(paramTagQualifier, `${description}: paramTag`, location, problems);
      }

      const compiledNested = compileNode(
        nested,
        {
          description,
          path: [...enclosing.path, { schema: owner.schema, via: param.name }],
          tags: { methodTag: owner.methodTag, paramTag: owner.paramTag },
          paramTagOverride: paramTagQualifier,
        },
        problems
      );

      if (modifierProblems.length > 0) {
        return undefined;
      }

      if (strategy.kind === "embedded") {
        return { ...base, kind: "embedded", schema: compiledNested };
      }

      const memberTags =
        strategy.kind === "perMethod" ? owner.methodTag : owner.paramTag;
      const tagged = findModifier(modifiers, "tagged")?.tag;
      if (tagged && !isRefinementOf(tagged, memberTags?.base ?? TAG)) {
        return report(
          `tag @${tagged.name} does not refine @${(memberTags?.base ?? TAG).name}`
        );
      }

      return {
        ...base,
        kind: strategy.kind,
        schema: compiledNested,
        cardinality,
        restriction: tagged ?? memberTags?.base,
        memberTags,
        auxiliary: findModifier(modifiers, "auxiliary") !== undefined,
        matchName: findModifier(modifiers, "matchName")?.name,
        memberType: findModifier(modifiers, "memberType")?.typeName,
      };
    }
  }
};

const nestedScope = (
  kind: "embedded" | "perMethod" | "perParameter",
  ownerScope: SchemaScope
): SchemaScope | undefined => {
  switch (kind) {
    case "embedded":
      return ownerScope;
    case "perMethod":
      return ownerScope === "interface" ? "method" : undefined;
    case "perParameter":
      return ownerScope === "method" ? "parameter" : undefined;
  }
};

const expectType = <T>(
  declaredType: DeclaredType,
  expected: DeclaredType["kind"],
  report: (message: string) => undefined,
  build: () => T
): T | undefined =>
  declaredType.kind === expected
    ? build()
    : report(`expected a ${expected} parameter, found ${describeDeclaredType(declaredType)}`);

const findModifier = <K extends ModifierKind>(
  modifiers: readonly ModifierQualifier[],
  kind: K
): Extract<ModifierQualifier, { readonly kind: K }> | undefined =>
  modifiers.find(
    (m): m is Extract<ModifierQualifier, { readonly kind: K }> => m.kind === kind
  );

const checkModifiers = (
  strategy: Exclude<Strategy["kind"], "unrecognized">,
  modifiers: readonly ModifierQualifier[]
): readonly string[] => {
  const allowed = ALLOWED_MODIFIERS[strategy];
  const seen = new Set<ModifierKind>();
  const messages: string[] = [];
  for (const modifier of modifiers) {
    if (!allowed.includes(modifier.kind)) {
      messages.push(`${modifier.kind} cannot be used with ${strategy}`);
    } else if (seen.has(modifier.kind)) {
      messages.push(`${modifier.kind} is declared more than once`);
    }
    seen.add(modifier.kind);
  }
  return messages;
};

const checkTagOptions = (
  schema: AnySchema,
  description: string,
  problems: Problems
): void => {
  if (schema.methodTag) {
    if (schema.scope !== "interface") {
      problems.push(
        errorDiagnostic(
          "MD1001",
          `${description}: methodTag is only meaningful on interface-scope schemas`,
          schema.location
        )
      );
    } else {
      checkTagConfig(schema.methodTag, `${description}: methodTag`, schema.location, problems);
    }
  }
  if (schema.paramTag) {
    if (schema.scope === "parameter") {
      problems.push(
        errorDiagnostic(
          "MD1001",
          `${description}: paramTag is not meaningful on parameter-scope schemas`,
          schema.location
        )
      );
    } else {
      checkTagConfig(schema.paramTag, `${description}: paramTag`, schema.location, problems);
    }
  }
};

const checkTagConfig = (
  config: TagConfig,
  context: string,
  location: SourceLocation | undefined,
  problems: Problems
): void => {
  if (!isRefinementOf(config.base, TAG)) {
    problems.push(
      errorDiagnostic("MD1001", `${context}: @${config.base.name} is not a tag`, location)
    );
  }
  if (config.defaultTag && !isRefinementOf(config.defaultTag, config.base)) {
    problems.push(
      errorDiagnostic(
        "MD1001",
        `${context}: default tag @${config.defaultTag.name} does not refine @${config.base.name}`,
        location
      )
    );
  }
};

export const describeDeclaredType = (declaredType: DeclaredType): string => {
  switch (declaredType.kind) {
    case "boolean":
    case "string":
    case "position":
    case "flags":
      return declaredType.kind;
    case "annotation":
      return `annotation @${declaredType.annotationClass.name}`;
    case "schema":
      return `schema ${resolveSchemaRef(declaredType.schema).name}`;
    case "token":
      return `type ${declaredType.token.name}`;
  }
};
