/**
 * Value emitter - prints a value tree as a TypeScript expression
 */

import * as ts from "typescript";
import {
  errorDiagnostic,
  type Annotation,
  type LookupNode,
  type MetadataNode,
  type ParamPosition,
} from "@metaderive/engine";
import { emitPropertyName } from "./naming.js";
import { withDiagnostic, withImport, type EmitterContext } from "./types.js";

const factory = ts.factory;

type Property = { readonly name: string; readonly value: ts.Expression };

export const emitNode = (
  node: MetadataNode,
  context: EmitterContext
): [ts.Expression, EmitterContext] => {
  switch (node.kind) {
    case "literal":
      return emitLiteral(node.value, context);
    case "absent":
      return [factory.createIdentifier("undefined"), context];
    case "annotation":
      return [emitAnnotation(node.annotation), context];
    case "position":
      return [emitPosition(node.position), context];
    case "lookup":
      return emitLookup(node, context);
    case "list": {
      const [items, next] = emitAll(node.items, context);
      return [factory.createArrayLiteralExpression(items, items.length > 0), next];
    }
    case "record":
      return emitProperties(
        node.entries.map((entry) => ({ name: entry.key, node: entry.node })),
        context
      );
    // Custom schema constructors run only in derive(); modules hold the arguments
    case "construct":
      return emitProperties(node.args, context);
  }
};

const emitAll = (
  nodes: readonly MetadataNode[],
  context: EmitterContext
): [readonly ts.Expression[], EmitterContext] =>
  nodes.reduce<[readonly ts.Expression[], EmitterContext]>(
    ([emitted, current], node) => {
      const [expression, next] = emitNode(node, current);
      return [[...emitted, expression], next];
    },
    [[], context]
  );

const emitProperties = (
  entries: readonly { readonly name: string; readonly node: MetadataNode }[],
  context: EmitterContext
): [ts.Expression, EmitterContext] => {
  const [values, next] = emitAll(
    entries.map((entry) => entry.node),
    context
  );
  const properties = entries.flatMap((entry, index): Property[] => {
    const value = values[index];
    return value ? [{ name: entry.name, value }] : [];
  });
  return [objectLiteral(properties), next];
};

const objectLiteral = (properties: readonly Property[]): ts.Expression =>
  factory.createObjectLiteralExpression(
    properties.map((property) =>
      factory.createPropertyAssignment(
        emitPropertyName(property.name),
        property.value
      )
    ),
    properties.length > 0
  );

const emitLiteral = (
  value: string | number | boolean,
  context: EmitterContext
): [ts.Expression, EmitterContext] => {
  if (typeof value === "number" && !Number.isFinite(value)) {
    return [
      factory.createIdentifier("undefined"),
      withDiagnostic(
        errorDiagnostic("MD5001", `Cannot emit non-finite number ${value}`),
        context
      ),
    ];
  }
  return [primitive(value), context];
};

const primitive = (value: string | number | boolean): ts.Expression => {
  if (typeof value === "string") {
    return factory.createStringLiteral(value);
  }
  if (typeof value === "boolean") {
    return value ? factory.createTrue() : factory.createFalse();
  }
  return value < 0 || Object.is(value, -0)
    ? factory.createPrefixUnaryExpression(
        ts.SyntaxKind.MinusToken,
        factory.createNumericLiteral(-value)
      )
    : factory.createNumericLiteral(value);
};

/**
 * `{ annotation: "GET", args: { path: "/users" } }`
 */
export const emitAnnotation = (annotation: Annotation): ts.Expression =>
  objectLiteral([
    {
      name: "annotation",
      value: factory.createStringLiteral(annotation.annotationClass.name),
    },
    {
      name: "args",
      value: objectLiteral(
        Object.entries(annotation.args).map(([name, value]) => ({
          name,
          value: factory.createStringLiteral(value),
        }))
      ),
    },
  ]);

const emitPosition = (position: ParamPosition): ts.Expression =>
  objectLiteral([
    { name: "index", value: primitive(position.index) },
    { name: "indexOfGroup", value: primitive(position.indexOfGroup) },
    { name: "indexInGroup", value: primitive(position.indexInGroup) },
    { name: "indexInMatch", value: primitive(position.indexInMatch) },
  ]);

/**
 * Registered instances with a source are imported; others are inlined when
 * they are plain data.
 */
const emitLookup = (
  node: LookupNode,
  context: EmitterContext
): [ts.Expression, EmitterContext] => {
  const ref = node.ref ?? context.options.resolver.lookup(node.token);
  if (!ref) {
    return [
      factory.createIdentifier("undefined"),
      withDiagnostic(
        errorDiagnostic(
          "MD3001",
          `${node.requestedBy}: no instance of ${node.token.name} is registered`,
          node.location
        ),
        context
      ),
    ];
  }

  if (ref.source) {
    const [localName, next] = withImport(ref.source, context);
    return [factory.createIdentifier(localName), next];
  }

  const inlined = emitJsonValue(ref.value);
  if (inlined) {
    return [inlined, context];
  }
  return [
    factory.createIdentifier("undefined"),
    withDiagnostic(
      errorDiagnostic(
        "MD5001",
        `${node.requestedBy}: the registered ${node.token.name} has no source module and is not plain data`,
        node.location,
        [],
        "register the instance with a source so generated code can import it"
      ),
      context
    ),
  ];
};

/**
 * Expression for JSON-compatible data, undefined for anything else
 */
export const emitJsonValue = (value: unknown): ts.Expression | undefined => {
  if (value === null) {
    return factory.createNull();
  }
  if (typeof value === "string" || typeof value === "boolean") {
    return primitive(value);
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? primitive(value) : undefined;
  }
  if (Array.isArray(value)) {
    const items = value.map((item: unknown) => emitJsonValue(item));
    const emitted = items.filter(
      (item): item is ts.Expression => item !== undefined
    );
    return emitted.length === items.length
      ? factory.createArrayLiteralExpression(emitted, emitted.length > 0)
      : undefined;
  }
  if (isPlainObject(value)) {
    const properties: Property[] = [];
    for (const [name, entry] of Object.entries(value)) {
      const emitted = emitJsonValue(entry);
      if (!emitted) {
        return undefined;
      }
      properties.push({ name, value: emitted });
    }
    return objectLiteral(properties);
  }
  return undefined;
};

const isPlainObject = (value: unknown): value is object => {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};
