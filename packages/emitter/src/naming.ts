/**
 * Names in generated modules
 */

import * as ts from "typescript";

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export const isIdentifierName = (name: string): boolean =>
  IDENTIFIER.test(name);

/**
 * `UserApi` -> `userApi`, `user-api` -> `userApi`
 */
export const toCamelCase = (name: string): string => {
  const words = name.split(/[^A-Za-z0-9]+/).filter((word) => word.length > 0);
  return words
    .map((word, index) =>
      index === 0
        ? word.charAt(0).toLowerCase() + word.slice(1)
        : word.charAt(0).toUpperCase() + word.slice(1)
    )
    .join("");
};

/**
 * Export name of one derived value: `UserApi` + `RestMetadata` gives
 * `userApiRestMetadata`.
 */
export const defaultExportName = (
  interfaceName: string,
  schemaName: string
): string => {
  const schemaPart = toCamelCase(schemaName);
  return (
    toCamelCase(interfaceName) +
    schemaPart.charAt(0).toUpperCase() +
    schemaPart.slice(1)
  );
};

export const emitPropertyName = (name: string): ts.PropertyName =>
  isIdentifierName(name)
    ? ts.factory.createIdentifier(name)
    : ts.factory.createStringLiteral(name);
