/**
 * Source locations of TypeScript nodes
 */

import * as ts from "typescript";
import type { SourceLocation } from "@metaderive/engine";

export const getSourceLocation = (
  file: ts.SourceFile,
  start: number,
  length: number
): SourceLocation => {
  const { line, character } = file.getLineAndCharacterOfPosition(start);
  return {
    file: file.fileName,
    line: line + 1,
    column: character + 1,
    length,
  };
};

/**
 * Location of a node, without its leading trivia and doc comments
 */
export const nodeLocation = (
  node: ts.Node,
  file: ts.SourceFile
): SourceLocation =>
  getSourceLocation(file, node.getStart(file), node.getWidth(file));
