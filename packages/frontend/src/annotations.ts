/**
 * Doc-tag annotations.
 *
 * A JSDoc tag whose name is a registered annotation class becomes an
 * annotation; the tag text, split on whitespace, fills the class's
 * parameters in order, so `@alias fetchUser` reads as `{ name: "fetchUser" }`.
 */

import * as ts from "typescript";
import {
  createAnnotation,
  type Annotation,
  type AnnotationClass,
  type AnnotationRegistry,
} from "@metaderive/engine";
import { nodeLocation } from "./location.js";

export const parseAnnotationArgs = (
  annotationClass: AnnotationClass,
  text: string
): Readonly<Record<string, string>> => {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  return Object.fromEntries(
    annotationClass.parameters.flatMap((name, index): [string, string][] => {
      const word = words[index];
      return word === undefined ? [] : [[name, word]];
    })
  );
};

/**
 * Annotations declared in the doc comments of a declaration. `@param` tags
 * of a function's comment describe parameters, not the function, and are
 * skipped.
 */
export const readAnnotations = (
  node: ts.Node,
  file: ts.SourceFile,
  registry: AnnotationRegistry
): readonly Annotation[] =>
  ts
    .getJSDocTags(node)
    .filter((tag) => !ts.isJSDocParameterTag(tag))
    .flatMap((tag) => {
      const annotationClass = registry.get(tag.tagName.text);
      if (!annotationClass) {
        return [];
      }
      const text = ts.getTextOfJSDocComment(tag.comment) ?? "";
      return [
        createAnnotation(
          annotationClass,
          parseAnnotationArgs(annotationClass, text),
          nodeLocation(tag, file)
        ),
      ];
    });
