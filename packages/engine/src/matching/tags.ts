/**
 * Tag inheritance and filtering
 */

import {
  TAG,
  annotationsOf,
  isRefinementOf,
  type Annotation,
  type AnnotationClass,
} from "../model/annotations.js";
import type { TagConfig } from "../schema/types.js";

/**
 * The class of the first annotation refining the configured base tag, else
 * the configured default. Without a configuration only explicit tags count.
 */
export const effectiveTag = (
  annotations: readonly Annotation[],
  config: TagConfig | undefined
): AnnotationClass | undefined => {
  const own = annotationsOf(annotations, config?.base ?? TAG)[0];
  if (own) {
    return own.annotationClass;
  }
  return config ? (config.defaultTag ?? config.base) : undefined;
};

/**
 * An undefined restriction accepts every declaration, tagged or not.
 */
export const acceptsTag = (
  restriction: AnnotationClass | undefined,
  tag: AnnotationClass | undefined
): boolean =>
  restriction === undefined ||
  (tag !== undefined && isRefinementOf(tag, restriction));
