/**
 * Annotation classes and instances attached to real declarations.
 *
 * Annotation classes form a single-inheritance hierarchy. Tags are the
 * classes refining TAG; aliases (externally-facing names) are the classes
 * refining ALIAS.
 */

import type { SourceLocation } from "../types/diagnostic.js";

export type AnnotationClass = {
  readonly name: string;
  readonly parent?: AnnotationClass;
  /** Names of the positional arguments the annotation takes */
  readonly parameters: readonly string[];
};

export type Annotation = {
  readonly annotationClass: AnnotationClass;
  readonly args: Readonly<Record<string, string>>;
  readonly location?: SourceLocation;
};

export const defineAnnotation = (
  name: string,
  options: {
    readonly parent?: AnnotationClass;
    readonly parameters?: readonly string[];
  } = {}
): AnnotationClass => ({
  name,
  parent: options.parent,
  parameters: options.parameters ?? options.parent?.parameters ?? [],
});

/**
 * Root of every tag hierarchy
 */
export const TAG = defineAnnotation("tag");

/**
 * Externally-facing name of a declaration
 */
export const ALIAS = defineAnnotation("alias", { parameters: ["name"] });

/**
 * True when `cls` is `ancestor` or inherits from it
 */
export const isRefinementOf = (
  cls: AnnotationClass,
  ancestor: AnnotationClass
): boolean => {
  let current: AnnotationClass | undefined = cls;
  while (current) {
    if (current === ancestor) {
      return true;
    }
    current = current.parent;
  }
  return false;
};

export const annotationsOf = (
  annotations: readonly Annotation[],
  cls: AnnotationClass
): readonly Annotation[] =>
  annotations.filter((a) => isRefinementOf(a.annotationClass, cls));

export const createAnnotation = (
  annotationClass: AnnotationClass,
  args: Readonly<Record<string, string>> = {},
  location?: SourceLocation
): Annotation => ({ annotationClass, args, location });

/**
 * `@GET`, `@alias(name=get)`
 */
export const formatAnnotation = (annotation: Annotation): string => {
  const args = Object.entries(annotation.args);
  const suffix =
    args.length > 0
      ? `(${args.map(([key, value]) => `${key}=${value}`).join(", ")})`
      : "";
  return `@${annotation.annotationClass.name}${suffix}`;
};

/**
 * Registry of annotation classes by name, used to recognise annotations in
 * source text. TAG and ALIAS are always present.
 */
export class AnnotationRegistry {
  private readonly classes = new Map<string, AnnotationClass>();

  constructor(classes: readonly AnnotationClass[] = []) {
    this.register(TAG);
    this.register(ALIAS);
    for (const cls of classes) {
      this.register(cls);
    }
  }

  /**
   * Register a class and its ancestors. Two distinct classes sharing a name
   * are a programming error.
   */
  register(cls: AnnotationClass): this {
    const existing = this.classes.get(cls.name);
    if (existing && existing !== cls) {
      throw new Error(
        `Annotation class '${cls.name}' is already registered with a different definition`
      );
    }
    this.classes.set(cls.name, cls);
    if (cls.parent) {
      this.register(cls.parent);
    }
    return this;
  }

  get(name: string): AnnotationClass | undefined {
    return this.classes.get(name);
  }

  has(name: string): boolean {
    return this.classes.has(name);
  }

  names(): readonly string[] {
    return [...this.classes.keys()];
  }
}
