/**
 * Real declarations a schema is derived from
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type { Annotation } from "../model/annotations.js";
import {
  externalName,
  interfaceAnnotations,
  methodAnnotations,
  paramAnnotations,
  type RealInterface,
  type RealMethod,
  type RealParam,
} from "../model/interface-model.js";

export type Subject =
  | { readonly kind: "interface"; readonly iface: RealInterface }
  | {
      readonly kind: "method";
      readonly method: RealMethod;
      readonly iface: RealInterface;
    }
  | {
      readonly kind: "parameter";
      readonly param: RealParam;
      readonly method: RealMethod;
    };

export const describeMethod = (method: RealMethod): string =>
  method.owner ? `${method.owner}.${method.name}` : method.name;

export const describeSubject = (subject: Subject): string => {
  switch (subject.kind) {
    case "interface":
      return `interface ${subject.iface.name}`;
    case "method":
      return `method ${describeMethod(subject.method)}`;
    case "parameter":
      return `parameter ${subject.param.name} of method ${describeMethod(subject.method)}`;
  }
};

export const subjectName = (subject: Subject): string => {
  switch (subject.kind) {
    case "interface":
      return subject.iface.name;
    case "method":
      return subject.method.name;
    case "parameter":
      return subject.param.name;
  }
};

export const subjectLocation = (
  subject: Subject
): SourceLocation | undefined => {
  switch (subject.kind) {
    case "interface":
      return subject.iface.location;
    case "method":
      return subject.method.location;
    case "parameter":
      return subject.param.location;
  }
};

/**
 * Own and inherited annotations of the subject
 */
export const subjectAnnotations = (subject: Subject): readonly Annotation[] => {
  switch (subject.kind) {
    case "interface":
      return interfaceAnnotations(subject.iface);
    case "method":
      return methodAnnotations(subject.method);
    case "parameter":
      return paramAnnotations(subject.param, subject.method);
  }
};

/**
 * Annotations of the declaration enclosing the subject: the interface of a
 * method, the method of a parameter.
 */
export const enclosingAnnotations = (
  subject: Subject
): readonly Annotation[] => {
  switch (subject.kind) {
    case "interface":
      return [];
    case "method":
      return interfaceAnnotations(subject.iface);
    case "parameter":
      return methodAnnotations(subject.method);
  }
};

export const subjectExternalName = (subject: Subject): string =>
  externalName(subjectName(subject), subjectAnnotations(subject));
