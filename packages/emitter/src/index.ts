/**
 * @metaderive/emitter - prints derived metadata as TypeScript modules
 */

export { emitMetadataModule, printNode, type EmitEntry } from "./module-emitter.js";
export { emitAnnotation, emitJsonValue, emitNode } from "./value-emitter.js";
export {
  GENERATED_WARNING,
  generateFileHeader,
  type HeaderOptions,
} from "./constants.js";
export {
  defaultExportName,
  emitPropertyName,
  isIdentifierName,
  toCamelCase,
} from "./naming.js";
export {
  createContext,
  defaultOptions,
  type EmitterContext,
  type EmitterOptions,
  type ImportBinding,
} from "./types.js";
