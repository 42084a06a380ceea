/**
 * @metaderive/frontend - interface models from TypeScript sources
 */

export { parseAnnotationArgs, readAnnotations } from "./annotations.js";
export {
  extractFromSource,
  extractInterfaces,
  paramFlagNames,
  parseSource,
  type ExtractedInterfaces,
} from "./extractor.js";
export { findInterface, loadInterfaces } from "./loader.js";
export { getSourceLocation, nodeLocation } from "./location.js";
