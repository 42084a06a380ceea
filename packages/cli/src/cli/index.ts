/**
 * CLI - Public API
 */

export { CONFIG_FILE_NAME, METADATA_FILE_SUFFIX, VERSION } from "./constants.js";
export { showHelp } from "./help.js";
export { parseArgs } from "./parser.js";
export { runCli } from "./dispatcher.js";
export { findConfig, loadConfig, resolveConfig, validateConfig } from "../config.js";
export { loadSchemaModule, readSchemaModule } from "../schema-module.js";
export { generateCommand } from "../commands/generate.js";
export { formatInterface, inspectCommand } from "../commands/inspect.js";
export type * from "../types.js";
