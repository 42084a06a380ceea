/**
 * CLI command dispatcher
 */

import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { loadSchemaModule } from "../schema-module.js";
import { generateCommand } from "../commands/generate.js";
import { inspectCommand } from "../commands/inspect.js";
import { CONFIG_FILE_NAME, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const COMMANDS: ReadonlySet<string> = new Set(["generate", "inspect"]);

/**
 * Main CLI entry point
 */
export const runCli = async (args: string[]): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`metaderive v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (!COMMANDS.has(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'metaderive --help' for usage information");
    return 1;
  }

  // Load config
  const configPath = parsed.options.config
    ? resolve(parsed.options.config)
    : findConfig(process.cwd());

  if (!configPath || !existsSync(configPath)) {
    console.error(`Error: No ${CONFIG_FILE_NAME} found`);
    console.error("Create one next to your sources or pass --config");
    return 3;
  }

  const configResult = loadConfig(configPath);
  if (!configResult.ok) {
    console.error(`Error: ${configResult.error}`);
    return 1;
  }

  // Project root is the directory containing metaderive.json
  const config = resolveConfig(
    configResult.value,
    parsed.options,
    dirname(configPath)
  );

  const schemaModule = await loadSchemaModule(config.schemaModule);
  if (!schemaModule.ok) {
    console.error(`Error: ${schemaModule.error}`);
    return 1;
  }
  if (config.verbose) {
    console.log(
      `Loaded ${schemaModule.value.schemas.size} schema(s) from ${config.schemaModule}`
    );
  }

  // Dispatch to command handlers
  switch (parsed.command) {
    case "generate": {
      const result = generateCommand(config, schemaModule.value);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return 2;
      }
      return 0;
    }

    default: {
      const result = inspectCommand(config, schemaModule.value, parsed.file);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return 1;
      }
      return 0;
    }
  }
};
