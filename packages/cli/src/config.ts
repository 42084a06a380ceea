/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { error, ok, type Result } from "@metaderive/engine";
import { CONFIG_FILE_NAME } from "./cli/constants.js";
import type {
  CliOptions,
  MetaderiveConfig,
  ResolvedConfig,
  TargetConfig,
} from "./types.js";

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const optionalString = (value: unknown): value is string | undefined =>
  value === undefined || typeof value === "string";

const validateTarget = (
  value: unknown,
  index: number
): Result<TargetConfig, string> => {
  if (
    !isRecord(value) ||
    typeof value.interface !== "string" ||
    typeof value.schema !== "string" ||
    !optionalString(value.exportName)
  ) {
    return error(
      `${CONFIG_FILE_NAME}: targets[${index}] needs string 'interface' and 'schema' fields`
    );
  }
  return ok({
    interface: value.interface,
    schema: value.schema,
    exportName: value.exportName,
  });
};

/**
 * Check the shape of a parsed metaderive.json
 */
export const validateConfig = (
  value: unknown
): Result<MetaderiveConfig, string> => {
  if (!isRecord(value)) {
    return error(`${CONFIG_FILE_NAME}: expected an object`);
  }
  if (!isStringArray(value.sources) || value.sources.length === 0) {
    return error(`${CONFIG_FILE_NAME}: 'sources' must list at least one file`);
  }
  if (typeof value.schemaModule !== "string" || value.schemaModule === "") {
    return error(`${CONFIG_FILE_NAME}: 'schemaModule' is required`);
  }
  if (!optionalString(value.outputDirectory) || !optionalString(value.$schema)) {
    return error(
      `${CONFIG_FILE_NAME}: 'outputDirectory' and '$schema' must be strings`
    );
  }
  if (
    value.includeTimestamp !== undefined &&
    typeof value.includeTimestamp !== "boolean"
  ) {
    return error(`${CONFIG_FILE_NAME}: 'includeTimestamp' must be a boolean`);
  }
  if (!Array.isArray(value.targets)) {
    return error(`${CONFIG_FILE_NAME}: 'targets' is required`);
  }

  const targets: TargetConfig[] = [];
  for (const [index, target] of value.targets.entries()) {
    const validated = validateTarget(target, index);
    if (!validated.ok) {
      return validated;
    }
    targets.push(validated.value);
  }

  return ok({
    $schema: value.$schema,
    sources: value.sources,
    schemaModule: value.schemaModule,
    outputDirectory: value.outputDirectory,
    includeTimestamp: value.includeTimestamp,
    targets,
  });
};

/**
 * Load metaderive.json
 */
export const loadConfig = (
  configPath: string
): Result<MetaderiveConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    return validateConfig(parsed);
  } catch (e) {
    return error(
      `Failed to parse ${CONFIG_FILE_NAME}: ${e instanceof Error ? e.message : String(e)}`
    );
  }
};

/**
 * Find metaderive.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      // Hit root
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args. Relative paths are
 * taken from the project root, except `--out`, which is taken from the
 * working directory.
 */
export const resolveConfig = (
  config: MetaderiveConfig,
  cliOptions: CliOptions,
  projectRoot: string
): ResolvedConfig => ({
  projectRoot,
  sources: config.sources.map((source) => resolve(projectRoot, source)),
  schemaModule: resolve(projectRoot, config.schemaModule),
  outputDirectory: cliOptions.out
    ? resolve(cliOptions.out)
    : resolve(projectRoot, config.outputDirectory ?? "generated"),
  includeTimestamp: config.includeTimestamp ?? true,
  targets: config.targets,
  verbose: cliOptions.verbose ?? false,
  quiet: cliOptions.quiet ?? false,
});
