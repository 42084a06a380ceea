/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

const readVersion = (manifest: unknown): string =>
  typeof manifest === "object" &&
  manifest !== null &&
  "version" in manifest &&
  typeof manifest.version === "string"
    ? manifest.version
    : "0.0.0";

export const VERSION = readVersion(packageJson);

export const CONFIG_FILE_NAME = "metaderive.json";

export const METADATA_FILE_SUFFIX = ".metadata.ts";
