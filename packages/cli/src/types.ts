/**
 * Type definitions for CLI
 */

import type {
  AnnotationRegistry,
  ContextResolver,
  Schema,
} from "@metaderive/engine";

/**
 * One (interface, schema) pair to generate metadata for
 */
export type TargetConfig = {
  readonly interface: string;
  /** Export name of the schema in the schema module */
  readonly schema: string;
  readonly exportName?: string;
};

/**
 * Configuration file (metaderive.json)
 */
export type MetaderiveConfig = {
  readonly $schema?: string;
  readonly sources: readonly string[];
  readonly schemaModule: string;
  readonly outputDirectory?: string;
  readonly includeTimestamp?: boolean;
  readonly targets: readonly TargetConfig[];
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  out?: string;
};

/**
 * Combined configuration (from file + CLI args), paths absolute
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing metaderive.json
  readonly sources: readonly string[];
  readonly schemaModule: string;
  readonly outputDirectory: string;
  readonly includeTimestamp: boolean;
  readonly targets: readonly TargetConfig[];
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * What the configured schema module provides
 */
export type SchemaModule = {
  readonly schemas: ReadonlyMap<string, Schema<unknown>>;
  readonly annotations: AnnotationRegistry;
  readonly context?: ContextResolver;
};
