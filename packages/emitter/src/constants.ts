/**
 * Constants shared by generated metadata modules
 */

export const GENERATED_WARNING = "// WARNING: Do not modify this file manually";

export type HeaderOptions = {
  readonly includeTimestamp?: boolean;
  readonly timestamp?: string;
};

/**
 * Comment block opening every generated module, ending in a newline.
 * Several sources are listed comma-separated.
 */
export const generateFileHeader = (
  source: string | readonly string[],
  { includeTimestamp = true, timestamp }: HeaderOptions = {}
): string =>
  [
    `// Generated from: ${typeof source === "string" ? source : source.join(", ")}`,
    ...(includeTimestamp
      ? [`// Generated at: ${timestamp ?? new Date().toISOString()}`]
      : []),
    GENERATED_WARNING,
    "",
  ].join("\n");
