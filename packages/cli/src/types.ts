/**
 * Type definitions for CLI
 */

/**
 * Project configuration file (luastitch.json)
 */
export type LuastitchConfig = {
  readonly $schema?: string;
  readonly maxNodes?: number;
  // Relative to the directory holding luastitch.json
  readonly searchRoots?: readonly string[];
  readonly engine?: string;
  readonly output?: string;
  // Extra luastatic arguments (C compiler and library flags)
  readonly engineArgs?: readonly string[];
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  config?: string;
  max?: number;
  paths?: string[];
  detail?: boolean;
  bundle?: string;
  engine?: string;
  output?: string;
  requires?: string[];
  manual?: boolean;
  engineArgs?: string[];
};

export type ParsedArgs = {
  readonly command: string;
  readonly entryFile?: string;
  readonly options: CliOptions;
  // Set when the arguments are malformed
  readonly error?: string;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  // As given on the command line
  readonly entryPath: string;
  // Directory containing luastitch.json, if one was found
  readonly projectRoot: string | undefined;
  readonly maxNodes: number;
  readonly searchRoots: readonly string[];
  readonly engineName: string;
  readonly outputPath: string;
  readonly bundlePath: string | undefined;
  readonly explicitRequires: readonly string[];
  readonly manualMode: boolean;
  readonly engineArgs: readonly string[];
  readonly detail: boolean;
};
