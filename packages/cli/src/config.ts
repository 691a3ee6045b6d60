/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname, basename, extname } from "node:path";
import { DEFAULT_MAX_NODES, Result } from "@luastitch/frontend";
import { defaultEngineName } from "@luastitch/backend";
import type { LuastitchConfig, CliOptions, ResolvedConfig } from "./types.js";

export const CONFIG_FILE_NAME = "luastitch.json";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

export const isPositiveInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value > 0;

/**
 * Check field types of a parsed luastitch.json. Unknown fields are ignored.
 */
const validateConfig = (
  raw: unknown
): Result<LuastitchConfig, string> => {
  if (!isRecord(raw)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: expected a JSON object`,
    };
  }

  const { maxNodes, searchRoots, engine, output, engineArgs } = raw;

  if (maxNodes !== undefined && !isPositiveInteger(maxNodes)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'maxNodes' must be a positive integer`,
    };
  }
  if (searchRoots !== undefined && !isStringArray(searchRoots)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'searchRoots' must be an array of strings`,
    };
  }
  if (engine !== undefined && typeof engine !== "string") {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'engine' must be a string`,
    };
  }
  if (output !== undefined && typeof output !== "string") {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'output' must be a string`,
    };
  }
  if (engineArgs !== undefined && !isStringArray(engineArgs)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'engineArgs' must be an array of strings`,
    };
  }

  return {
    ok: true,
    value: { maxNodes, searchRoots, engine, output, engineArgs },
  };
};

/**
 * Load and validate a luastitch.json file
 */
export const loadConfig = (
  configPath: string
): Result<LuastitchConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return validateConfig(raw);
};

/**
 * Find luastitch.json by walking up the directory tree
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
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Executable name for an entry script: its stem, plus `.exe` on Windows
 */
export const defaultOutputName = (
  entryPath: string,
  platform: NodeJS.Platform = process.platform
): string => {
  const stem = basename(entryPath, extname(entryPath));
  return platform === "win32" ? `${stem}.exe` : stem;
};

/**
 * Resolve final configuration from file + CLI args.
 * Paths from the file resolve against `projectRoot`; paths from the command
 * line resolve against `cwd`.
 */
export const resolveConfig = (
  config: LuastitchConfig,
  cliOptions: CliOptions,
  projectRoot: string | undefined,
  entryFile: string,
  cwd: string = process.cwd(),
  platform: NodeJS.Platform = process.platform
): ResolvedConfig => {
  const configDir = projectRoot ?? cwd;

  // Search roots from the file come first, then -path entries
  const searchRoots = [
    ...(config.searchRoots ?? []).map((root) => resolve(configDir, root)),
    ...(cliOptions.paths ?? []).map((root) => resolve(cwd, root)),
  ];

  const outputPath = cliOptions.output
    ? resolve(cwd, cliOptions.output)
    : config.output
      ? resolve(configDir, config.output)
      : join(cwd, defaultOutputName(entryFile, platform));

  return {
    entryPath: entryFile,
    projectRoot,
    maxNodes: cliOptions.max ?? config.maxNodes ?? DEFAULT_MAX_NODES,
    searchRoots,
    engineName: cliOptions.engine ?? config.engine ?? defaultEngineName(),
    outputPath,
    bundlePath: cliOptions.bundle ? resolve(cwd, cliOptions.bundle) : undefined,
    explicitRequires: cliOptions.requires ?? [],
    manualMode: cliOptions.manual ?? false,
    engineArgs: [...(config.engineArgs ?? []), ...(cliOptions.engineArgs ?? [])],
    detail: cliOptions.detail ?? false,
  };
};
