/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { createSystemEngine, PackagingEngine } from "@luastitch/backend";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { analyzeCommand } from "../commands/analyze.js";
import { buildCommand } from "../commands/build.js";
import { enginesCommand } from "../commands/engines.js";
import type { LuastitchConfig, ParsedArgs, ResolvedConfig } from "../types.js";
import { Result } from "@luastitch/frontend";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const showVersion = (): void => {
  console.log(`luastitch v${VERSION}`);
};

/**
 * Load luastitch.json (given with -config, or found from the working
 * directory) and merge it with the command line
 */
const loadProjectConfig = (
  parsed: ParsedArgs,
  entryFile: string
): Result<ResolvedConfig, string> => {
  const cwd = process.cwd();
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: LuastitchConfig = {};
  if (configPath) {
    const loaded = loadConfig(configPath);
    if (!loaded.ok) return loaded;
    fileConfig = loaded.value;
  }

  return {
    ok: true,
    value: resolveConfig(
      fileConfig,
      parsed.options,
      configPath ? dirname(configPath) : undefined,
      entryFile,
      cwd
    ),
  };
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  engine: PackagingEngine = createSystemEngine()
): Promise<number> => {
  if (args.length === 0) {
    showVersion();
    return 0;
  }

  const parsed = parseArgs(args);
  if (parsed.error !== undefined) {
    console.error(`Error: ${parsed.error}`);
    return 1;
  }

  switch (parsed.command) {
    case "version":
      showVersion();
      return 0;

    case "help":
      showHelp();
      return 0;

    case "engines":
      enginesCommand(engine);
      return 0;

    case "analyze":
    case "build": {
      const entryFile = parsed.entryFile;
      if (!entryFile) {
        console.error(`Error: ${parsed.command} command requires an entry script`);
        console.error(
          `  Usage: luastitch ${parsed.command} <entry.lua> [options]`
        );
        return 1;
      }
      if (!entryFile.endsWith(".lua")) {
        console.error(`Error: Entry script must be a .lua file: ${entryFile}`);
        return 1;
      }

      const config = loadProjectConfig(parsed, entryFile);
      if (!config.ok) {
        console.error(`Error: ${config.error}`);
        return 1;
      }

      const result =
        parsed.command === "analyze"
          ? analyzeCommand(config.value)
          : buildCommand(config.value, engine);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return 1;
      }
      return 0;
    }

    default:
      console.error(`Error: Unknown command '${parsed.command}'`);
      console.error("Run 'luastitch help' for usage information");
      return 2;
  }
};
