/**
 * CLI argument parser
 */

import type { CliOptions, ParsedArgs } from "../types.js";

const parsePositiveInteger = (value: string): number | undefined =>
  /^[0-9]+$/.test(value) && Number(value) > 0 ? Number(value) : undefined;

/**
 * Split a comma-separated `-require` list, dropping empty items
 */
export const splitList = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");

/**
 * Parse CLI arguments. A first positional ending in `.lua` is shorthand for
 * `build <entry>`.
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let entryFile: string | undefined;
  let index = 0;

  const fail = (message: string): ParsedArgs => ({
    command,
    entryFile,
    options,
    error: message,
  });

  // Value of the option just read. Values may not look like options,
  // except where `allowDash` is set.
  const takeValue = (allowDash = false): string | undefined => {
    const value = args[index];
    if (value === undefined || (!allowDash && value.startsWith("-"))) {
      return undefined;
    }
    index++;
    return value;
  };

  while (index < args.length) {
    const arg = args[index++];
    if (arg === undefined) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      if (arg.endsWith(".lua")) {
        command = "build";
        entryFile = arg;
      } else {
        command = arg;
      }
      continue;
    }

    // First positional arg after command is the entry script
    if (command && !entryFile && !arg.startsWith("-")) {
      entryFile = arg;
      continue;
    }

    if (!arg.startsWith("-")) {
      return fail(`Unexpected argument: ${arg}`);
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "--detail":
        options.detail = true;
        break;
      case "--manual":
        options.manual = true;
        break;
      case "-max": {
        const value = takeValue();
        if (value === undefined) return fail(`Option '${arg}' requires a value`);
        const max = parsePositiveInteger(value);
        if (max === undefined) return fail("-max must be a positive integer");
        options.max = max;
        break;
      }
      case "-path": {
        const value = takeValue();
        if (value === undefined) return fail(`Option '${arg}' requires a value`);
        options.paths = [...(options.paths ?? []), value];
        break;
      }
      case "-require": {
        const value = takeValue();
        if (value === undefined) return fail(`Option '${arg}' requires a value`);
        options.requires = [...(options.requires ?? []), ...splitList(value)];
        break;
      }
      case "-engine-arg": {
        const value = takeValue(true);
        if (value === undefined) return fail(`Option '${arg}' requires a value`);
        options.engineArgs = [...(options.engineArgs ?? []), value];
        break;
      }
      case "-bundle":
      case "-engine":
      case "-output":
      case "-config": {
        const value = takeValue();
        if (value === undefined) return fail(`Option '${arg}' requires a value`);
        if (arg === "-bundle") options.bundle = value;
        else if (arg === "-engine") options.engine = value;
        else if (arg === "-output") options.output = value;
        else options.config = value;
        break;
      }
      default:
        return fail(`Unknown option: ${arg}`);
    }
  }

  return { command, entryFile, options };
};
