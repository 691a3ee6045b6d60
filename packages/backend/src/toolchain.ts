/**
 * Native toolchain lookup and process execution
 */

import { spawnSync } from "child_process";
import { accessSync, constants, statSync } from "fs";
import { delimiter, join } from "path";
import { CommandResult } from "./types.js";

export type CommandRunner = (
  command: string,
  args: readonly string[],
  cwd: string
) => CommandResult;

export type ExecutableFinder = (name: string) => string | undefined;

const isExecutableFile = (
  candidate: string,
  platform: NodeJS.Platform
): boolean => {
  try {
    if (!statSync(candidate, { throwIfNoEntry: false })?.isFile()) {
      return false;
    }
    if (platform !== "win32") {
      accessSync(candidate, constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
};

/**
 * Locate an executable on PATH (with PATHEXT suffixes on Windows)
 */
export const findExecutable = (
  name: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string | undefined => {
  const dirs = (env.PATH ?? env.Path ?? "")
    .split(delimiter)
    .filter((dir) => dir !== "");
  const suffixes =
    platform === "win32"
      ? ["", ...(env.PATHEXT ?? ".EXE;.CMD;.BAT;.COM").split(";")]
      : [""];

  for (const dir of dirs) {
    for (const suffix of suffixes) {
      const candidate = join(dir, `${name}${suffix}`);
      if (isExecutableFile(candidate, platform)) {
        return candidate;
      }
    }
  }
  return undefined;
};

/**
 * Run a toolchain command to completion
 */
export const runCommand: CommandRunner = (command, args, cwd) => {
  const result = spawnSync(command, [...args], {
    cwd,
    encoding: "utf-8",
  });

  if (result.error) {
    return {
      ok: false,
      error: `${command} could not be started: ${result.error.message}`,
      exitCode: null,
    };
  }

  if (result.status !== 0) {
    return {
      ok: false,
      error: `${command} failed`,
      exitCode: result.status,
      stderr: result.stderr,
    };
  }

  return {
    ok: true,
    stdout: result.stdout,
  };
};
