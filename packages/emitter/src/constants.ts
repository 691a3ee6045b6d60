/**
 * Shared constants for the luastitch bundler
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson = require("../package.json") as { version: string };

export const BUNDLER_VERSION = packageJson.version;

// Names of the runtime tables and functions in a generated bundle
export const MODULE_TABLE = "__luastitch_modules";
export const ALIAS_TABLE = "__luastitch_aliases";
export const CACHE_TABLE = "__luastitch_cache";
export const LOADING_MARKER = "__luastitch_loading";
export const HOST_REQUIRE = "__luastitch_host_require";
export const REQUIRE_FUNCTION = "__luastitch_require";

// A line break ends a `--` comment
const commentText = (text: string): string =>
  text.replace(
    /[\x00-\x1f\x7f]/g,
    (ch) => `\\${ch.charCodeAt(0).toString().padStart(3, "0")}`
  );

/**
 * Generate the comment block at the top of a bundle
 *
 * @param modules - Embedded modules as `[key, path]` pairs, entry last
 */
export const generateBundleHeader = (
  modules: readonly (readonly [string, string])[],
  options: {
    readonly version?: string;
  } = {}
): string => {
  const lines: string[] = [];

  lines.push(`-- Bundled by luastitch ${options.version ?? BUNDLER_VERSION}`);
  lines.push("-- Embedded modules:");
  for (const [key, filePath] of modules) {
    lines.push(`--   ${commentText(key)}: ${commentText(filePath)}`);
  }
  lines.push("-- WARNING: Do not modify this file manually");
  lines.push("");

  return lines.join("\n");
};
