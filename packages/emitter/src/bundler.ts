/**
 * Single-file bundle generation
 */

import * as fs from "node:fs";
import {
  BundleManifest,
  ManifestEntry,
  Result,
  error,
  getManifestEntryPoint,
  ok,
} from "@luastitch/frontend";
import { BundleError, BundleOptions, describeError } from "./types.js";
import {
  ALIAS_TABLE,
  MODULE_TABLE,
  REQUIRE_FUNCTION,
  generateBundleHeader,
} from "./constants.js";
import { generatePrelude } from "./runtime-shim.js";
import { quoteLuaString } from "./lua-literals.js";

/**
 * One embedded file: its loader key plus every other key it answers to
 */
type EmbeddedModule = {
  readonly path: string;
  readonly key: string;
  readonly aliases: readonly string[];
};

/**
 * Group manifest entries by path, keeping first-appearance order
 */
const groupByPath = (
  entries: readonly ManifestEntry[]
): Result<readonly EmbeddedModule[], BundleError> => {
  const pathByKey = new Map<string, string>();
  const keysByPath = new Map<string, string[]>();

  for (const entry of entries) {
    const existing = pathByKey.get(entry.key);
    if (existing !== undefined) {
      if (existing !== entry.path) {
        return error({
          kind: "duplicate-module-key",
          key: entry.key,
          paths: [existing, entry.path],
        });
      }
      continue;
    }
    pathByKey.set(entry.key, entry.path);

    const keys = keysByPath.get(entry.path);
    if (keys === undefined) {
      keysByPath.set(entry.path, [entry.key]);
    } else {
      keys.push(entry.key);
    }
  }

  return ok(
    [...keysByPath].map(([modulePath, [key = "", ...aliases]]) => ({
      path: modulePath,
      key,
      aliases,
    }))
  );
};

/**
 * Module text as a function body. A shebang line becomes blank so the
 * remaining lines keep their numbers.
 */
export const prepareModuleBody = (source: string): string =>
  source.startsWith("#") ? source.replace(/^#[^\n]*/, "") : source;

const emitLoader = (key: string, body: string): string =>
  `${MODULE_TABLE}[${quoteLuaString(key)}] = function(...) local require = ${REQUIRE_FUNCTION}\n${body}\nend\n`;

const emitAlias = (alias: string, key: string): string =>
  `${ALIAS_TABLE}[${quoteLuaString(alias)}] = ${quoteLuaString(key)}\n`;

/**
 * Generate one self-contained Lua source from a manifest. Dependencies are
 * embedded as loaders; the last entry is run as the program.
 */
export const bundle = (
  manifest: BundleManifest,
  options: BundleOptions = {}
): Result<string, BundleError> => {
  const entry = getManifestEntryPoint(manifest);
  if (entry === undefined) {
    return error({ kind: "empty-manifest" });
  }

  const grouped = groupByPath(manifest.entries);
  if (!grouped.ok) {
    return grouped;
  }

  const parts: string[] = [];
  parts.push(
    generateBundleHeader(
      manifest.entries.map((e) => [e.key, e.path] as const),
      { version: options.version }
    )
  );
  parts.push(generatePrelude());

  let entryKey = entry.key;
  for (const embedded of grouped.value) {
    let source: string;
    try {
      source = fs.readFileSync(embedded.path, "utf-8");
    } catch (err) {
      return error({
        kind: "source-unreadable",
        path: embedded.path,
        reason: describeError(err),
      });
    }

    parts.push(emitLoader(embedded.key, prepareModuleBody(source)));
    for (const alias of embedded.aliases) {
      parts.push(emitAlias(alias, embedded.key));
    }
    if (embedded.path === entry.path) {
      entryKey = embedded.key;
    }
  }

  parts.push(`return ${MODULE_TABLE}[${quoteLuaString(entryKey)}](...)\n`);

  return ok(parts.join("\n"));
};
