/**
 * Bundle manifest construction from plain file lists
 */

import * as path from "node:path";
import { BundleManifest } from "@luastitch/frontend";

/**
 * Module key for a file path relative to the entry's directory:
 * `lib/util.lua` -> `lib.util`, `pkg/init.lua` -> `pkg`.
 * Files outside that directory are keyed by their file name.
 */
export const moduleKeyFromPath = (relativePath: string): string => {
  const segments = relativePath
    .replace(/\.lua$/, "")
    .split(/[\\/]+/)
    .filter((segment) => segment !== "" && segment !== ".");

  if (segments.includes("..")) {
    return path.basename(relativePath, ".lua");
  }
  if (segments.length > 1 && segments[segments.length - 1] === "init") {
    segments.pop();
  }
  return segments.join(".");
};

/**
 * Manifest for an ordered file list whose last file is the entry
 */
export const manifestFromFiles = (
  files: readonly string[]
): BundleManifest => {
  const absolute = files.map((file) => path.resolve(file));
  const entry = absolute[absolute.length - 1];
  if (entry === undefined) {
    return { entries: [] };
  }
  const baseDir = path.dirname(entry);
  return {
    entries: absolute.map((file) => ({
      key: moduleKeyFromPath(path.relative(baseDir, file)),
      path: file,
    })),
  };
};
