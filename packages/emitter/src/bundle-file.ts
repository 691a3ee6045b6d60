/**
 * Writing bundles to disk
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { BundleManifest, Result, ok, error } from "@luastitch/frontend";
import { BundleError, BundleOptions, describeError } from "./types.js";
import { bundle } from "./bundler.js";
import { manifestFromFiles } from "./manifest.js";

/**
 * Bundle a manifest and write it to `outputPath`, creating parent
 * directories. Returns the absolute output path.
 */
export const writeBundle = (
  manifest: BundleManifest,
  outputPath: string,
  options: BundleOptions = {}
): Result<string, BundleError> => {
  const generated = bundle(manifest, options);
  if (!generated.ok) {
    return generated;
  }

  const target = path.resolve(outputPath);
  try {
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, generated.value);
  } catch (err) {
    return error({
      kind: "output-unwritable",
      path: target,
      reason: describeError(err),
    });
  }

  options.reporter?.report({ kind: "bundle-written", outputPath: target });
  return ok(target);
};

/**
 * Bundle an ordered file list (entry last) into one Lua file. Module keys
 * are derived from each file's path relative to the entry's directory.
 */
export const bundleToSingleFile = (
  files: readonly string[],
  outputPath: string,
  options: BundleOptions = {}
): Result<string, BundleError> =>
  writeBundle(manifestFromFiles(files), outputPath, options);
