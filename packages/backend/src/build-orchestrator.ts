/**
 * Main build orchestration - analysis, manifest merge, packaging
 */

import { realpathSync } from "fs";
import { dirname, relative, resolve } from "path";
import {
  AnalysisError,
  BundleManifest,
  ManifestEntry,
  Reporter,
  Result,
  analyzeProgram,
  collect,
  entryModuleKey,
  error,
  graphManifest,
  isReadableFile,
  ok,
  scriptNotFound,
  silentReporter,
} from "@luastitch/frontend";
import { moduleKeyFromPath } from "@luastitch/emitter";
import {
  BuildError,
  BuildRequest,
  BuildSuccess,
  PackagingEngine,
} from "./types.js";
import {
  defaultEngineName,
  resolveEngine,
  supportsPlatform,
} from "./engines.js";
import { createSystemEngine, manifestFiles } from "./system-engine.js";

/**
 * Canonical path of a script that must exist
 */
const requireScript = (filePath: string): Result<string, AnalysisError> => {
  const absolute = resolve(filePath);
  return isReadableFile(absolute)
    ? ok(realpathSync(absolute))
    : error(scriptNotFound(filePath));
};

/**
 * Manifest entry for an explicitly listed file, keyed relative to the entry
 */
const explicitEntry = (entryPath: string, file: string): ManifestEntry => ({
  key: moduleKeyFromPath(relative(dirname(entryPath), file)),
  path: file,
});

/**
 * Add explicit requires that analysis did not discover, just before the
 * entry. Files already in the manifest are skipped.
 */
const mergeExplicit = (
  manifest: BundleManifest,
  entryPath: string,
  explicit: readonly string[],
  reporter: Reporter
): BundleManifest => {
  const known = new Set(manifest.entries.map((entry) => entry.path));
  const added: ManifestEntry[] = [];
  for (const file of explicit) {
    if (known.has(file)) {
      continue;
    }
    known.add(file);
    reporter.report({ kind: "merge-explicit", path: file });
    added.push(explicitEntry(entryPath, file));
  }

  const dependencies = manifest.entries.filter(
    (entry) => entry.path !== entryPath
  );
  const entries = manifest.entries.filter((entry) => entry.path === entryPath);
  return { entries: [...dependencies, ...added, ...entries] };
};

/**
 * Collect the program's files and package them with the requested engine
 */
export const build = (
  request: BuildRequest,
  engine: PackagingEngine = createSystemEngine()
): Result<BuildSuccess, BuildError> => {
  const reporter = request.reporter ?? silentReporter;

  const entry = requireScript(request.entryPath);
  if (!entry.ok) return entry;

  const explicit = collect(request.explicitRequires, requireScript);
  if (!explicit.ok) return explicit;

  let manifest: BundleManifest;
  if (request.manualMode) {
    manifest = mergeExplicit(
      { entries: [{ key: entryModuleKey(entry.value), path: entry.value }] },
      entry.value,
      explicit.value,
      reporter
    );
  } else {
    const graph = analyzeProgram(entry.value, {
      maxNodes: request.maxNodes,
      searchRoots: request.searchRoots,
      reporter,
    });
    if (!graph.ok) return graph;
    manifest = mergeExplicit(
      graphManifest(graph.value),
      entry.value,
      explicit.value,
      reporter
    );
  }

  const engineName = request.engineName ?? defaultEngineName();
  const descriptor = resolveEngine(engineName);
  if (!descriptor.ok) return descriptor;

  if (!supportsPlatform(descriptor.value, engine.platform)) {
    return error({
      kind: "engine-unsupported-platform",
      engine: descriptor.value.name,
      platform: engine.platform,
      supported: descriptor.value.platforms,
    });
  }
  if (!engine.probe(descriptor.value)) {
    return error({
      kind: "toolchain-not-found",
      engine: descriptor.value.name,
      missing: descriptor.value.executables,
      installHint: descriptor.value.installHint,
    });
  }

  const packaged = engine.invoke(descriptor.value, {
    manifest,
    outputPath: request.outputPath,
    extraArgs: request.engineArgs ?? [],
    reporter,
  });
  if (!packaged.ok) return packaged;

  return ok({
    outputPath: packaged.value,
    engine: descriptor.value.name,
    files: manifestFiles(manifest),
  });
};
