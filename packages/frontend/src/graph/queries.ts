/**
 * Views over a completed dependency graph
 */

import * as path from "node:path";
import { BundleManifest, ManifestEntry } from "../types/module.js";
import { DependencyGraph } from "./types.js";

/**
 * Every non-entry node, in discovery order
 */
export const orderedFiles = (graph: DependencyGraph): readonly string[] =>
  [...graph.nodes.keys()].filter((file) => file !== graph.entryPath);

/**
 * Module key of the entry: its file name without the `.lua` extension
 */
export const entryModuleKey = (entryPath: string): string =>
  path.basename(entryPath, ".lua");

/**
 * Bundle manifest in discovery order, entry last. A node required under
 * several names gets one entry per name.
 */
export const graphManifest = (graph: DependencyGraph): BundleManifest => {
  const dependencies: ManifestEntry[] = orderedFiles(graph).flatMap((file) =>
    (graph.moduleKeys.get(file) ?? []).map((key) => ({ key, path: file }))
  );
  return {
    entries: [
      ...dependencies,
      { key: entryModuleKey(graph.entryPath), path: graph.entryPath },
    ],
  };
};

/**
 * Edge count, for detail output
 */
export const edgeCount = (graph: DependencyGraph): number =>
  [...graph.edges.values()].reduce((sum, targets) => sum + targets.length, 0);
