/**
 * Program analysis entry points
 */

import { Result, map } from "./types/result.js";
import { AnalysisError } from "./types/errors.js";
import { Reporter, silentReporter } from "./types/reporter.js";
import {
  DependencyGraph,
  buildDependencyGraph,
  orderedFiles,
} from "./dependency-graph.js";

export const DEFAULT_MAX_NODES = 36;

export type AnalyzeOptions = {
  readonly maxNodes?: number;
  // Extra search roots, searched after the entry's directory
  readonly searchRoots?: readonly string[];
  readonly reporter?: Reporter;
};

/**
 * Build the full dependency graph of the program rooted at `entryPath`
 */
export const analyzeProgram = (
  entryPath: string,
  options: AnalyzeOptions = {}
): Result<DependencyGraph, AnalysisError> =>
  buildDependencyGraph(entryPath, {
    maxNodes: options.maxNodes ?? DEFAULT_MAX_NODES,
    searchRoots: options.searchRoots ?? [],
    reporter: options.reporter ?? silentReporter,
  });

/**
 * Canonical paths of every module the entry transitively requires, in
 * discovery order. The entry itself is not included.
 */
export const analyze = (
  entryPath: string,
  options: AnalyzeOptions = {}
): Result<readonly string[], AnalysisError> =>
  map(analyzeProgram(entryPath, options), orderedFiles);
