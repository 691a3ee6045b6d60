/**
 * Dependency graph type definitions
 */

import { SourceUnit } from "../types/module.js";
import { Reporter } from "../types/reporter.js";

/**
 * Result of a completed traversal. Map iteration order is discovery order;
 * the entry is always the first node.
 */
export type DependencyGraph = {
  readonly entryPath: string;
  readonly nodes: ReadonlyMap<string, SourceUnit>;
  // Outgoing edges per node, de-duplicated, in the order first recorded
  readonly edges: ReadonlyMap<string, readonly string[]>;
  // Module names each non-entry node was required by
  readonly moduleKeys: ReadonlyMap<string, readonly string[]>;
};

export type GraphOptions = {
  readonly maxNodes: number;
  readonly searchRoots: readonly string[];
  readonly reporter: Reporter;
};
