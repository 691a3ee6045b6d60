/**
 * Dependency graph builder - Public API
 */

export type { DependencyGraph, GraphOptions } from "./types.js";
export { buildDependencyGraph } from "./builder.js";
export { detectCycle, findPath } from "./circular.js";
export {
  orderedFiles,
  graphManifest,
  entryModuleKey,
  edgeCount,
} from "./queries.js";
