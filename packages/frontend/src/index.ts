/**
 * luastitch frontend - Lua source scanning and dependency analysis
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/module.js";
export * from "./types/result.js";
export * from "./types/errors.js";
export * from "./types/reporter.js";

export * from "./scanner.js";
export * from "./resolver.js";
export * from "./dependency-graph.js";
export * from "./analyze.js";
