/**
 * luastitch backend - engine registry and native packaging
 */

// Export main build function
export { build } from "./build-orchestrator.js";

// Export types
export type {
  EngineKind,
  EngineDescriptor,
  PackagingError,
  PackagingJob,
  PackagingEngine,
  BuildRequest,
  BuildSuccess,
  BuildError,
  CommandResult,
} from "./types.js";
export { packagingErrorToDiagnostic, buildErrorToDiagnostic } from "./types.js";

// Export registry and toolchain utilities
export {
  ENGINES,
  engineNames,
  resolveEngine,
  defaultEngineName,
  supportsPlatform,
} from "./engines.js";
export {
  createSystemEngine,
  manifestFiles,
  luastaticArguments,
  type SystemEngineOptions,
} from "./system-engine.js";
export {
  findExecutable,
  runCommand,
  type CommandRunner,
  type ExecutableFinder,
} from "./toolchain.js";
