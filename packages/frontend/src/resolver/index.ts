/**
 * Module resolver - Public API
 */

export type { ResolverContext } from "./types.js";
export { resolveModule } from "./module-resolution.js";
export {
  candidatePaths,
  nativeCandidatePaths,
  moduleNameToRelativePath,
  isReadableFile,
  isRelativeModuleName,
} from "./path-resolution.js";
export { isBuiltinModule } from "./builtins.js";
