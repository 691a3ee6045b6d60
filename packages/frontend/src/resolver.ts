/**
 * Module resolution with Lua search rules
 * Main dispatcher - re-exports from resolver/ subdirectory
 */

export type { ResolverContext } from "./resolver/index.js";
export {
  resolveModule,
  candidatePaths,
  nativeCandidatePaths,
  moduleNameToRelativePath,
  isReadableFile,
  isRelativeModuleName,
  isBuiltinModule,
} from "./resolver/index.js";
