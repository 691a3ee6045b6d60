/**
 * Module resolution with Lua search rules
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { Result, ok, error } from "../types/result.js";
import { ResolvedModule } from "../types/module.js";
import {
  AnalysisError,
  moduleNotFound,
  nativeModuleUnsupported,
} from "../types/errors.js";
import { ResolverContext } from "./types.js";
import { isBuiltinModule } from "./builtins.js";
import {
  candidatePaths,
  isReadableFile,
  isRelativeModuleName,
  nativeCandidatePaths,
} from "./path-resolution.js";

/**
 * Resolve a required module name to a script, a builtin, or a failure
 */
export const resolveModule = (
  moduleName: string,
  context: ResolverContext
): Result<ResolvedModule, AnalysisError> => {
  if (isBuiltinModule(moduleName)) {
    return ok({ kind: "builtin", moduleName });
  }

  const roots = isRelativeModuleName(moduleName)
    ? [path.dirname(context.requiredBy)]
    : context.searchRoots;

  const scripts = candidatePaths(moduleName, roots);
  const script = scripts.find(isReadableFile);
  if (script !== undefined) {
    return ok({
      kind: "script",
      moduleName,
      resolvedPath: fs.realpathSync(script),
    });
  }

  const natives = nativeCandidatePaths(moduleName, roots);
  const native = natives.find(isReadableFile);
  if (native !== undefined) {
    return error(
      nativeModuleUnsupported(moduleName, context.requiredBy, native)
    );
  }

  return error(moduleNotFound(moduleName, context.requiredBy, scripts));
};
