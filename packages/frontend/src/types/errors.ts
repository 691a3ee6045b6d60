/**
 * Analysis error taxonomy
 *
 * Every analysis failure is a value of `AnalysisError`. The first one
 * encountered aborts the traversal and is returned verbatim to the caller.
 */

import { Diagnostic, createDiagnostic } from "./diagnostic.js";

export type AnalysisError =
  | {
      readonly kind: "script-not-found";
      readonly path: string;
    }
  | {
      readonly kind: "circular-dependency";
      readonly cycle: readonly string[];
    }
  | {
      readonly kind: "dynamic-require";
      readonly file: string;
      readonly line: number;
      readonly column: number;
      readonly rawText: string;
    }
  | {
      readonly kind: "dependency-limit-exceeded";
      readonly limit: number;
      readonly count: number;
      readonly moduleName: string;
    }
  | {
      readonly kind: "module-not-found";
      readonly moduleName: string;
      readonly requiredBy: string;
      readonly searchedPaths: readonly string[];
    }
  | {
      readonly kind: "native-module-unsupported";
      readonly moduleName: string;
      readonly requiredBy: string;
      readonly nativePath: string;
    };

export type AnalysisErrorKind = AnalysisError["kind"];

export const scriptNotFound = (path: string): AnalysisError => ({
  kind: "script-not-found",
  path,
});

export const circularDependency = (
  cycle: readonly string[]
): AnalysisError => ({
  kind: "circular-dependency",
  cycle,
});

export const dynamicRequire = (
  file: string,
  line: number,
  column: number,
  rawText: string
): AnalysisError => ({
  kind: "dynamic-require",
  file,
  line,
  column,
  rawText,
});

export const dependencyLimitExceeded = (
  limit: number,
  count: number,
  moduleName: string
): AnalysisError => ({
  kind: "dependency-limit-exceeded",
  limit,
  count,
  moduleName,
});

export const moduleNotFound = (
  moduleName: string,
  requiredBy: string,
  searchedPaths: readonly string[]
): AnalysisError => ({
  kind: "module-not-found",
  moduleName,
  requiredBy,
  searchedPaths,
});

export const nativeModuleUnsupported = (
  moduleName: string,
  requiredBy: string,
  nativePath: string
): AnalysisError => ({
  kind: "native-module-unsupported",
  moduleName,
  requiredBy,
  nativePath,
});

/**
 * Convert an analysis error to a displayable diagnostic
 */
export const analysisErrorToDiagnostic = (err: AnalysisError): Diagnostic => {
  switch (err.kind) {
    case "script-not-found":
      return createDiagnostic(
        "LST1001",
        "error",
        `Lua script not found: ${err.path}`
      );

    case "circular-dependency":
      return createDiagnostic(
        "LST1002",
        "error",
        `Circular dependency detected: ${err.cycle.join(" -> ")}`,
        undefined,
        "Break the cycle by moving shared code into a separate module"
      );

    case "dynamic-require":
      return createDiagnostic(
        "LST1003",
        "error",
        `Dynamic require at ${err.file}:${err.line}: ${err.rawText}`,
        { file: err.file, line: err.line, column: err.column },
        "Only static require('name') is supported; use --manual with -require to list modules explicitly"
      );

    case "dependency-limit-exceeded":
      return createDiagnostic(
        "LST1004",
        "error",
        `Dependency count (${err.count}) exceeds limit (${err.limit}) while adding module '${err.moduleName}'`,
        undefined,
        "Raise the limit with -max <n>"
      );

    case "module-not-found":
      return createDiagnostic(
        "LST1005",
        "error",
        `Cannot resolve module '${err.moduleName}' required in ${err.requiredBy}`,
        undefined,
        `Searched: ${err.searchedPaths.join(", ")}`
      );

    case "native-module-unsupported":
      return createDiagnostic(
        "LST1006",
        "error",
        `Module '${err.moduleName}' required in ${err.requiredBy} is a native library and cannot be bundled: ${err.nativePath}`
      );
  }
};
