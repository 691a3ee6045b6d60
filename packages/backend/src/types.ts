/**
 * Type definitions for the packaging backend
 */

import {
  AnalysisError,
  BundleManifest,
  Diagnostic,
  Reporter,
  Result,
  analysisErrorToDiagnostic,
  createDiagnostic,
} from "@luastitch/frontend";
import { BundleError, bundleErrorToDiagnostic } from "@luastitch/emitter";

/**
 * How an engine turns Lua sources into an executable
 */
export type EngineKind = "luastatic" | "srlua";

export type EngineDescriptor = {
  readonly name: string;
  readonly description: string;
  readonly kind: EngineKind;
  readonly platforms: readonly NodeJS.Platform[];
  // Programs that must be on PATH
  readonly executables: readonly string[];
  // srlua engines: the interpreter stub glued to the bundle
  readonly stub?: string;
  readonly installHint: string;
};

export type PackagingError =
  | {
      readonly kind: "engine-not-found";
      readonly name: string;
      readonly known: readonly string[];
    }
  | {
      readonly kind: "toolchain-not-found";
      readonly engine: string;
      readonly missing: readonly string[];
      readonly installHint: string;
    }
  | {
      readonly kind: "packaging-process-failed";
      readonly engine: string;
      readonly command: readonly string[];
      readonly exitCode: number | null;
      readonly stderr: string;
    }
  | {
      readonly kind: "output-artifact-missing";
      readonly engine: string;
      readonly path: string;
    }
  | {
      readonly kind: "engine-unsupported-platform";
      readonly engine: string;
      readonly platform: string;
      readonly supported: readonly string[];
    };

/**
 * Everything an engine needs to produce one executable
 */
export type PackagingJob = {
  // Entry last; several keys may share one path
  readonly manifest: BundleManifest;
  readonly outputPath: string;
  // Appended to the luastatic command line (C compiler and library flags)
  readonly extraArgs: readonly string[];
  readonly reporter: Reporter;
};

/**
 * The native toolchain collaborator
 */
export type PackagingEngine = {
  readonly platform: NodeJS.Platform;
  readonly probe: (descriptor: EngineDescriptor) => boolean;
  readonly invoke: (
    descriptor: EngineDescriptor,
    job: PackagingJob
  ) => Result<string, PackagingError | BundleError>;
};

export type BuildRequest = {
  readonly entryPath: string;
  readonly explicitRequires: readonly string[];
  readonly maxNodes?: number;
  readonly outputPath: string;
  readonly manualMode: boolean;
  readonly engineName?: string;
  readonly searchRoots?: readonly string[];
  readonly engineArgs?: readonly string[];
  readonly reporter?: Reporter;
};

export type BuildSuccess = {
  readonly outputPath: string;
  readonly engine: string;
  // Distinct embedded files, entry last
  readonly files: readonly string[];
};

export type BuildError = AnalysisError | BundleError | PackagingError;

/**
 * Process execution result
 */
export type CommandResult =
  | {
      readonly ok: true;
      readonly stdout: string;
    }
  | {
      readonly ok: false;
      readonly error: string;
      readonly exitCode: number | null;
      readonly stderr?: string;
    };

export const packagingErrorToDiagnostic = (err: PackagingError): Diagnostic => {
  switch (err.kind) {
    case "engine-not-found":
      return createDiagnostic(
        "LST3001",
        "error",
        `Unknown engine: ${err.name}`,
        undefined,
        `Available engines: ${err.known.join(", ")}`
      );

    case "toolchain-not-found":
      return createDiagnostic(
        "LST3002",
        "error",
        `Engine '${err.engine}' needs ${err.missing.join(", ")} on PATH`,
        undefined,
        err.installHint
      );

    case "packaging-process-failed":
      return createDiagnostic(
        "LST3003",
        "error",
        `${err.command.join(" ")} failed${err.exitCode === null ? "" : ` with exit code ${err.exitCode}`}${err.stderr.trim() === "" ? "" : `: ${err.stderr.trim()}`}`
      );

    case "output-artifact-missing":
      return createDiagnostic(
        "LST3004",
        "error",
        `Engine '${err.engine}' finished but produced no output at ${err.path}`
      );

    case "engine-unsupported-platform":
      return createDiagnostic(
        "LST3005",
        "error",
        `Engine '${err.engine}' does not run on ${err.platform}`,
        undefined,
        `Supported platforms: ${err.supported.join(", ")}`
      );
  }
};

export const buildErrorToDiagnostic = (err: BuildError): Diagnostic => {
  switch (err.kind) {
    case "script-not-found":
    case "circular-dependency":
    case "dynamic-require":
    case "dependency-limit-exceeded":
    case "module-not-found":
    case "native-module-unsupported":
      return analysisErrorToDiagnostic(err);

    case "empty-manifest":
    case "duplicate-module-key":
    case "source-unreadable":
    case "output-unwritable":
      return bundleErrorToDiagnostic(err);

    case "engine-not-found":
    case "toolchain-not-found":
    case "packaging-process-failed":
    case "output-artifact-missing":
    case "engine-unsupported-platform":
      return packagingErrorToDiagnostic(err);
  }
};
