/**
 * Bundler types
 */

import {
  Diagnostic,
  Reporter,
  createDiagnostic,
} from "@luastitch/frontend";

export type BundleError =
  | { readonly kind: "empty-manifest" }
  | {
      readonly kind: "duplicate-module-key";
      readonly key: string;
      readonly paths: readonly [string, string];
    }
  | {
      readonly kind: "source-unreadable";
      readonly path: string;
      readonly reason: string;
    }
  | {
      readonly kind: "output-unwritable";
      readonly path: string;
      readonly reason: string;
    };

export type BundleOptions = {
  // Version named in the bundle header (defaults to the bundler's own)
  readonly version?: string;
  readonly reporter?: Reporter;
};

export const bundleErrorToDiagnostic = (err: BundleError): Diagnostic => {
  switch (err.kind) {
    case "empty-manifest":
      return createDiagnostic(
        "LST2001",
        "error",
        "Nothing to bundle: the module list is empty"
      );

    case "duplicate-module-key":
      return createDiagnostic(
        "LST2002",
        "error",
        `Module key '${err.key}' maps to two files: ${err.paths[0]} and ${err.paths[1]}`
      );

    case "source-unreadable":
      return createDiagnostic(
        "LST2003",
        "error",
        `Cannot read ${err.path}: ${err.reason}`
      );

    case "output-unwritable":
      return createDiagnostic(
        "LST2004",
        "error",
        `Cannot write bundle ${err.path}: ${err.reason}`
      );
  }
};

export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
