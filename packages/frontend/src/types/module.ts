/**
 * Module representation types for luastitch
 */

/**
 * One `require` call site found in a source file.
 * `moduleName` is present exactly when the argument is a string literal.
 */
export type RequireSite =
  | {
      readonly isLiteral: true;
      readonly moduleName: string;
      readonly rawArgument: string;
      readonly line: number;
      readonly column: number;
    }
  | {
      readonly isLiteral: false;
      readonly rawArgument: string;
      readonly line: number;
      readonly column: number;
    };

export type SourceUnit = {
  readonly path: string; // Canonical absolute path
  readonly sourceText: string;
  readonly requires: readonly RequireSite[];
};

export type ResolvedModule =
  | {
      readonly kind: "script";
      readonly moduleName: string;
      readonly resolvedPath: string;
    }
  | {
      readonly kind: "builtin";
      readonly moduleName: string;
    };

export type ManifestEntry = {
  readonly key: string;
  readonly path: string;
};

/**
 * Ordered bundle input. Dependencies come first, the entry is always last.
 */
export type BundleManifest = {
  readonly entries: readonly ManifestEntry[];
};

export const createSourceUnit = (
  path: string,
  sourceText: string,
  requires: readonly RequireSite[] = []
): SourceUnit => ({
  path,
  sourceText,
  requires,
});

/**
 * The entry module of a manifest (its last entry)
 */
export const getManifestEntryPoint = (
  manifest: BundleManifest
): ManifestEntry | undefined => manifest.entries[manifest.entries.length - 1];
