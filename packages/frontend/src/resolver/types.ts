/**
 * Resolver type definitions
 */

export type ResolverContext = {
  // Directories searched in order: the entry's directory first
  readonly searchRoots: readonly string[];
  // File containing the require: the root for ./ and ../ names
  readonly requiredBy: string;
};
