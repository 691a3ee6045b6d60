/**
 * Module name to filesystem path mapping
 */

import * as fs from "node:fs";
import * as path from "node:path";

export const NATIVE_EXTENSIONS: readonly string[] = [
  ".so",
  ".dylib",
  ".dll",
  ".a",
];

/**
 * Relative path (without extension) a module name maps to.
 * `a.b.c` -> `a/b/c`; a name that already contains `/` is taken as a path.
 */
export const moduleNameToRelativePath = (moduleName: string): string =>
  moduleName.includes("/")
    ? moduleName.replace(/\.lua$/, "")
    : moduleName.split(".").join("/");

/**
 * True for names written relative to the requiring file (`./x`, `../x`)
 */
export const isRelativeModuleName = (moduleName: string): boolean =>
  moduleName.startsWith("./") || moduleName.startsWith("../");

/**
 * Ordered script candidates for a module name
 */
export const candidatePaths = (
  moduleName: string,
  searchRoots: readonly string[]
): readonly string[] => {
  const relative = moduleNameToRelativePath(moduleName);
  return searchRoots.flatMap((root) => [
    path.resolve(root, `${relative}.lua`),
    path.resolve(root, relative, "init.lua"),
  ]);
};

/**
 * Ordered native-library candidates for a module name
 */
export const nativeCandidatePaths = (
  moduleName: string,
  searchRoots: readonly string[]
): readonly string[] => {
  const relative = moduleNameToRelativePath(moduleName);
  return searchRoots.flatMap((root) =>
    NATIVE_EXTENSIONS.map((ext) => path.resolve(root, `${relative}${ext}`))
  );
};

/**
 * True for an existing regular file the current process can read
 */
export const isReadableFile = (filePath: string): boolean => {
  // ENOTDIR and EACCES throw even with throwIfNoEntry off
  try {
    if (!fs.statSync(filePath, { throwIfNoEntry: false })?.isFile()) {
      return false;
    }
    fs.accessSync(filePath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
};
