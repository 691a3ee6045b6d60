/**
 * Lua standard library modules
 *
 * Requiring one of these (or a dotted name below one) never touches the
 * filesystem; the host runtime provides it.
 */

const STANDARD_LIBRARY: ReadonlySet<string> = new Set([
  "_G",
  "coroutine",
  "debug",
  "io",
  "math",
  "os",
  "package",
  "string",
  "table",
  "utf8",
  "bit32",
  "arg",
]);

export const isBuiltinModule = (moduleName: string): boolean => {
  const head = moduleName.split(".")[0] ?? moduleName;
  return STANDARD_LIBRARY.has(head);
};
