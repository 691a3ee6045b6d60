/**
 * luastitch emitter - single-file Lua bundle generator
 */

export * from "./types.js";
export { bundle, prepareModuleBody } from "./bundler.js";
export { writeBundle, bundleToSingleFile } from "./bundle-file.js";
export { manifestFromFiles, moduleKeyFromPath } from "./manifest.js";
export { quoteLuaString } from "./lua-literals.js";
export { generatePrelude } from "./runtime-shim.js";
export {
  BUNDLER_VERSION,
  MODULE_TABLE,
  ALIAS_TABLE,
  CACHE_TABLE,
  REQUIRE_FUNCTION,
  generateBundleHeader,
} from "./constants.js";
