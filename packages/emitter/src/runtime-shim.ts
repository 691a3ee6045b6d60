/**
 * Runtime prelude emitted at the top of every bundle
 *
 * The prelude owns module loading inside the bundle: each embedded module
 * runs at most once, its first return value (or `true`) is cached, and
 * names with no embedded loader go to the host `require`.
 */

import {
  ALIAS_TABLE,
  CACHE_TABLE,
  HOST_REQUIRE,
  LOADING_MARKER,
  MODULE_TABLE,
  REQUIRE_FUNCTION,
} from "./constants.js";

export const generatePrelude = (): string =>
  [
    `local ${MODULE_TABLE} = {}`,
    `local ${ALIAS_TABLE} = {}`,
    `local ${CACHE_TABLE} = {}`,
    `local ${LOADING_MARKER} = {}`,
    `local ${HOST_REQUIRE} = require`,
    "",
    `local function ${REQUIRE_FUNCTION}(name)`,
    `  local key = ${ALIAS_TABLE}[name] or name`,
    `  local cached = ${CACHE_TABLE}[key]`,
    "  if cached ~= nil then",
    `    if cached == ${LOADING_MARKER} then`,
    `      error("circular require of module '" .. tostring(key) .. "'", 2)`,
    "    end",
    "    return cached",
    "  end",
    `  local loader = ${MODULE_TABLE}[key]`,
    "  if loader == nil then",
    `    return ${HOST_REQUIRE}(name)`,
    "  end",
    `  ${CACHE_TABLE}[key] = ${LOADING_MARKER}`,
    "  local value = loader(key)",
    "  if value == nil then",
    "    value = true",
    "  end",
    `  ${CACHE_TABLE}[key] = value`,
    "  return value",
    "end",
    "",
  ].join("\n");
