/**
 * Engine registry
 */

import { Result, ok, error } from "@luastitch/frontend";
import { EngineDescriptor, PackagingError } from "./types.js";

const SRLUA_HINT =
  "Build srlua (https://github.com/LuaDist/srlua) and put srglue and the srlua stub on PATH";

const srluaVariant = (
  name: string,
  description: string,
  platforms: readonly NodeJS.Platform[],
  stub: string
): EngineDescriptor => ({
  name,
  description,
  kind: "srlua",
  platforms,
  executables: ["srglue", stub],
  stub,
  installHint: SRLUA_HINT,
});

export const ENGINES: readonly EngineDescriptor[] = [
  {
    name: "luastatic",
    description:
      "Compile to a native executable with luastatic and a C compiler",
    kind: "luastatic",
    platforms: ["linux"],
    executables: ["luastatic", "cc"],
    installHint: "Install with: luarocks install luastatic",
  },
  srluaVariant(
    "srlua",
    "Glue a bundle onto the srlua stub found on PATH",
    ["linux", "darwin", "win32"],
    "srlua"
  ),
  srluaVariant(
    "winsrlua515",
    "srlua, Lua 5.1.5, Windows 64-bit",
    ["win32"],
    "srlua515"
  ),
  srluaVariant(
    "winsrlua515-32",
    "srlua, Lua 5.1.5, Windows 32-bit",
    ["win32"],
    "srlua515-32"
  ),
  srluaVariant(
    "winsrlua548",
    "srlua, Lua 5.4.8, Windows 64-bit",
    ["win32"],
    "srlua548"
  ),
  srluaVariant(
    "linsrlua515",
    "srlua, Lua 5.1.5, Linux 64-bit",
    ["linux"],
    "srlua515"
  ),
  srluaVariant(
    "linsrlua515-32",
    "srlua, Lua 5.1.5, Linux 32-bit",
    ["linux"],
    "srlua515-32"
  ),
  srluaVariant(
    "linsrlua548",
    "srlua, Lua 5.4.8, Linux 64-bit",
    ["linux"],
    "srlua548"
  ),
];

export const engineNames = (): readonly string[] =>
  ENGINES.map((engine) => engine.name);

/**
 * Look up an engine by name
 */
export const resolveEngine = (
  name: string
): Result<EngineDescriptor, PackagingError> => {
  const found = ENGINES.find((engine) => engine.name === name);
  return found
    ? ok(found)
    : error({ kind: "engine-not-found", name, known: engineNames() });
};

/**
 * Engine used when none is named: srlua runs on every supported platform
 */
export const defaultEngineName = (): string => "srlua";

export const supportsPlatform = (
  descriptor: EngineDescriptor,
  platform: NodeJS.Platform
): boolean => descriptor.platforms.includes(platform);
