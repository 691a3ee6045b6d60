/**
 * luastitch build command - package the program as an executable
 */

import { relative } from "node:path";
import { Result, formatDiagnostic } from "@luastitch/frontend";
import {
  BuildSuccess,
  PackagingEngine,
  build,
  buildErrorToDiagnostic,
} from "@luastitch/backend";
import type { ResolvedConfig } from "../types.js";
import { createConsoleReporter } from "../reporter.js";

export const buildCommand = (
  config: ResolvedConfig,
  engine: PackagingEngine
): Result<BuildSuccess, string> => {
  const { detail } = config;

  if (detail) {
    console.log(`Building: ${config.entryPath}`);
    console.log(`Engine: ${config.engineName}`);
    console.log(`Manual mode: ${config.manualMode ? "enabled" : "disabled"}`);
    console.log(`Max dependencies: ${config.maxNodes}`);
    console.log(`Output: ${config.outputPath}`);
    if (config.explicitRequires.length > 0) {
      console.log(
        `Additional requires: ${config.explicitRequires.join(", ")}`
      );
    }
    console.log("=".repeat(60));
  }

  const result = build(
    {
      entryPath: config.entryPath,
      explicitRequires: config.explicitRequires,
      maxNodes: config.maxNodes,
      outputPath: config.outputPath,
      manualMode: config.manualMode,
      engineName: config.engineName,
      searchRoots: config.searchRoots,
      engineArgs: config.engineArgs,
      reporter: createConsoleReporter(detail),
    },
    engine
  );

  if (!result.ok) {
    return {
      ok: false,
      error: formatDiagnostic(buildErrorToDiagnostic(result.error)),
    };
  }

  if (detail) {
    console.log(
      `Embedded ${result.value.files.length} file(s) with ${result.value.engine}`
    );
  }
  console.log(
    `✓ Build complete: ${relative(process.cwd(), result.value.outputPath)}`
  );
  return result;
};
