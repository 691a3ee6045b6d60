/**
 * luastitch analyze command - list the scripts an entry requires
 */

import { basename, dirname, relative } from "node:path";
import {
  Result,
  analysisErrorToDiagnostic,
  analyzeProgram,
  edgeCount,
  formatDiagnostic,
  graphManifest,
  orderedFiles,
} from "@luastitch/frontend";
import { bundleErrorToDiagnostic, writeBundle } from "@luastitch/emitter";
import type { ResolvedConfig } from "../types.js";
import { createConsoleReporter } from "../reporter.js";

export type AnalyzeSummary = {
  // Canonical paths, discovery order, entry excluded
  readonly files: readonly string[];
  readonly bundlePath?: string;
};

/**
 * Analyze dependencies and optionally write a single-file bundle
 */
export const analyzeCommand = (
  config: ResolvedConfig
): Result<AnalyzeSummary, string> => {
  const { entryPath, maxNodes, searchRoots, detail } = config;
  const reporter = createConsoleReporter(detail);

  if (detail) {
    console.log(`Analyzing: ${entryPath}`);
    console.log(`Max dependencies: ${maxNodes}`);
    if (searchRoots.length > 0) {
      console.log(`Search roots: ${searchRoots.join(", ")}`);
    }
    console.log("=".repeat(60));
  }

  const graphResult = analyzeProgram(entryPath, {
    maxNodes,
    searchRoots,
    reporter,
  });
  if (!graphResult.ok) {
    return {
      ok: false,
      error: formatDiagnostic(analysisErrorToDiagnostic(graphResult.error)),
    };
  }

  const graph = graphResult.value;
  const files = orderedFiles(graph);
  const baseDir = dirname(graph.entryPath);

  if (detail) {
    console.log("");
  }
  console.log(`Dependencies for ${basename(entryPath)}:`);
  if (files.length === 0) {
    console.log("  (no dependencies)");
  }
  files.forEach((file, i) => {
    console.log(`  ${i + 1}. ${relative(baseDir, file)}`);
    if (detail) {
      const names = graph.moduleKeys.get(file) ?? [];
      console.log(`     Module: ${names.join(", ")}`);
      console.log(`     Path: ${file}`);
    }
  });

  console.log(`\nTotal: ${files.length} script(s)`);
  if (detail) {
    console.log(`Edges: ${edgeCount(graph)}`);
  }

  if (config.bundlePath === undefined) {
    return { ok: true, value: { files } };
  }

  const written = writeBundle(graphManifest(graph), config.bundlePath, {
    reporter,
  });
  if (!written.ok) {
    return {
      ok: false,
      error: formatDiagnostic(bundleErrorToDiagnostic(written.error)),
    };
  }

  console.log(`\n✓ Bundle written: ${relative(process.cwd(), written.value)}`);
  return { ok: true, value: { files, bundlePath: written.value } };
};
