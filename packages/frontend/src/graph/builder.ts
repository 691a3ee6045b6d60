/**
 * Dependency graph builder - Main orchestrator
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { Result, ok, error } from "../types/result.js";
import { SourceUnit, createSourceUnit } from "../types/module.js";
import {
  AnalysisError,
  circularDependency,
  dependencyLimitExceeded,
  dynamicRequire,
  scriptNotFound,
} from "../types/errors.js";
import { scanRequires } from "../scanner.js";
import { isReadableFile, resolveModule } from "../resolver.js";
import { DependencyGraph, GraphOptions } from "./types.js";
import { detectCycle } from "./circular.js";

type QueueItem = {
  readonly path: string;
  readonly depth: number;
};

const readSource = (filePath: string): string | undefined => {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch {
    return undefined;
  }
};

const appendUnique = (
  map: Map<string, string[]>,
  key: string,
  value: string
): void => {
  const values = map.get(key);
  if (values === undefined) {
    map.set(key, [value]);
  } else if (!values.includes(value)) {
    values.push(value);
  }
};

/**
 * Build the dependency graph of a Lua program, breadth-first from its entry
 */
export const buildDependencyGraph = (
  entryPath: string,
  options: GraphOptions
): Result<DependencyGraph, AnalysisError> => {
  const absoluteEntry = path.resolve(entryPath);
  if (!isReadableFile(absoluteEntry)) {
    return error(scriptNotFound(entryPath));
  }
  const entry = fs.realpathSync(absoluteEntry);

  // The entry counts against the limit
  if (options.maxNodes < 1) {
    return error(
      dependencyLimitExceeded(
        options.maxNodes,
        1,
        path.basename(entry, ".lua")
      )
    );
  }

  const searchRoots = [
    path.dirname(entry),
    ...options.searchRoots.map((root) => path.resolve(root)),
  ];

  const nodes = new Map<string, SourceUnit | undefined>([[entry, undefined]]);
  const edges = new Map<string, string[]>();
  const moduleKeys = new Map<string, string[]>();
  const queue: QueueItem[] = [{ path: entry, depth: 0 }];

  for (let item = queue.shift(); item; item = queue.shift()) {
    const current = item.path;
    options.reporter.report({ kind: "visit", path: current, depth: item.depth });

    const sourceText = readSource(current);
    if (sourceText === undefined) {
      return error(scriptNotFound(current));
    }
    const requires = scanRequires(sourceText);
    nodes.set(current, createSourceUnit(current, sourceText, requires));

    for (const site of requires) {
      if (!site.isLiteral) {
        return error(
          dynamicRequire(current, site.line, site.column, site.rawArgument)
        );
      }

      const resolved = resolveModule(site.moduleName, {
        searchRoots,
        requiredBy: current,
      });
      if (!resolved.ok) {
        return resolved;
      }

      const target = resolved.value;
      if (target.kind === "builtin") {
        options.reporter.report({
          kind: "skip-builtin",
          moduleName: target.moduleName,
          requiredBy: current,
        });
        continue;
      }

      const cycle = detectCycle(edges, current, target.resolvedPath);
      if (cycle) {
        return error(circularDependency(cycle));
      }

      if (!nodes.has(target.resolvedPath)) {
        if (nodes.size + 1 > options.maxNodes) {
          return error(
            dependencyLimitExceeded(
              options.maxNodes,
              nodes.size + 1,
              site.moduleName
            )
          );
        }
        nodes.set(target.resolvedPath, undefined);
        queue.push({ path: target.resolvedPath, depth: item.depth + 1 });
      }

      options.reporter.report({
        kind: "resolve",
        moduleName: site.moduleName,
        requiredBy: current,
        resolvedPath: target.resolvedPath,
      });
      appendUnique(edges, current, target.resolvedPath);
      appendUnique(moduleKeys, target.resolvedPath, site.moduleName);
    }
  }

  const scanned = new Map<string, SourceUnit>();
  for (const [nodePath, unit] of nodes) {
    if (unit !== undefined) {
      scanned.set(nodePath, unit);
    }
  }

  return ok({ entryPath: entry, nodes: scanned, edges, moduleKeys });
};
