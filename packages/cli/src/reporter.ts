/**
 * Console output for build events
 */

import { relative } from "node:path";
import { BuildEvent, Reporter, silentReporter } from "@luastitch/frontend";

const display = (file: string): string => {
  const rel = relative(process.cwd(), file);
  return rel === "" ? file : rel;
};

export const describeEvent = (event: BuildEvent): string => {
  switch (event.kind) {
    case "visit":
      return `Scanning ${display(event.path)} (depth ${event.depth})`;
    case "resolve":
      return `  require "${event.moduleName}" -> ${display(event.resolvedPath)}`;
    case "skip-builtin":
      return `  require "${event.moduleName}" (standard library, not embedded)`;
    case "merge-explicit":
      return `Adding ${display(event.path)}`;
    case "bundle-written":
      return `Bundle written to ${display(event.outputPath)}`;
    case "engine-invoked":
      return `Running [${event.engine}]: ${event.command.join(" ")}`;
  }
};

/**
 * Reporter for `--detail`; silent otherwise
 */
export const createConsoleReporter = (detail: boolean): Reporter =>
  detail
    ? {
        report: (event) => {
          console.log(describeEvent(event));
        },
      }
    : silentReporter;
