/**
 * CLI - Public API
 */

export { VERSION } from "./constants.js";
export { showHelp } from "./help.js";
export { parseArgs, splitList } from "./parser.js";
export { runCli } from "./dispatcher.js";
