/**
 * CLI constants
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
// packages/cli/package.json
const packageJson = require("../../package.json") as { version: string };

export const VERSION = packageJson.version;
