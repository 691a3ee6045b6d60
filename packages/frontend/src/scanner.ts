/**
 * Require-site scanner - Public API
 */

export * from "./scanner/index.js";
