/**
 * Module dependency graph builder
 * Main dispatcher - re-exports from graph/ subdirectory
 */

export * from "./graph/index.js";
