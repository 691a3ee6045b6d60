/**
 * Scanner - finds `require` call sites in Lua source
 */

export { scanRequires } from "./lexer.js";
export { decodeLuaEscapes } from "./escapes.js";
