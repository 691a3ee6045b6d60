/**
 * Require-site scanner
 *
 * A small state machine over Lua source: code, line comments, block
 * comments, quoted strings and long-bracket strings. Only `require`
 * identifiers seen in code state are reported.
 */

import { RequireSite } from "../types/module.js";
import {
  Cursor,
  CursorMark,
  advance,
  atEnd,
  createCursor,
  mark,
  peek,
  reset,
  restOfLine,
} from "./cursor.js";
import { decodeLuaEscapes } from "./escapes.js";
import {
  longBracketLevel,
  readLongString,
  readShortString,
  skipBalanced,
  skipComment,
  skipLine,
  skipTrivia,
} from "./literals.js";

const WORD_CHAR = /[A-Za-z0-9_]/;

/**
 * The two most recent significant tokens, used to tell a call of the global
 * `require` apart from a field access or a declaration.
 */
type RecentTokens = {
  last: string;
  beforeLast: string;
};

type SiteOutcome = {
  readonly site?: RequireSite;
  readonly halt: boolean;
};

const pushToken = (tokens: RecentTokens, token: string): void => {
  tokens.beforeLast = tokens.last;
  tokens.last = token;
};

const readWord = (cursor: Cursor): string => {
  const start = cursor.pos;
  while (!atEnd(cursor) && WORD_CHAR.test(peek(cursor))) {
    advance(cursor);
  }
  return cursor.text.slice(start, cursor.pos);
};

const isGlobalReference = (tokens: RecentTokens): boolean => {
  if (tokens.last === ":") return false;
  if (tokens.last === "." && tokens.beforeLast !== ".") return false;
  return tokens.last !== "local" && tokens.last !== "function";
};

const literalSite = (
  at: CursorMark,
  moduleName: string,
  rawArgument: string
): RequireSite => ({
  isLiteral: true,
  moduleName,
  rawArgument,
  line: at.line,
  column: at.pos - at.lineStart + 1,
});

const dynamicSite = (at: CursorMark, rawArgument: string): RequireSite => ({
  isLiteral: false,
  rawArgument: rawArgument.replace(/\s+/g, " ").trim(),
  line: at.line,
  column: at.pos - at.lineStart + 1,
});

/**
 * Read a string literal at the cursor, if there is one.
 * `undefined` = no literal here; `null` = literal is unterminated.
 */
const readLiteral = (cursor: Cursor): string | null | undefined => {
  const ch = peek(cursor);
  if (ch === '"' || ch === "'") {
    const body = readShortString(cursor);
    return body === undefined ? null : decodeLuaEscapes(body);
  }
  const level = longBracketLevel(cursor.text, cursor.pos);
  if (level >= 0) {
    return readLongString(cursor, level) ?? null;
  }
  return undefined;
};

/**
 * Parse the argument of a `require` call whose keyword has just been read
 */
const parseRequireCall = (cursor: Cursor, keyword: CursorMark): SiteOutcome => {
  const afterKeyword = mark(cursor);

  if (!skipTrivia(cursor)) {
    return { site: dynamicSite(keyword, ""), halt: true };
  }

  const argStart = cursor.pos;
  const ch = peek(cursor);

  // require "name" / require [[name]]
  const bare = readLiteral(cursor);
  if (bare === null) {
    return {
      site: dynamicSite(keyword, restOfLine(cursor.text, argStart)),
      halt: true,
    };
  }
  if (bare !== undefined) {
    return {
      site: literalSite(keyword, bare, cursor.text.slice(argStart, cursor.pos)),
      halt: false,
    };
  }

  if (ch === "(") {
    advance(cursor);
    return parseArgumentList(cursor, keyword);
  }

  if (ch === "{") {
    advance(cursor);
    const close = skipBalanced(cursor, "{", "}");
    const end = close < 0 ? cursor.text.length : close + 1;
    return {
      site: dynamicSite(keyword, cursor.text.slice(argStart, end)),
      halt: close < 0,
    };
  }

  reset(cursor, afterKeyword);

  // Assignment target (`require = ...`) is not a use
  if (ch === "=" && cursor.text.charAt(argStart + 1) !== "=") {
    return { halt: false };
  }

  return { site: dynamicSite(keyword, ""), halt: false };
};

/**
 * Parse `( ... )` after `require` or after `pcall(require,`; the cursor is
 * just past the opening parenthesis or comma.
 */
const parseArgumentList = (
  cursor: Cursor,
  keyword: CursorMark,
  allowMoreArguments = false
): SiteOutcome => {
  const inner = mark(cursor);
  const innerStart = inner.pos;

  if (!skipTrivia(cursor)) {
    return {
      site: dynamicSite(keyword, restOfLine(cursor.text, innerStart)),
      halt: true,
    };
  }

  const literalStart = cursor.pos;
  const literal = readLiteral(cursor);
  if (literal === null) {
    return {
      site: dynamicSite(keyword, restOfLine(cursor.text, literalStart)),
      halt: true,
    };
  }

  if (literal !== undefined) {
    const literalEnd = cursor.pos;
    const afterLiteral = mark(cursor);
    if (skipTrivia(cursor)) {
      const next = peek(cursor);
      if (next === ")" || (allowMoreArguments && next === ",")) {
        if (next === ")") {
          advance(cursor);
        } else {
          reset(cursor, afterLiteral);
        }
        return {
          site: literalSite(
            keyword,
            literal,
            cursor.text.slice(literalStart, literalEnd)
          ),
          halt: false,
        };
      }
    }
  }

  // Anything else is a computed argument: capture it for diagnostics
  reset(cursor, inner);
  const close = skipBalanced(cursor, "(", ")");
  if (close < 0) {
    return {
      site: dynamicSite(keyword, restOfLine(cursor.text, innerStart)),
      halt: true,
    };
  }
  return {
    site: dynamicSite(keyword, cursor.text.slice(innerStart, close)),
    halt: false,
  };
};

/**
 * Recognise `pcall(require, <arg>)`. Returns undefined when the call has a
 * different shape, leaving the cursor where it was.
 */
const parseProtectedRequire = (cursor: Cursor): SiteOutcome | undefined => {
  const start = mark(cursor);
  const giveUp = (): undefined => {
    reset(cursor, start);
    return undefined;
  };

  if (!skipTrivia(cursor) || peek(cursor) !== "(") return giveUp();
  advance(cursor);
  if (!skipTrivia(cursor)) return giveUp();

  const keyword = mark(cursor);
  if (readWord(cursor) !== "require") return giveUp();
  if (!skipTrivia(cursor) || peek(cursor) !== ",") return giveUp();
  advance(cursor);

  return parseArgumentList(cursor, keyword, true);
};

/**
 * Find every `require` call site in a Lua source file, in order of
 * appearance. Never throws; an unterminated string or comment ends the scan.
 */
export const scanRequires = (text: string): readonly RequireSite[] => {
  const cursor = createCursor(text);
  const sites: RequireSite[] = [];
  const tokens: RecentTokens = { last: "", beforeLast: "" };

  // Shebang line
  if (peek(cursor) === "#") {
    skipLine(cursor);
  }

  while (!atEnd(cursor)) {
    const ch = peek(cursor);

    if (ch === "-" && peek(cursor, 1) === "-") {
      if (!skipComment(cursor)) break;
      continue;
    }

    if (ch === '"' || ch === "'" || longBracketLevel(text, cursor.pos) >= 0) {
      if (readLiteral(cursor) === null) break;
      pushToken(tokens, "<string>");
      continue;
    }

    if (WORD_CHAR.test(ch)) {
      const keyword = mark(cursor);
      const word = readWord(cursor);

      const outcome =
        word === "require" && isGlobalReference(tokens)
          ? parseRequireCall(cursor, keyword)
          : word === "pcall"
            ? parseProtectedRequire(cursor)
            : undefined;

      if (outcome === undefined) {
        pushToken(tokens, word);
        continue;
      }

      // `local require = require` re-binds the same name; later calls
      // through it are still visible.
      const isRebinding =
        outcome.site !== undefined &&
        !outcome.site.isLiteral &&
        outcome.site.rawArgument === "" &&
        tokens.last === "=" &&
        tokens.beforeLast === "require";

      if (outcome.site && !isRebinding) {
        sites.push(outcome.site);
      }
      if (outcome.halt) break;
      pushToken(tokens, word === "require" && outcome.site ? ")" : word);
      continue;
    }

    if (!/\s/.test(ch)) {
      pushToken(tokens, ch);
    }
    advance(cursor);
  }

  return sites;
};
