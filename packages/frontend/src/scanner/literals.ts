/**
 * Readers for Lua strings, long brackets and comments
 *
 * Each reader starts with the cursor on the construct's first character. On
 * success the cursor is left just past the construct; `undefined` / `false`
 * means the construct is unterminated.
 */

import { Cursor, advance, advanceTo, atEnd, peek } from "./cursor.js";

/**
 * Level of a long bracket `[==[` opening at `pos`, or -1 when there is none
 */
export const longBracketLevel = (text: string, pos: number): number => {
  if (text.charAt(pos) !== "[") {
    return -1;
  }
  let i = pos + 1;
  while (text.charAt(i) === "=") {
    i++;
  }
  return text.charAt(i) === "[" ? i - pos - 1 : -1;
};

/**
 * Step over an escape sequence starting at a backslash. `\z` takes the
 * whitespace after it, and an escaped `\r\n` or `\n\r` is one line break.
 */
const skipEscape = (cursor: Cursor): void => {
  const next = peek(cursor, 1);
  if (next === "z") {
    advance(cursor, 2);
    while (!atEnd(cursor) && /\s/.test(peek(cursor))) {
      advance(cursor);
    }
    return;
  }
  if (next === "\r" || next === "\n") {
    const after = peek(cursor, 2);
    advance(cursor, (after === "\r" || after === "\n") && after !== next ? 3 : 2);
    return;
  }
  advance(cursor, 2);
};

/**
 * Read a quoted string and return its raw (undecoded) body
 */
export const readShortString = (cursor: Cursor): string | undefined => {
  const quote = peek(cursor);
  advance(cursor);
  const start = cursor.pos;

  while (!atEnd(cursor)) {
    const ch = peek(cursor);
    if (ch === quote) {
      const body = cursor.text.slice(start, cursor.pos);
      advance(cursor);
      return body;
    }
    if (ch === "\n") {
      return undefined;
    }
    if (ch === "\\") {
      skipEscape(cursor);
    } else {
      advance(cursor);
    }
  }

  return undefined;
};

/**
 * Read a long-bracket string of the given level and return its body.
 * A newline directly after the opening bracket is not part of the body.
 */
export const readLongString = (
  cursor: Cursor,
  level: number
): string | undefined => {
  const bodyStart = cursor.pos + level + 2;
  const closing = `]${"=".repeat(level)}]`;
  const close = cursor.text.indexOf(closing, bodyStart);
  if (close < 0) {
    advanceTo(cursor, cursor.text.length);
    return undefined;
  }

  const body = cursor.text.slice(bodyStart, close);
  advanceTo(cursor, close + closing.length);
  return body.replace(/^(\r\n|\n\r|\n|\r)/, "");
};

/**
 * Skip a `--` comment. Returns false for an unterminated block comment.
 */
export const skipComment = (cursor: Cursor): boolean => {
  advance(cursor, 2);
  const level = longBracketLevel(cursor.text, cursor.pos);
  if (level >= 0) {
    return readLongString(cursor, level) !== undefined;
  }
  skipLine(cursor);
  return true;
};

/**
 * Skip to the start of the next line
 */
export const skipLine = (cursor: Cursor): void => {
  const newline = cursor.text.indexOf("\n", cursor.pos);
  advanceTo(cursor, newline < 0 ? cursor.text.length : newline + 1);
};

/**
 * Skip whitespace and comments. Returns false on an unterminated comment.
 */
export const skipTrivia = (cursor: Cursor): boolean => {
  while (!atEnd(cursor)) {
    const ch = peek(cursor);
    if (ch === "-" && peek(cursor, 1) === "-") {
      if (!skipComment(cursor)) {
        return false;
      }
    } else if (/\s/.test(ch)) {
      advance(cursor);
    } else {
      break;
    }
  }
  return true;
};

/**
 * Skip to the `closer` matching an opener the cursor has just passed.
 * Returns the closer's index (cursor left after it), or -1 at end of text.
 */
export const skipBalanced = (
  cursor: Cursor,
  opener: string,
  closer: string
): number => {
  let depth = 1;

  while (!atEnd(cursor)) {
    const ch = peek(cursor);

    if (ch === "-" && peek(cursor, 1) === "-") {
      if (!skipComment(cursor)) {
        return -1;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      if (readShortString(cursor) === undefined) {
        return -1;
      }
      continue;
    }

    const level = longBracketLevel(cursor.text, cursor.pos);
    if (level >= 0) {
      if (readLongString(cursor, level) === undefined) {
        return -1;
      }
      continue;
    }

    if (ch === opener) {
      depth++;
    } else if (ch === closer) {
      depth--;
      if (depth === 0) {
        const index = cursor.pos;
        advance(cursor);
        return index;
      }
    }
    advance(cursor);
  }

  return -1;
};
