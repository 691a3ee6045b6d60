/**
 * Position-tracking cursor over Lua source text
 */

export type Cursor = {
  readonly text: string;
  pos: number;
  line: number;
  lineStart: number;
};

export type CursorMark = {
  readonly pos: number;
  readonly line: number;
  readonly lineStart: number;
};

export const createCursor = (text: string): Cursor => ({
  text,
  pos: 0,
  line: 1,
  lineStart: 0,
});

export const atEnd = (cursor: Cursor): boolean =>
  cursor.pos >= cursor.text.length;

/**
 * Character at `pos + offset`, or "" past the end
 */
export const peek = (cursor: Cursor, offset = 0): string =>
  cursor.text.charAt(cursor.pos + offset);

export const advance = (cursor: Cursor, count = 1): void => {
  for (let i = 0; i < count && !atEnd(cursor); i++) {
    if (cursor.text.charCodeAt(cursor.pos) === 10) {
      cursor.line++;
      cursor.lineStart = cursor.pos + 1;
    }
    cursor.pos++;
  }
};

/**
 * Move to `target`, counting the newlines crossed on the way
 */
export const advanceTo = (cursor: Cursor, target: number): void => {
  advance(cursor, target - cursor.pos);
};

export const mark = (cursor: Cursor): CursorMark => ({
  pos: cursor.pos,
  line: cursor.line,
  lineStart: cursor.lineStart,
});

export const reset = (cursor: Cursor, to: CursorMark): void => {
  cursor.pos = to.pos;
  cursor.line = to.line;
  cursor.lineStart = to.lineStart;
};

/**
 * Text from `from` to the end of its line, trimmed
 */
export const restOfLine = (text: string, from: number): string => {
  const newline = text.indexOf("\n", from);
  return text.slice(from, newline < 0 ? text.length : newline).trim();
};
