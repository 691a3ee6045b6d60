/**
 * Lua string literal encoding
 */

const ESCAPES: Readonly<Record<string, string>> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

/**
 * Quote a string as a double-quoted Lua literal that any Lua 5.1+ reads
 * back unchanged. Control characters become three-digit decimal escapes.
 */
export const quoteLuaString = (value: string): string => {
  let out = '"';
  for (const ch of value) {
    const escape = ESCAPES[ch];
    if (escape !== undefined) {
      out += escape;
      continue;
    }
    const code = ch.charCodeAt(0);
    out +=
      code < 0x20 || code === 0x7f
        ? `\\${code.toString().padStart(3, "0")}`
        : ch;
  }
  return `${out}"`;
};
