/**
 * Lua short-string escape decoding
 */

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  n: "\n",
  t: "\t",
  r: "\r",
  a: "\x07",
  b: "\b",
  f: "\f",
  v: "\v",
  "\\": "\\",
  '"': '"',
  "'": "'",
};

const isDigit = (ch: string): boolean => ch >= "0" && ch <= "9";
const isHexDigit = (ch: string): boolean => /^[0-9A-Fa-f]$/.test(ch);
const isSpace = (ch: string): boolean => /^[ \t\n\r\f\v]$/.test(ch);

/**
 * Decode the body of a quoted Lua string literal (without its quotes).
 * Malformed escapes are kept as written.
 */
export const decodeLuaEscapes = (body: string): string => {
  let out = "";
  let i = 0;

  while (i < body.length) {
    const ch = body.charAt(i);
    if (ch !== "\\") {
      out += ch;
      i++;
      continue;
    }

    const next = body.charAt(i + 1);
    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      out += simple;
      i += 2;
      continue;
    }

    // Escaped line break: "\r\n" and "\n\r" count as one
    if (next === "\n" || next === "\r") {
      out += "\n";
      const after = body.charAt(i + 2);
      i += (after === "\n" || after === "\r") && after !== next ? 3 : 2;
      continue;
    }

    if (next === "z") {
      i += 2;
      while (i < body.length && isSpace(body.charAt(i))) {
        i++;
      }
      continue;
    }

    if (next === "x") {
      const hex = body.slice(i + 2, i + 4);
      if (hex.length === 2 && isHexDigit(hex[0] ?? "") && isHexDigit(hex[1] ?? "")) {
        out += String.fromCharCode(parseInt(hex, 16));
        i += 4;
        continue;
      }
    }

    if (next === "u" && body.charAt(i + 2) === "{") {
      const close = body.indexOf("}", i + 3);
      const digits = close < 0 ? "" : body.slice(i + 3, close);
      if (/^[0-9A-Fa-f]{1,8}$/.test(digits)) {
        const codePoint = parseInt(digits, 16);
        if (codePoint <= 0x10ffff) {
          out += String.fromCodePoint(codePoint);
          i = close + 1;
          continue;
        }
      }
    }

    if (isDigit(next)) {
      let digits = next;
      while (digits.length < 3 && isDigit(body.charAt(i + 1 + digits.length))) {
        digits += body.charAt(i + 1 + digits.length);
      }
      const value = parseInt(digits, 10);
      if (value <= 255) {
        out += String.fromCharCode(value);
        i += 1 + digits.length;
        continue;
      }
    }

    out += ch;
    i++;
  }

  return out;
};
