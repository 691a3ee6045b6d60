/**
 * Tests for Lua string literal encoding
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { quoteLuaString } from "./lua-literals.js";
import { runLua } from "./testing/lua-vm.js";

describe("quoteLuaString", () => {
  it("should escape quotes, backslashes and line breaks", () => {
    expect(quoteLuaString('a"b\\c\n')).to.equal('"a\\"b\\\\c\\n"');
  });

  it("should use decimal escapes for other control characters", () => {
    expect(quoteLuaString("\u0000x\u007f")).to.equal('"\\000x\\127"');
  });

  it("should leave plain names unchanged", () => {
    expect(quoteLuaString("lib.util")).to.equal('"lib.util"');
  });

  it("should read back as the same string in Lua", () => {
    const tricky = 'say "hi"\\\t\r\nend';
    const run = runLua(`return ${quoteLuaString(tricky)} == ...`, [tricky]);
    expect(run).to.deep.equal({ ok: true, value: "true", output: [] });
  });
});
