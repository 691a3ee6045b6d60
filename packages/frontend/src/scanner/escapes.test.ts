/**
 * Tests for Lua escape decoding
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { decodeLuaEscapes } from "./escapes.js";

describe("decodeLuaEscapes", () => {
  it("should decode simple escapes", () => {
    expect(decodeLuaEscapes("a\\nb\\tc")).to.equal("a\nb\tc");
    expect(decodeLuaEscapes("\\\"q\\'")).to.equal("\"q'");
    expect(decodeLuaEscapes("back\\\\slash")).to.equal("back\\slash");
  });

  it("should decode decimal escapes of up to three digits", () => {
    expect(decodeLuaEscapes("\\65\\066")).to.equal("AB");
    expect(decodeLuaEscapes("\\0491")).to.equal("11");
  });

  it("should decode hexadecimal and unicode escapes", () => {
    expect(decodeLuaEscapes("\\x6c\\x75a")).to.equal("lua");
    expect(decodeLuaEscapes("\\u{48}\\u{49}")).to.equal("HI");
    expect(decodeLuaEscapes("\\u{1F600}")).to.equal("\u{1F600}");
  });

  it("should skip whitespace after \\z", () => {
    expect(decodeLuaEscapes("a\\z   \n  b")).to.equal("ab");
  });

  it("should turn an escaped line break into a newline", () => {
    expect(decodeLuaEscapes("line\\\nnext")).to.equal("line\nnext");
    expect(decodeLuaEscapes("line\\\r\nnext")).to.equal("line\nnext");
  });

  it("should keep malformed escapes as written", () => {
    expect(decodeLuaEscapes("\\q")).to.equal("\\q");
    expect(decodeLuaEscapes("\\256")).to.equal("\\256");
    expect(decodeLuaEscapes("\\xZZ")).to.equal("\\xZZ");
  });
});
