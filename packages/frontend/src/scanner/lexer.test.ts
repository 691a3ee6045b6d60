/**
 * Tests for require-site scanning
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { scanRequires } from "./lexer.js";

const names = (text: string): readonly (string | undefined)[] =>
  scanRequires(text).map((site) =>
    site.isLiteral ? site.moduleName : undefined
  );

describe("scanRequires", () => {
  describe("literal forms", () => {
    it("should find quoted, parenthesised and long-bracket requires", () => {
      const sites = scanRequires(
        [
          'local a = require("alpha")',
          "local b = require 'beta'",
          "local c = require [[gamma]]",
        ].join("\n")
      );

      expect(sites).to.deep.equal([
        {
          isLiteral: true,
          moduleName: "alpha",
          rawArgument: '"alpha"',
          line: 1,
          column: 11,
        },
        {
          isLiteral: true,
          moduleName: "beta",
          rawArgument: "'beta'",
          line: 2,
          column: 11,
        },
        {
          isLiteral: true,
          moduleName: "gamma",
          rawArgument: "[[gamma]]",
          line: 3,
          column: 11,
        },
      ]);
    });

    it("should accept whitespace and leveled long brackets inside parentheses", () => {
      expect(names("require ( 'a.b' )\nrequire([==[c]==])")).to.deep.equal([
        "a.b",
        "c",
      ]);
    });

    it("should decode escapes in module names", () => {
      expect(names('require("ut\\x69l")')).to.deep.equal(["util"]);
    });

    it("should drop a newline directly after a long bracket", () => {
      expect(names("require [[\nname]]")).to.deep.equal(["name"]);
    });

    it("should treat a concatenation after a bare literal as outside the call", () => {
      expect(names('local x = require "a" .. "b"')).to.deep.equal(["a"]);
    });

    it("should find require after the concatenation operator", () => {
      expect(names('x = "a" .. require("b")')).to.deep.equal(["b"]);
    });

    it("should find pcall(require, literal)", () => {
      const sites = scanRequires('local ok, m = pcall(require, "socket")');
      expect(sites).to.deep.equal([
        {
          isLiteral: true,
          moduleName: "socket",
          rawArgument: '"socket"',
          line: 1,
          column: 21,
        },
      ]);
    });

    it("should ignore pcall of other functions", () => {
      expect(scanRequires('pcall(print, "x")')).to.deep.equal([]);
    });
  });

  describe("strings spanning lines", () => {
    const utilSite = {
      isLiteral: true,
      moduleName: "util",
      rawArgument: '"util"',
      line: 3,
      column: 11,
    };

    it("should continue past a \\z escape followed by a line break", () => {
      const text = ['local s = "a\\z', '   b"', 'local u = require("util")'].join(
        "\n"
      );
      expect(scanRequires(text)).to.deep.equal([utilSite]);
    });

    it("should treat an escaped CRLF as one line break", () => {
      const text = ['local s = "a\\', 'b"', 'local u = require("util")', ""].join(
        "\r\n"
      );
      expect(scanRequires(text)).to.deep.equal([utilSite]);
    });
  });

  describe("ignored text", () => {
    it("should ignore requires inside comments and strings", () => {
      const sites = scanRequires(
        [
          '-- require("a")',
          '--[[ require("b") ]]',
          "local s = \"require('c')\"",
          'local t = [==[ require("d") ]==]',
          'require("e")',
        ].join("\n")
      );

      expect(sites).to.have.length(1);
      expect(sites[0]).to.deep.include({ moduleName: "e", line: 5, column: 1 });
    });

    it("should ignore fields, methods and longer identifiers", () => {
      const text = [
        'obj.require("a")',
        'obj:require("b")',
        'myrequire("c")',
        'require2("d")',
        'require("e")',
      ].join("\n");

      expect(names(text)).to.deep.equal(["e"]);
    });

    it("should ignore declarations named require", () => {
      expect(scanRequires("local function require(name) end")).to.deep.equal(
        []
      );
      expect(scanRequires("function require(name) end")).to.deep.equal([]);
    });

    it("should ignore assignment to require", () => {
      expect(scanRequires("require = nil")).to.deep.equal([]);
    });

    it("should ignore local require = require but keep later calls", () => {
      const sites = scanRequires(
        'local require = require\nlocal m = require("m")'
      );
      expect(sites).to.deep.equal([
        {
          isLiteral: true,
          moduleName: "m",
          rawArgument: '"m"',
          line: 2,
          column: 11,
        },
      ]);
    });

    it("should treat a shebang line as a comment", () => {
      const sites = scanRequires('#!/usr/bin/env lua\nrequire("a")');
      expect(sites[0]).to.deep.include({ moduleName: "a", line: 2 });
    });

    it("should count lines inside block comments", () => {
      const sites = scanRequires('--[[\n\n]]\nrequire("x")');
      expect(sites[0]).to.deep.include({ line: 4, column: 1 });
    });
  });

  describe("non-literal forms", () => {
    it("should report computed arguments with their raw text", () => {
      const raw = scanRequires(
        [
          "require(name)",
          'require("a" .. b)',
          "require(f())",
          'require("a", x)',
          "require(  spaced\n  )",
        ].join("\n")
      ).map((site) => [site.isLiteral, site.rawArgument]);

      expect(raw).to.deep.equal([
        [false, "name"],
        [false, '"a" .. b'],
        [false, "f()"],
        [false, '"a", x'],
        [false, "spaced"],
      ]);
    });

    it("should report pcall(require, expr) as non-literal", () => {
      const sites = scanRequires("pcall(require, name)");
      expect(sites).to.deep.equal([
        { isLiteral: false, rawArgument: "name", line: 1, column: 7 },
      ]);
    });

    it("should report a table-constructor call as non-literal", () => {
      expect(scanRequires("require{x}")[0]).to.deep.include({
        isLiteral: false,
        rawArgument: "{x}",
      });
    });

    it("should report a bare reference with an empty raw argument", () => {
      const sites = scanRequires('local r = require\nreturn r("x")');
      expect(sites).to.deep.equal([
        { isLiteral: false, rawArgument: "", line: 1, column: 11 },
      ]);
    });
  });

  describe("unterminated input", () => {
    it("should keep sites found before an unterminated string", () => {
      expect(
        names('require("a")\nlocal s = "oops\nrequire("b")')
      ).to.deep.equal(["a"]);
    });

    it("should keep sites found before an unterminated block comment", () => {
      expect(
        names('require("a")\n--[[ never closed\nrequire("b")')
      ).to.deep.equal(["a"]);
    });

    it("should report an unterminated literal argument as non-literal", () => {
      const sites = scanRequires('local x = require("abc\nlocal y = 1');
      expect(sites).to.deep.equal([
        { isLiteral: false, rawArgument: '"abc', line: 1, column: 11 },
      ]);
    });

    it("should return nothing for empty text", () => {
      expect(scanRequires("")).to.deep.equal([]);
    });
  });
});
