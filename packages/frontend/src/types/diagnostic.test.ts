/**
 * Tests for diagnostic types
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createDiagnostic, formatDiagnostic, isError } from "./diagnostic.js";

describe("Diagnostics", () => {
  describe("createDiagnostic", () => {
    it("should create a diagnostic with all fields", () => {
      const diagnostic = createDiagnostic(
        "LST1003",
        "error",
        "Dynamic require",
        { file: "main.lua", line: 10, column: 5 },
        "Use a string literal"
      );

      expect(diagnostic.code).to.equal("LST1003");
      expect(diagnostic.severity).to.equal("error");
      expect(diagnostic.message).to.equal("Dynamic require");
      expect(diagnostic.location?.file).to.equal("main.lua");
      expect(diagnostic.hint).to.equal("Use a string literal");
    });

    it("should create a diagnostic without optional fields", () => {
      const diagnostic = createDiagnostic("LST1002", "warning", "Cycle");

      expect(diagnostic.location).to.be.undefined;
      expect(diagnostic.hint).to.be.undefined;
    });
  });

  describe("formatDiagnostic", () => {
    it("should format diagnostic with location and hint", () => {
      const diagnostic = createDiagnostic(
        "LST1003",
        "error",
        "Dynamic require: require(name)",
        { file: "/src/main.lua", line: 5, column: 10 },
        "Only require('name') is supported"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "/src/main.lua:5:10 error LST1003: Dynamic require: require(name) Hint: Only require('name') is supported"
      );
    });

    it("should format diagnostic without location", () => {
      const diagnostic = createDiagnostic(
        "LST3001",
        "error",
        "Unknown engine: foo"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "error LST3001: Unknown engine: foo"
      );
    });
  });

  describe("isError", () => {
    it("should only treat error severity as an error", () => {
      expect(isError(createDiagnostic("LST1001", "error", "x"))).to.equal(
        true
      );
      expect(isError(createDiagnostic("LST1001", "warning", "x"))).to.equal(
        false
      );
      expect(isError(createDiagnostic("LST1001", "info", "x"))).to.equal(
        false
      );
    });
  });
});
