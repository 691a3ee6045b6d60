/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, map, flatMap, mapError, collect } from "./result.js";

describe("Result", () => {
  describe("ok and error constructors", () => {
    it("should create ok result", () => {
      const result = ok<number, string>(42);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value).to.equal(42);
      }
    });

    it("should create error result", () => {
      const result = error<number, string>("Something went wrong");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error).to.equal("Something went wrong");
      }
    });
  });

  describe("map", () => {
    it("should map ok value", () => {
      const mapped = map(ok<number, string>(5), (x) => x * 2);
      expect(mapped).to.deep.equal({ ok: true, value: 10 });
    });

    it("should pass through error", () => {
      const mapped = map(error<number, string>("Error"), (x) => x * 2);
      expect(mapped).to.deep.equal({ ok: false, error: "Error" });
    });
  });

  describe("flatMap", () => {
    it("should chain ok values", () => {
      const mapped = flatMap(ok<number, string>(5), (x) =>
        ok<string, string>(x.toString())
      );
      expect(mapped).to.deep.equal({ ok: true, value: "5" });
    });

    it("should surface the error returned by the callback", () => {
      const mapped = flatMap(ok<number, string>(5), (x) =>
        x > 10 ? ok<number, string>(x) : error<number, string>("Too small")
      );
      expect(mapped).to.deep.equal({ ok: false, error: "Too small" });
    });
  });

  describe("mapError", () => {
    it("should transform the error", () => {
      const mapped = mapError(error<number, string>("bad"), (e) => e.length);
      expect(mapped).to.deep.equal({ ok: false, error: 3 });
    });

    it("should leave ok values alone", () => {
      const mapped = mapError(ok<number, string>(1), (e) => e.length);
      expect(mapped).to.deep.equal({ ok: true, value: 1 });
    });
  });

  describe("collect", () => {
    it("should gather every value in order", () => {
      const result = collect([1, 2, 3], (x) => ok<number, string>(x * 10));
      expect(result).to.deep.equal({ ok: true, value: [10, 20, 30] });
    });

    it("should stop at the first error", () => {
      const seen: number[] = [];
      const result = collect([1, 2, 3], (x) => {
        seen.push(x);
        return x === 2 ? error<number, string>("two") : ok<number, string>(x);
      });

      expect(result).to.deep.equal({ ok: false, error: "two" });
      expect(seen).to.deep.equal([1, 2]);
    });
  });
});
