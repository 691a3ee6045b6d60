import { describe, it } from "mocha";
import { expect } from "chai";
import { detectCycle, findPath } from "./circular.js";

describe("Circular dependency detection", () => {
  const edges = new Map<string, readonly string[]>([
    ["main", ["a", "b"]],
    ["a", ["c"]],
    ["b", ["c"]],
    ["c", []],
  ]);

  describe("findPath", () => {
    it("should follow edges in recorded order", () => {
      expect(findPath(edges, "main", "c")).to.deep.equal(["main", "a", "c"]);
    });

    it("should return undefined when the target is unreachable", () => {
      expect(findPath(edges, "c", "main")).to.be.undefined;
    });

    it("should return the single node for a path to itself", () => {
      expect(findPath(edges, "b", "b")).to.deep.equal(["b"]);
    });
  });

  describe("detectCycle", () => {
    it("should report the cycle closed by a back edge, target first and last", () => {
      expect(detectCycle(edges, "c", "main")).to.deep.equal([
        "main",
        "a",
        "c",
        "main",
      ]);
      expect(detectCycle(edges, "c", "a")).to.deep.equal(["a", "c", "a"]);
    });

    it("should report a module requiring itself", () => {
      expect(detectCycle(edges, "c", "c")).to.deep.equal(["c", "c"]);
    });

    it("should accept edges that close no cycle", () => {
      expect(detectCycle(edges, "main", "c")).to.be.undefined;
      expect(detectCycle(edges, "a", "b")).to.be.undefined;
    });
  });
});
