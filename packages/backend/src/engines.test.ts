/**
 * Tests for the engine registry
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  defaultEngineName,
  engineNames,
  resolveEngine,
  supportsPlatform,
} from "./engines.js";

describe("Engine registry", () => {
  it("should list every engine in registry order", () => {
    expect(engineNames()).to.deep.equal([
      "luastatic",
      "srlua",
      "winsrlua515",
      "winsrlua515-32",
      "winsrlua548",
      "linsrlua515",
      "linsrlua515-32",
      "linsrlua548",
    ]);
  });

  it("should resolve a known engine", () => {
    const result = resolveEngine("linsrlua548");
    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.kind).to.equal("srlua");
      expect(result.value.stub).to.equal("srlua548");
      expect(result.value.executables).to.deep.equal(["srglue", "srlua548"]);
      expect(result.value.platforms).to.deep.equal(["linux"]);
    }
  });

  it("should report unknown engines with the known names", () => {
    const result = resolveEngine("foo");
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.kind).to.equal("engine-not-found");
      if (result.error.kind === "engine-not-found") {
        expect(result.error.name).to.equal("foo");
        expect(result.error.known).to.deep.equal(engineNames());
      }
    }
  });

  it("should default to srlua", () => {
    expect(defaultEngineName()).to.equal("srlua");
  });

  it("should restrict luastatic to Linux", () => {
    const luastatic = resolveEngine("luastatic");
    if (!luastatic.ok) {
      expect.fail("luastatic missing from registry");
    }
    expect(supportsPlatform(luastatic.value, "linux")).to.equal(true);
    expect(supportsPlatform(luastatic.value, "darwin")).to.equal(false);
    expect(supportsPlatform(luastatic.value, "win32")).to.equal(false);
  });
});
