/**
 * Tests for manifest construction
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as path from "node:path";
import { manifestFromFiles, moduleKeyFromPath } from "./manifest.js";

describe("moduleKeyFromPath", () => {
  it("should turn directories into dots", () => {
    expect(moduleKeyFromPath("lib/util.lua")).to.equal("lib.util");
    expect(moduleKeyFromPath("main.lua")).to.equal("main");
  });

  it("should key init.lua by its directory", () => {
    expect(moduleKeyFromPath("pkg/init.lua")).to.equal("pkg");
    expect(moduleKeyFromPath("a/b/init.lua")).to.equal("a.b");
  });

  it("should keep a top-level init.lua as init", () => {
    expect(moduleKeyFromPath("init.lua")).to.equal("init");
  });

  it("should key files outside the entry directory by name", () => {
    expect(moduleKeyFromPath("../shared/text.lua")).to.equal("text");
  });
});

describe("manifestFromFiles", () => {
  it("should key files relative to the entry directory, entry last", () => {
    const root = path.resolve("/project");
    const manifest = manifestFromFiles([
      path.join(root, "lib", "util.lua"),
      path.join(root, "pkg", "init.lua"),
      path.join(root, "main.lua"),
    ]);

    expect(manifest).to.deep.equal({
      entries: [
        { key: "lib.util", path: path.join(root, "lib", "util.lua") },
        { key: "pkg", path: path.join(root, "pkg", "init.lua") },
        { key: "main", path: path.join(root, "main.lua") },
      ],
    });
  });

  it("should return an empty manifest for no files", () => {
    expect(manifestFromFiles([])).to.deep.equal({ entries: [] });
  });
});
