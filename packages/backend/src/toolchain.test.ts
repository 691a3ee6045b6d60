/**
 * Tests for toolchain lookup
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import { TempProject, createTempProject } from "@luastitch/frontend/testing";
import { findExecutable } from "./toolchain.js";

describe("findExecutable", () => {
  let project: TempProject;

  before(() => {
    project = createTempProject("luastitch-toolchain-");
    fs.chmodSync(project.write("bin/srglue", "#!/bin/sh\n"), 0o755);
    fs.chmodSync(project.write("bin/readme", "text\n"), 0o644);
    fs.chmodSync(project.write("later/srlua", "#!/bin/sh\n"), 0o755);
    fs.chmodSync(project.write("bin/srlua", "#!/bin/sh\n"), 0o755);
    project.write("win/tool.EXE", "");
    fs.mkdirSync(project.path("bin", "cc"));
  });

  after(() => {
    project.dispose();
  });

  const env = (...dirs: readonly string[]) => ({
    PATH: dirs.map((dir) => project.path(dir)).join(path.delimiter),
  });

  it("should find an executable file on PATH", () => {
    expect(findExecutable("srglue", env("bin"), "linux")).to.equal(
      project.path("bin", "srglue")
    );
  });

  it("should take the first PATH directory that has the program", () => {
    expect(findExecutable("srlua", env("bin", "later"), "linux")).to.equal(
      project.path("bin", "srlua")
    );
  });

  it("should skip files without execute permission", () => {
    expect(findExecutable("readme", env("bin"), "linux")).to.equal(undefined);
  });

  it("should skip directories", () => {
    expect(findExecutable("cc", env("bin"), "linux")).to.equal(undefined);
  });

  it("should skip PATH entries that are files", () => {
    expect(
      findExecutable("srglue", env(path.join("bin", "readme"), "bin"), "linux")
    ).to.equal(project.path("bin", "srglue"));
  });

  it("should try PATHEXT suffixes on Windows", () => {
    expect(
      findExecutable("tool", { ...env("win"), PATHEXT: ".COM;.EXE" }, "win32")
    ).to.equal(project.path("win", "tool.EXE"));
  });

  it("should return undefined for an empty PATH", () => {
    expect(findExecutable("srglue", {}, "linux")).to.equal(undefined);
  });
});
