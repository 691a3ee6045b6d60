import { describe, it } from "mocha";
import { expect } from "chai";
import { join } from "node:path";
import { silentReporter } from "@luastitch/frontend";
import { createConsoleReporter, describeEvent } from "./reporter.js";

describe("Console reporter", () => {
  const inCwd = (...segments: string[]): string =>
    join(process.cwd(), ...segments);

  it("should describe events with paths relative to the working directory", () => {
    expect(
      describeEvent({ kind: "visit", path: inCwd("main.lua"), depth: 0 })
    ).to.equal("Scanning main.lua (depth 0)");
    expect(
      describeEvent({
        kind: "resolve",
        moduleName: "lib.util",
        requiredBy: inCwd("main.lua"),
        resolvedPath: inCwd("lib", "util.lua"),
      })
    ).to.equal('  require "lib.util" -> lib/util.lua');
    expect(
      describeEvent({
        kind: "skip-builtin",
        moduleName: "string",
        requiredBy: inCwd("main.lua"),
      })
    ).to.equal('  require "string" (standard library, not embedded)');
    expect(
      describeEvent({
        kind: "engine-invoked",
        engine: "srlua",
        command: ["srglue", "srlua", "app.lua", "app"],
      })
    ).to.equal("Running [srlua]: srglue srlua app.lua app");
  });

  it("should keep the path when it is the working directory itself", () => {
    expect(
      describeEvent({ kind: "bundle-written", outputPath: process.cwd() })
    ).to.equal(`Bundle written to ${process.cwd()}`);
  });

  it("should be silent without --detail", () => {
    expect(createConsoleReporter(false)).to.equal(silentReporter);
  });

  it("should print events with --detail", () => {
    const original = console.log;
    const lines: string[] = [];
    console.log = (...data: unknown[]) => {
      lines.push(data.map(String).join(" "));
    };
    try {
      createConsoleReporter(true).report({
        kind: "merge-explicit",
        path: inCwd("extra.lua"),
      });
    } finally {
      console.log = original;
    }
    expect(lines).to.deep.equal(["Adding extra.lua"]);
  });
});
