/**
 * Packaging engine backed by the native toolchain on PATH
 */

import {
  chmodSync,
  copyFileSync,
  existsSync,
  mkdirSync,
  mkdtempSync,
  rmSync,
} from "fs";
import { tmpdir } from "os";
import { basename, dirname, join, relative, resolve } from "path";
import {
  BundleManifest,
  Result,
  error,
  getManifestEntryPoint,
  ok,
} from "@luastitch/frontend";
import { BundleError, describeError, writeBundle } from "@luastitch/emitter";
import {
  EngineDescriptor,
  PackagingEngine,
  PackagingError,
  PackagingJob,
} from "./types.js";
import { supportsPlatform } from "./engines.js";
import {
  CommandRunner,
  ExecutableFinder,
  findExecutable,
  runCommand,
} from "./toolchain.js";

export type SystemEngineOptions = {
  readonly platform?: NodeJS.Platform;
  readonly findExecutable?: ExecutableFinder;
  readonly runCommand?: CommandRunner;
};

type InvokeResult = Result<string, PackagingError | BundleError>;

/**
 * Distinct files of a manifest in first-appearance order
 */
export const manifestFiles = (manifest: BundleManifest): readonly string[] => [
  ...new Set(manifest.entries.map((entry) => entry.path)),
];

/**
 * Arguments for luastatic, relative to the entry's directory: entry first,
 * then its dependencies
 */
export const luastaticArguments = (
  manifest: BundleManifest,
  extraArgs: readonly string[]
): readonly string[] => {
  const files = manifestFiles(manifest);
  const entry = getManifestEntryPoint(manifest)?.path;
  if (entry === undefined) {
    return [...extraArgs];
  }
  const baseDir = dirname(entry);
  return [
    relative(baseDir, entry),
    ...files
      .filter((file) => file !== entry)
      .map((file) => relative(baseDir, file)),
    ...extraArgs,
  ];
};

const makeExecutable = (
  target: string,
  platform: NodeJS.Platform
): void => {
  if (platform !== "win32") {
    chmodSync(target, 0o755);
  }
};

export const createSystemEngine = (
  options: SystemEngineOptions = {}
): PackagingEngine => {
  const platform = options.platform ?? process.platform;
  const find: ExecutableFinder =
    options.findExecutable ??
    ((name) => findExecutable(name, process.env, platform));
  const run = options.runCommand ?? runCommand;

  const missingExecutables = (
    descriptor: EngineDescriptor
  ): readonly string[] =>
    descriptor.executables.filter((name) => find(name) === undefined);

  const locate = (
    descriptor: EngineDescriptor,
    name: string
  ): Result<string, PackagingError> => {
    const found = find(name);
    return found === undefined
      ? error({
          kind: "toolchain-not-found",
          engine: descriptor.name,
          missing: [name],
          installHint: descriptor.installHint,
        })
      : ok(found);
  };

  const execute = (
    descriptor: EngineDescriptor,
    job: PackagingJob,
    program: string,
    args: readonly string[],
    cwd: string
  ): Result<void, PackagingError> => {
    job.reporter.report({
      kind: "engine-invoked",
      engine: descriptor.name,
      command: [program, ...args],
    });
    const result = run(program, args, cwd);
    return result.ok
      ? ok(undefined)
      : error({
          kind: "packaging-process-failed",
          engine: descriptor.name,
          command: [basename(program), ...args],
          exitCode: result.exitCode,
          stderr: result.stderr ?? result.error,
        });
  };

  const invokeLuastatic = (
    descriptor: EngineDescriptor,
    job: PackagingJob
  ): InvokeResult => {
    const luastatic = locate(descriptor, "luastatic");
    if (!luastatic.ok) return luastatic;

    const entry = getManifestEntryPoint(job.manifest)?.path;
    if (entry === undefined) {
      return error({ kind: "empty-manifest" });
    }

    // luastatic writes <entry stem> next to the entry
    const workDir = dirname(entry);
    const args = luastaticArguments(job.manifest, job.extraArgs);
    const executed = execute(descriptor, job, luastatic.value, args, workDir);
    if (!executed.ok) return executed;

    const produced = join(workDir, basename(entry, ".lua"));
    if (!existsSync(produced)) {
      return error({
        kind: "output-artifact-missing",
        engine: descriptor.name,
        path: produced,
      });
    }

    const target = resolve(job.outputPath);
    if (produced !== target) {
      try {
        mkdirSync(dirname(target), { recursive: true });
        copyFileSync(produced, target);
        rmSync(produced, { force: true });
      } catch (err) {
        return error({
          kind: "output-unwritable",
          path: target,
          reason: describeError(err),
        });
      }
    }
    makeExecutable(target, platform);
    return ok(target);
  };

  const invokeSrlua = (
    descriptor: EngineDescriptor,
    job: PackagingJob
  ): InvokeResult => {
    const srglue = locate(descriptor, "srglue");
    if (!srglue.ok) return srglue;
    const stub = locate(descriptor, descriptor.stub ?? "srlua");
    if (!stub.ok) return stub;

    const buildDir = mkdtempSync(join(tmpdir(), "luastitch-srlua-"));
    try {
      const bundled = writeBundle(job.manifest, join(buildDir, "bundle.lua"), {
        reporter: job.reporter,
      });
      if (!bundled.ok) return bundled;

      const target = resolve(job.outputPath);
      try {
        mkdirSync(dirname(target), { recursive: true });
      } catch (err) {
        return error({
          kind: "output-unwritable",
          path: target,
          reason: describeError(err),
        });
      }

      const executed = execute(
        descriptor,
        job,
        srglue.value,
        [stub.value, bundled.value, target],
        dirname(target)
      );
      if (!executed.ok) return executed;

      if (!existsSync(target)) {
        return error({
          kind: "output-artifact-missing",
          engine: descriptor.name,
          path: target,
        });
      }
      makeExecutable(target, platform);
      return ok(target);
    } finally {
      rmSync(buildDir, { recursive: true, force: true });
    }
  };

  return {
    platform,
    probe: (descriptor) =>
      supportsPlatform(descriptor, platform) &&
      missingExecutables(descriptor).length === 0,
    invoke: (descriptor, job) => {
      if (!supportsPlatform(descriptor, platform)) {
        return error({
          kind: "engine-unsupported-platform",
          engine: descriptor.name,
          platform,
          supported: descriptor.platforms,
        });
      }
      const missing = missingExecutables(descriptor);
      if (missing.length > 0) {
        return error({
          kind: "toolchain-not-found",
          engine: descriptor.name,
          missing,
          installHint: descriptor.installHint,
        });
      }
      return descriptor.kind === "luastatic"
        ? invokeLuastatic(descriptor, job)
        : invokeSrlua(descriptor, job);
    },
  };
};
