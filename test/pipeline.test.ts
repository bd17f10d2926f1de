import { describe, expect, it } from "vitest";
import { Pipeline, toStageError, type PipelineInput, type PipelineStages } from "../src/core/pipeline.js";
import { createReporter } from "../src/core/reporter.js";
import {
  BuildFailedError,
  BundleWriteFailedError,
  InstallFailedError,
  MissingArtifactError,
} from "../src/core/errors.js";
import { EXIT, exitCodeForStage } from "../src/commands/exit-codes.js";

const INPUT: PipelineInput = {
  build: { profile: "release-debug", target: "demo-plugin" },
  productName: "Demo",
  installTarget: { destinationRoot: "/plugins" },
};

function recordingStages(overrides: Partial<PipelineStages> = {}) {
  const calls: string[] = [];
  const stages: PipelineStages = {
    build: async (spec) => {
      calls.push(`build:${spec.profile}:${spec.target}`);
      return { path: "/ws/target/release-debug/libdemo_plugin.so" };
    },
    bundle: (spec) => {
      calls.push(`bundle:${spec.sourceArtifact.path}:${spec.productName}`);
      return { rootPath: "/ws/tmp/Demo.bundle", binaryPath: "/ws/tmp/Demo.bundle/Contents/Demo" };
    },
    install: (bundle, target) => {
      calls.push(`install:${bundle.rootPath}:${target.destinationRoot}`);
    },
    installedPath: () => "/plugins/Demo.bundle",
    ...overrides,
  };
  return { stages, calls };
}

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, sink: { out: (l: string) => out.push(l), err: (l: string) => err.push(l) } };
}

describe("exit codes", () => {
  it("defines a distinct code per stage", () => {
    expect(EXIT.SUCCESS).toBe(0);
    expect(exitCodeForStage("build")).toBe(1);
    expect(exitCodeForStage("bundle")).toBe(2);
    expect(exitCodeForStage("install")).toBe(3);
    expect(EXIT.INVALID_ARGS).toBe(4);
  });
});

describe("Pipeline", () => {
  it("passes each stage's output to the next", async () => {
    const { stages, calls } = recordingStages();
    const result = await new Pipeline(stages).run(INPUT);

    expect(calls).toEqual([
      "build:release-debug:demo-plugin",
      "bundle:/ws/target/release-debug/libdemo_plugin.so:Demo",
      "install:/ws/tmp/Demo.bundle:/plugins",
    ]);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.installedPath).toBe("/plugins/Demo.bundle");
    expect(result.bundle.binaryPath).toBe("/ws/tmp/Demo.bundle/Contents/Demo");
    expect(result.step_results.build?.status).toBe("success");
    expect(result.step_results.bundle?.status).toBe("success");
    expect(result.step_results.install?.status).toBe("success");
  });

  it("aborts after a build failure without bundling", async () => {
    const { stages, calls } = recordingStages({
      build: async (spec) => {
        throw new BuildFailedError({ ...spec, exitCode: 101 }, "cargo exited with code 101");
      },
    });
    const result = await new Pipeline(stages).run(INPUT);

    expect(calls).toEqual([]);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.failedStage).toBe("build");
    expect(result.error).toBeInstanceOf(BuildFailedError);
    expect(result.step_results).toEqual({
      build: { status: "failed", duration_ms: expect.any(Number), error: "cargo exited with code 101" },
    });
  });

  it("aborts after a bundle failure without installing", async () => {
    const { stages, calls } = recordingStages({
      bundle: (spec) => {
        throw new MissingArtifactError("bundle", spec.sourceArtifact.path);
      },
    });
    const result = await new Pipeline(stages).run(INPUT);

    expect(calls).toEqual(["build:release-debug:demo-plugin"]);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.failedStage).toBe("bundle");
    expect(result.error.code).toBe("MISSING_ARTIFACT");
    expect(result.step_results.install).toBeUndefined();
  });

  it("wraps unexpected errors in the failing stage's error type", async () => {
    const { stages } = recordingStages({
      install: () => {
        throw Object.assign(new Error("disk full"), { code: "ENOSPC" });
      },
    });
    const result = await new Pipeline(stages).run(INPUT);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.failedStage).toBe("install");
    expect(result.error).toBeInstanceOf(InstallFailedError);
    expect(result.error.osCode).toBe("ENOSPC");
    expect(result.error.message).toBe("disk full");
  });

  it("reports progress to stdout and the failure to stderr", async () => {
    const { stages } = recordingStages({
      install: () => {
        throw new InstallFailedError("Failed to install Demo.bundle into /plugins: EACCES", {
          path: "/plugins/Demo.bundle",
          osCode: "EACCES",
        });
      },
    });
    const { out, err, sink } = capture();
    await new Pipeline(stages, createReporter("human", sink)).run(INPUT);

    expect(out).toEqual(["Built /ws/target/release-debug/libdemo_plugin.so", "Bundled /ws/tmp/Demo.bundle"]);
    expect(err).toEqual(["install: Failed to install Demo.bundle into /plugins: EACCES"]);
  });

  it("reports JSON diagnostics in jsonl mode", async () => {
    const { stages } = recordingStages();
    const { out, err, sink } = capture();
    await new Pipeline(stages, createReporter("jsonl", sink)).run(INPUT);

    expect(err).toEqual([]);
    expect(out.map((l) => JSON.parse(l))).toEqual([
      { level: "info", code: "BUILD_OK", message: "Built /ws/target/release-debug/libdemo_plugin.so", stage: "build", path: "/ws/target/release-debug/libdemo_plugin.so" },
      { level: "info", code: "BUNDLE_OK", message: "Bundled /ws/tmp/Demo.bundle", stage: "bundle", path: "/ws/tmp/Demo.bundle" },
      { level: "info", code: "INSTALL_OK", message: "Installed /plugins/Demo.bundle", stage: "install", path: "/plugins/Demo.bundle" },
    ]);
  });
});

describe("toStageError", () => {
  it("keeps pipeline errors as thrown", () => {
    const original = new BundleWriteFailedError("nope");
    expect(toStageError("install", original, INPUT)).toBe(original);
  });

  it("builds a BuildFailed with the requested profile and target", () => {
    const err = toStageError("build", new Error("spawn failed"), INPUT);
    expect(err).toBeInstanceOf(BuildFailedError);
    expect(err.toDiagnostic()).toEqual({
      level: "error",
      code: "BUILD_FAILED",
      message: "spawn failed",
      stage: "build",
      details: { profile: "release-debug", target: "demo-plugin", exitCode: null },
    });
  });

  it("wraps non-Error values", () => {
    const err = toStageError("bundle", "weird", INPUT);
    expect(err).toBeInstanceOf(BundleWriteFailedError);
    expect(err.message).toBe("weird");
  });
});
