import fs, { type Stats } from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { BuildFailedError, MissingArtifactError, osErrorCode } from "../core/errors.js";
import type { ToolchainConfig } from "../types/config.js";
import type { Artifact, BuildSpec } from "../types/pipeline.js";
import {
  artifactPath,
  defaultLibraryName,
  execFileRunner,
  renderArgs,
  tailLines,
  type CommandRunner,
} from "./toolchain.js";

export type BuildOptions = {
  workspace: string;
  toolchain: ToolchainConfig;
  platform?: NodeJS.Platform;
  runner?: CommandRunner;
};

/** Whether `target` matches one of the workspace package patterns. An empty list accepts anything. */
export function isWorkspacePackage(target: string, patterns: string[]): boolean {
  if (patterns.length === 0) return true;
  return patterns.some((p) => minimatch(target, p));
}

/**
 * Builder: compile `spec.target` with the configured toolchain and return the
 * shared library it produced. No retries.
 */
export async function build(spec: BuildSpec, opts: BuildOptions): Promise<Artifact> {
  const { toolchain } = opts;
  const runner = opts.runner ?? execFileRunner;
  const workspace = path.resolve(opts.workspace);
  const failed = (exitCode: number | null, message: string, osCode?: string) =>
    new BuildFailedError({ profile: spec.profile, target: spec.target, exitCode }, message, { path: workspace, osCode });

  if (!isWorkspacePackage(spec.target, toolchain.packages)) {
    throw failed(null, `Not a workspace package: ${spec.target} (allowed: ${toolchain.packages.join(", ")})`);
  }

  const args = renderArgs(toolchain.args, spec);
  const res = await runner(toolchain.command, args, { cwd: workspace });

  if (res.spawnError) {
    throw failed(null, `Could not start ${toolchain.command}: ${res.spawnError}`, res.spawnError);
  }
  if (res.exitCode !== 0) {
    const tail = tailLines(res.stderr);
    const status = res.exitCode === null ? "was terminated" : `exited with code ${res.exitCode}`;
    const detail = tail.length > 0 ? `: ${tail[tail.length - 1]}` : "";
    throw failed(res.exitCode, `${toolchain.command} ${status} building ${spec.target} (${spec.profile})${detail}`);
  }

  const outPath = artifactPath({
    workspace,
    targetDir: toolchain.target_dir,
    profile: spec.profile,
    libraryName: toolchain.library_name ?? defaultLibraryName(spec.target),
    platform: opts.platform ?? process.platform,
  });

  let stat: Stats;
  try {
    stat = fs.statSync(outPath);
  } catch (e: unknown) {
    throw new MissingArtifactError("build", outPath, { osCode: osErrorCode(e), cause: e });
  }
  if (!stat.isFile() || stat.size === 0) {
    throw new MissingArtifactError("build", outPath);
  }

  return { path: outPath };
}
