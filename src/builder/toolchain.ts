import { execFile } from "node:child_process";
import path from "node:path";
import type { BuildSpec } from "../types/pipeline.js";

export const MAX_CMD_BUFFER_SIZE = 50 * 1024 * 1024; // 50MB

export type CommandResult = {
  /** Exit status; null when the process was killed by a signal. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be spawned at all (e.g. ENOENT). */
  spawnError?: string;
};

/**
 * Runs an external command to completion. Injected into the builder so tests
 * can stand in for the toolchain.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  opts: { cwd: string },
) => Promise<CommandResult>;

export const execFileRunner: CommandRunner = (command, args, opts) =>
  new Promise((resolve) => {
    execFile(
      command,
      args,
      { cwd: opts.cwd, maxBuffer: MAX_CMD_BUFFER_SIZE, encoding: "utf8" },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        // A string code is a spawn failure; a numeric one is the exit status.
        if (typeof err.code === "string") {
          resolve({ exitCode: null, stdout, stderr, spawnError: err.code });
          return;
        }
        resolve({ exitCode: typeof err.code === "number" ? err.code : null, stdout, stderr });
      },
    );
  });

/** Substitute `{profile}` and `{target}` in each argument template. */
export function renderArgs(templates: string[], spec: BuildSpec): string[] {
  return templates.map((t) => t.replaceAll("{profile}", spec.profile).replaceAll("{target}", spec.target));
}

/** Output directory cargo uses for a profile: dev/test → debug, bench → release. */
export function profileDir(profile: string): string {
  switch (profile) {
    case "dev":
    case "test":
      return "debug";
    case "bench":
      return "release";
    default:
      return profile;
  }
}

/** Default library name for a package: `demo-plugin` → `demo_plugin`. */
export function defaultLibraryName(target: string): string {
  return target.replace(/-/g, "_");
}

/** Platform file name of a shared library. */
export function libraryFileName(name: string, platform: NodeJS.Platform): string {
  switch (platform) {
    case "darwin":
      return `lib${name}.dylib`;
    case "win32":
      return `${name}.dll`;
    default:
      return `lib${name}.so`;
  }
}

/**
 * Deterministic artifact location:
 * `<workspace>/<targetDir>/<profileDir>/<libraryFile>`.
 */
export function artifactPath(opts: {
  workspace: string;
  targetDir: string;
  profile: string;
  libraryName: string;
  platform: NodeJS.Platform;
}): string {
  return path.resolve(
    opts.workspace,
    opts.targetDir,
    profileDir(opts.profile),
    libraryFileName(opts.libraryName, opts.platform),
  );
}

/** Last `count` non-empty lines of process output, for one-line diagnostics. */
export function tailLines(output: string, count = 5): string[] {
  return output
    .split(/\r?\n/)
    .map((l) => l.trimEnd())
    .filter((l) => l.length > 0)
    .slice(-count);
}
