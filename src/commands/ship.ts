import path from "node:path";
import { build } from "../builder/builder.js";
import type { CommandRunner } from "../builder/toolchain.js";
import { bundle } from "../bundler/bundler.js";
import { BUNDLE_FORMAT_NAMES, isBundleFormatName } from "../bundler/formats.js";
import { ConfigError, loadConfig } from "../config/loader.js";
import { errorMessage } from "../core/errors.js";
import { sanitizePathComponent } from "../core/path-safety.js";
import { Pipeline } from "../core/pipeline.js";
import { createReporter, type LineSink, type OutputFormat } from "../core/reporter.js";
import { install, installedPath } from "../installer/installer.js";
import { currentHost, resolveInstallRoot, type HostInfo } from "../installer/install-root.js";
import type { PlugctlConfig } from "../types/config.js";
import type { Artifact, Bundle, StageName } from "../types/pipeline.js";
import { EXIT, exitCodeForStage, type ExitCode } from "./exit-codes.js";

export const DEFAULT_PROFILE = "release";

export type ShipOpts = {
  target: string;
  productName: string;
  profile?: string;
  installRoot?: string;
  library?: string;
  bundleFormat?: string;
  outDir?: string;
  workspace?: string;
  /** Project config file, relative to the workspace. */
  config?: string;
  format?: OutputFormat;
  runner?: CommandRunner;
  host?: HostInfo;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  sink?: LineSink;
};

export type ShipResult =
  | { ok: true; artifact: Artifact; bundle: Bundle; installedPath: string; exitCode: ExitCode }
  | { ok: false; error: string; stage?: StageName; exitCode: ExitCode };

/** Apply CLI flags over the loaded config; flags take precedence. */
function withOverrides(config: PlugctlConfig, opts: ShipOpts): PlugctlConfig {
  const format = opts.bundleFormat !== undefined && isBundleFormatName(opts.bundleFormat)
    ? opts.bundleFormat
    : config.bundle.format;
  return {
    ...config,
    toolchain: { ...config.toolchain, library_name: opts.library ?? config.toolchain.library_name },
    bundle: { ...config.bundle, format, out_dir: opts.outDir ?? config.bundle.out_dir },
    install: { ...config.install, root: opts.installRoot ?? config.install.root },
  };
}

type CheckedArgs = { ok: true; productName: string } | { ok: false; error: string };

function checkArgs(opts: ShipOpts): CheckedArgs {
  if (!opts.target || opts.target.trim().length === 0) return { ok: false, error: "--target must not be empty" };
  let productName: string;
  try {
    productName = sanitizePathComponent(opts.productName);
  } catch (e: unknown) {
    return { ok: false, error: `--product-name: ${errorMessage(e)}` };
  }
  if (opts.bundleFormat !== undefined && !isBundleFormatName(opts.bundleFormat)) {
    return { ok: false, error: `--bundle-format must be one of: ${BUNDLE_FORMAT_NAMES.join(", ")}` };
  }
  return { ok: true, productName };
}

/**
 * Build `opts.target`, bundle it as `opts.productName` and install the bundle.
 * All output goes through the reporter; the exit code tells which stage failed.
 */
export async function ship(opts: ShipOpts): Promise<ShipResult> {
  const reporter = createReporter(opts.format ?? "human", opts.sink);
  const invalid = (message: string): ShipResult => {
    reporter.error({ code: "INVALID_ARGS", message });
    return { ok: false, error: message, exitCode: EXIT.INVALID_ARGS };
  };

  const args = checkArgs(opts);
  if (!args.ok) return invalid(args.error);

  const workspace = path.resolve(opts.workspace ?? process.cwd());
  const host = opts.host ?? currentHost();

  let config: PlugctlConfig;
  try {
    const loaded = await loadConfig({
      projectFile: opts.config,
      workspace,
      configDir: opts.configDir,
      env: opts.env,
    });
    config = withOverrides(loaded, opts);
  } catch (e: unknown) {
    if (e instanceof ConfigError) return invalid(e.message);
    return invalid(`Failed to load config: ${errorMessage(e)}`);
  }

  const outDir = path.resolve(workspace, config.bundle.out_dir);
  const destinationRoot = resolveInstallRoot(config.install.root, config.bundle.format, host);

  const pipeline = new Pipeline(
    {
      build: (spec) => build(spec, { workspace, toolchain: config.toolchain, platform: host.platform, runner: opts.runner }),
      bundle: (spec) => bundle(spec, { outDir, bundle: config.bundle }),
      install,
      installedPath,
    },
    reporter,
  );

  const result = await pipeline.run({
    build: { profile: opts.profile ?? DEFAULT_PROFILE, target: opts.target },
    productName: args.productName,
    installTarget: { destinationRoot },
  });

  if (result.success) {
    return {
      ok: true,
      artifact: result.artifact,
      bundle: result.bundle,
      installedPath: result.installedPath,
      exitCode: EXIT.SUCCESS,
    };
  }
  return {
    ok: false,
    error: result.error.message,
    stage: result.failedStage,
    exitCode: exitCodeForStage(result.failedStage),
  };
}
