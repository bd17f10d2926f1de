#!/usr/bin/env node

import { Command, CommanderError, Option } from "commander";
import { DEFAULT_PROFILE, ship } from "./commands/ship.js";
import { EXIT } from "./commands/exit-codes.js";
import { BUNDLE_FORMAT_NAMES } from "./bundler/formats.js";

type CliOpts = {
  target: string;
  productName: string;
  profile: string;
  installRoot?: string;
  library?: string;
  bundleFormat?: string;
  outDir?: string;
  workspace?: string;
  config?: string;
  format: "human" | "jsonl";
};

const program = new Command();

program
  .name("plugctl")
  .description("Build a plugin package, bundle it and install the bundle")
  .version("0.1.0")
  .requiredOption("--target <package>", "Workspace package to build")
  .requiredOption("--product-name <name>", "Product name used for the bundle and binary")
  .option("--profile <name>", "Toolchain build profile", DEFAULT_PROFILE)
  .option("--install-root <path>", "Plugin directory to install into (default: platform convention)")
  .option("--library <name>", "Library name of the built artifact (default: target with - replaced by _)")
  .addOption(new Option("--bundle-format <format>", "Bundle layout").choices([...BUNDLE_FORMAT_NAMES]))
  .option("--out-dir <path>", "Directory the bundle is created in, relative to the workspace")
  .option("--workspace <path>", "Workspace root (default: current directory)")
  .option("--config <file>", "Project config file (default: plugctl.yaml in the workspace)")
  .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"))
  .exitOverride()
  .action(async (opts: CliOpts) => {
    const res = await ship(opts);
    process.exitCode = res.exitCode;
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CommanderError) {
    // commander already printed usage or the parse error
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  }
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ level: "error", code: "UNEXPECTED", message }) + "\n");
  process.exit(EXIT.INVALID_ARGS);
});
