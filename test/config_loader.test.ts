import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { applyEnvOverrides, deepMerge, loadConfig, ConfigError } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";

const CONFIG_DIR = fileURLToPath(new URL("../config", import.meta.url));

describe("config loader", () => {
  let ws: string;

  beforeEach(() => {
    ws = fs.mkdtempSync(path.join(os.tmpdir(), "plugctl-config-"));
  });

  afterEach(() => {
    fs.rmSync(ws, { recursive: true, force: true });
  });

  it("loads base config with all required fields", async () => {
    const config = await loadConfig({ configDir: CONFIG_DIR, env: {} });
    expect(config.schema_version).toBe("1.0.0");
    expect(config.toolchain.command).toBe("cargo");
    expect(config.toolchain.args).toEqual(["build", "--profile", "{profile}", "-p", "{target}"]);
    expect(config.toolchain.packages).toEqual([]);
    expect(config.bundle.format).toBe("bundle");
    expect(config.bundle.out_dir).toBe("tmp");
    expect(config.install.root).toBeUndefined();
  });

  it("merges plugctl.yaml from the workspace over base", async () => {
    fs.writeFileSync(
      path.join(ws, "plugctl.yaml"),
      "toolchain:\n  library_name: octasine\n  packages: [\"octasine-*-plugin\"]\nbundle:\n  format: vst\n",
      "utf8",
    );
    const config = await loadConfig({ configDir: CONFIG_DIR, workspace: ws, env: {} });
    expect(config.toolchain.library_name).toBe("octasine");
    expect(config.toolchain.packages).toEqual(["octasine-*-plugin"]);
    expect(config.bundle.format).toBe("vst");
    // base fields still present
    expect(config.toolchain.command).toBe("cargo");
    expect(config.bundle.identifier_prefix).toBe("com.plugctl");
  });

  it("reads an explicit project file relative to the workspace", async () => {
    fs.mkdirSync(path.join(ws, "conf"));
    fs.writeFileSync(path.join(ws, "conf", "mac.yaml"), "install:\n  root: /Library/Audio/Plug-Ins/VST\n", "utf8");
    const config = await loadConfig({ configDir: CONFIG_DIR, workspace: ws, projectFile: "conf/mac.yaml", env: {} });
    expect(config.install.root).toBe("/Library/Audio/Plug-Ins/VST");
  });

  it("fails when an explicit project file is missing", async () => {
    await expect(
      loadConfig({ configDir: CONFIG_DIR, workspace: ws, projectFile: "nope.yaml", env: {} }),
    ).rejects.toThrow(ConfigError);
  });

  it("applies environment variable overrides over the project file", async () => {
    fs.writeFileSync(path.join(ws, "plugctl.yaml"), "bundle:\n  format: vst\n", "utf8");
    const config = await loadConfig({
      configDir: CONFIG_DIR,
      workspace: ws,
      env: { PLUGCTL_BUNDLE__FORMAT: "clap", PLUGCTL_TOOLCHAIN__TARGET_DIR: "build/target", HOME: "/home/dev" },
    });
    expect(config.bundle.format).toBe("clap");
    expect(config.toolchain.target_dir).toBe("build/target");
  });

  it("rejects an invalid merged config", async () => {
    await expect(
      loadConfig({ configDir: CONFIG_DIR, env: { PLUGCTL_BUNDLE__FORMAT: "vst3" } }),
    ).rejects.toThrow(/Invalid config/);
  });

  it("rejects a project file that is not a mapping", async () => {
    fs.writeFileSync(path.join(ws, "plugctl.yaml"), "- just\n- a list\n", "utf8");
    await expect(loadConfig({ configDir: CONFIG_DIR, workspace: ws, env: {} })).rejects.toThrow(
      /must contain a mapping/,
    );
  });
});

describe("merging", () => {
  it("replaces arrays and merges nested objects", () => {
    const merged = deepMerge(
      { toolchain: { command: "cargo", args: ["build"] }, bundle: { format: "bundle" } },
      { toolchain: { args: ["xtask", "bundle"] } },
    );
    expect(merged).toEqual({
      toolchain: { command: "cargo", args: ["xtask", "bundle"] },
      bundle: { format: "bundle" },
    });
  });

  it("maps double underscores to nested keys", () => {
    const merged = applyEnvOverrides(
      { install: {} },
      { PLUGCTL_INSTALL__ROOT: "/opt/plugins", PLUGCTL_SCHEMA_VERSION: "2.0.0", OTHER: "x" },
    );
    expect(merged).toEqual({ install: { root: "/opt/plugins" }, schema_version: "2.0.0" });
  });
});

describe("config validator", () => {
  it("validates the shipped base config", async () => {
    const config = await loadConfig({ configDir: CONFIG_DIR, env: {} });
    const res = await validateConfig(config);
    expect(res.valid).toBe(true);
  });

  it("rejects config missing required fields", async () => {
    const res = await validateConfig({ schema_version: "1.0.0" });
    expect(res.valid).toBe(false);
    if (res.valid) return;
    expect(res.errors).toContain("must have required property 'toolchain'");
  });

  it("rejects an identifier prefix that is not a hostname", async () => {
    const config = await loadConfig({ configDir: CONFIG_DIR, env: {} });
    const res = await validateConfig({ ...config, bundle: { ...config.bundle, identifier_prefix: "not a host!" } });
    expect(res.valid).toBe(false);
    if (res.valid) return;
    expect(res.errors).toContain("identifier_prefix");
  });
});
