import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { PlugctlConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

const CONFIG_DIR = fileURLToPath(new URL("../../config", import.meta.url));

export const PROJECT_CONFIG_FILE = "plugctl.yaml";
export const ENV_PREFIX = "PLUGCTL_";

type ConfigObject = Record<string, unknown>;

function isObject(value: unknown): value is ConfigObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigObject, override: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isObject(val)) {
      result[key] = deepMerge(isObject(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed mapping, or an empty object if not found. */
function loadYaml(filePath: string): ConfigObject {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isObject(parsed)) {
    throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * Apply PLUGCTL_ prefixed environment variable overrides.
 * `__` separates nesting levels: PLUGCTL_BUNDLE__OUT_DIR → bundle.out_dir
 */
export function applyEnvOverrides(config: ConfigObject, env: NodeJS.ProcessEnv = process.env): ConfigObject {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const keyPath = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((k) => k.length > 0);
    if (keyPath.length === 0) continue;

    let override: ConfigObject = {};
    const leaf = keyPath[keyPath.length - 1];
    override[leaf] = value;
    for (const segment of keyPath.slice(0, -1).reverse()) {
      override = { [segment]: override };
    }
    result = deepMerge(result, override);
  }
  return result;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type LoadConfigOptions = {
  /** Project config file; defaults to plugctl.yaml in the workspace when present. */
  projectFile?: string;
  workspace?: string;
  /** Directory holding base.yaml. */
  configDir?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load layered config: base.yaml ← project file ← environment variables,
 * then validate it.
 * @throws ConfigError when a layer is unreadable or the merged config is invalid
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<PlugctlConfig> {
  const dir = opts.configDir ?? CONFIG_DIR;

  // Layer 1: base.yaml
  let merged = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: project file
  if (opts.projectFile) {
    const projectPath = path.resolve(opts.workspace ?? process.cwd(), opts.projectFile);
    if (!fs.existsSync(projectPath)) {
      throw new ConfigError(`Config file not found: ${projectPath}`);
    }
    merged = deepMerge(merged, loadYaml(projectPath));
  } else if (opts.workspace) {
    merged = deepMerge(merged, loadYaml(path.join(opts.workspace, PROJECT_CONFIG_FILE)));
  }

  // Layer 3: environment variables
  merged = applyEnvOverrides(merged, opts.env ?? process.env);

  const res = await validateConfig(merged);
  if (!res.valid) {
    throw new ConfigError(`Invalid config: ${res.errors}`);
  }
  return res.config;
}
