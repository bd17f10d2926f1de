import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { PlugctlConfig } from "../types/config.js";

type ConfigValidateFn = ((data: unknown) => data is PlugctlConfig) & { errors?: unknown };

type ConfigAjv = {
  compile: (schema: unknown) => ConfigValidateFn;
  errorsText: (errors: unknown) => string;
};

let compiled: { ajv: ConfigAjv; validate: ConfigValidateFn } | null = null;

/** Ajv (draft 2020-12, with formats) compiled once against CONFIG_SCHEMA. */
function configValidator(): { ajv: ConfigAjv; validate: ConfigValidateFn } {
  if (compiled) return compiled;
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): ConfigAjv };
  const add = addFormats as unknown as (ajv: ConfigAjv) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);
  compiled = { ajv, validate: ajv.compile(CONFIG_SCHEMA) };
  return compiled;
}

/** Config schema; every section is required after the base layer is merged in. */
export const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "toolchain", "bundle", "install"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    toolchain: {
      type: "object",
      required: ["command", "args", "target_dir", "packages"],
      properties: {
        command: { type: "string", minLength: 1 },
        args: { type: "array", items: { type: "string" } },
        target_dir: { type: "string", minLength: 1 },
        library_name: { type: "string", minLength: 1 },
        packages: { type: "array", items: { type: "string", minLength: 1 } },
      },
    },
    bundle: {
      type: "object",
      required: ["format", "out_dir", "identifier_prefix", "version", "info"],
      properties: {
        format: { type: "string", enum: ["vst", "clap", "bundle"] },
        out_dir: { type: "string", minLength: 1 },
        identifier_prefix: { type: "string", format: "hostname" },
        version: { type: "string", minLength: 1 },
        info: { type: "string" },
      },
    },
    install: {
      type: "object",
      properties: {
        root: { type: "string", minLength: 1 },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: PlugctlConfig }
  | { valid: false; errors: string };

/** Validate a merged config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const { ajv, validate } = configValidator();
  if (validate(config)) {
    return { valid: true, config };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
