/** Configuration types: layered config system. */
export type BundleFormatName = "vst" | "clap" | "bundle";

export type ToolchainConfig = {
  command: string;
  /** Argument templates; `{profile}` and `{target}` are substituted. */
  args: string[];
  target_dir: string;
  library_name?: string;
  /** Glob patterns naming buildable workspace packages. Empty accepts any target. */
  packages: string[];
};

export type BundleConfig = {
  format: BundleFormatName;
  out_dir: string;
  identifier_prefix: string;
  version: string;
  info: string;
};

export type InstallConfig = {
  root?: string;
};

export type PlugctlConfig = {
  schema_version: string;
  toolchain: ToolchainConfig;
  bundle: BundleConfig;
  install: InstallConfig;
};
