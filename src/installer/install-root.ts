import os from "node:os";
import path from "node:path";
import { expandHome } from "../core/path-safety.js";
import type { BundleFormatName } from "../types/config.js";

export type HostInfo = {
  platform: NodeJS.Platform;
  homeDir: string;
  env: NodeJS.ProcessEnv;
};

export function currentHost(): HostInfo {
  return { platform: process.platform, homeDir: os.homedir(), env: process.env };
}

const MACOS_DIRS: Record<BundleFormatName, string> = {
  vst: "VST",
  clap: "CLAP",
  bundle: "Bundles",
};

const UNIX_DIRS: Record<BundleFormatName, string[]> = {
  vst: [".vst"],
  clap: [".clap"],
  bundle: [".local", "share", "plugins"],
};

/** Conventional per-user (or shared, on Windows) plugin directory for a format. */
export function defaultInstallRoot(format: BundleFormatName, host: HostInfo): string {
  switch (host.platform) {
    case "darwin":
      return path.posix.join(host.homeDir, "Library", "Audio", "Plug-Ins", MACOS_DIRS[format]);
    case "win32": {
      const common = host.env.COMMONPROGRAMFILES ?? "C:\\Program Files\\Common Files";
      const local = host.env.LOCALAPPDATA ?? path.win32.join(host.homeDir, "AppData", "Local");
      if (format === "vst") return path.win32.join(common, "VST2");
      if (format === "clap") return path.win32.join(common, "CLAP");
      return path.win32.join(local, "Plugins");
    }
    default:
      return path.posix.join(host.homeDir, ...UNIX_DIRS[format]);
  }
}

/** Explicit root (CLI or config) wins over the platform convention. */
export function resolveInstallRoot(
  explicit: string | undefined,
  format: BundleFormatName,
  host: HostInfo = currentHost(),
): string {
  if (explicit) return path.resolve(expandHome(explicit, host.homeDir));
  return defaultInstallRoot(format, host);
}
