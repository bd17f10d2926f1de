import fs from "node:fs";
import path from "node:path";
import { InstallFailedError, errorMessage, osErrorCode } from "../core/errors.js";
import type { Bundle, InstallTarget } from "../types/pipeline.js";

/** Where `bundle` ends up under `target`. */
export function installedPath(bundle: Bundle, target: InstallTarget): string {
  return path.join(path.resolve(target.destinationRoot), path.basename(bundle.rootPath));
}

/** Whether `child` is `parent` or lies somewhere beneath it. */
function isWithin(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/**
 * Installer: copy the bundle directory into the destination root, replacing a
 * previously installed bundle of the same name. Nothing is rolled back if the
 * copy fails part way; re-running repairs the destination.
 *
 * A bundle that already sits at its installed path is left as it is.
 */
export function install(bundle: Bundle, target: InstallTarget): void {
  const source = path.resolve(bundle.rootPath);
  const dest = installedPath(bundle, target);

  let isDir = false;
  try {
    isDir = fs.statSync(source).isDirectory();
  } catch (e: unknown) {
    throw new InstallFailedError(`Bundle not found: ${source}`, { path: source, osCode: osErrorCode(e), cause: e });
  }
  if (!isDir) {
    throw new InstallFailedError(`Bundle is not a directory: ${source}`, { path: source, osCode: "ENOTDIR" });
  }

  if (dest === source) return;
  if (isWithin(dest, source) || isWithin(source, dest)) {
    throw new InstallFailedError(`Cannot install ${source} into ${path.dirname(dest)}: the paths overlap`, {
      path: dest,
    });
  }

  try {
    fs.mkdirSync(path.dirname(dest), { recursive: true });
    fs.rmSync(dest, { recursive: true, force: true });
    fs.cpSync(source, dest, { recursive: true, preserveTimestamps: true });
  } catch (e: unknown) {
    throw new InstallFailedError(`Failed to install ${path.basename(source)} into ${path.dirname(dest)}: ${errorMessage(e)}`, {
      path: dest,
      osCode: osErrorCode(e),
      cause: e,
    });
  }
}
