import os from "node:os";
import path from "node:path";

/**
 * Validate a name that becomes a single path component (bundle directory,
 * binary file name).
 * @throws Error if the component is empty or could escape its parent directory
 */
export function sanitizePathComponent(component: string): string {
  if (!component || component.trim().length === 0) {
    throw new Error("Path component cannot be empty");
  }

  const trimmed = component.trim();

  if (
    component.includes("..") ||
    component.includes("/") ||
    component.includes("\\") ||
    component.includes("\0") ||
    trimmed === "."
  ) {
    throw new Error(`Invalid path component: ${component}`);
  }

  return trimmed;
}

/** Expand a leading `~` to the given home directory. */
export function expandHome(p: string, homeDir: string = os.homedir()): string {
  if (p === "~") return homeDir;
  if (p.startsWith("~/") || p.startsWith("~\\")) return path.join(homeDir, p.slice(2));
  return p;
}
