import type { BundleFormatName } from "../types/config.js";

export type BundleFormat = {
  name: BundleFormatName;
  /** Bundle directory suffix, e.g. ".vst". */
  extension: string;
  /** Directory holding the binary, relative to the bundle root. */
  binaryDir: string[];
  /** Directory holding Info.plist and PkgInfo, relative to the bundle root. */
  metadataDir: string[];
  writePkgInfo: boolean;
};

export const BUNDLE_FORMATS: Record<BundleFormatName, BundleFormat> = {
  vst: {
    name: "vst",
    extension: ".vst",
    binaryDir: ["Contents", "MacOS"],
    metadataDir: ["Contents"],
    writePkgInfo: true,
  },
  clap: {
    name: "clap",
    extension: ".clap",
    binaryDir: ["Contents", "MacOS"],
    metadataDir: ["Contents"],
    writePkgInfo: true,
  },
  bundle: {
    name: "bundle",
    extension: ".bundle",
    binaryDir: ["Contents"],
    metadataDir: ["Contents"],
    writePkgInfo: false,
  },
};

export const BUNDLE_FORMAT_NAMES: readonly BundleFormatName[] = ["vst", "clap", "bundle"];

export function isBundleFormatName(value: string): value is BundleFormatName {
  return Object.hasOwn(BUNDLE_FORMATS, value);
}

export function bundleDirName(productName: string, format: BundleFormat): string {
  return `${productName}${format.extension}`;
}

/** Path segments of the binary inside a bundle, e.g. `Contents/MacOS/Demo`. */
export function binaryRelativePath(productName: string, format: BundleFormat): string[] {
  return [...format.binaryDir, productName];
}
