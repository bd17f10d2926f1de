import fs, { type Stats } from "node:fs";
import path from "node:path";
import {
  BundleWriteFailedError,
  MissingArtifactError,
  errorMessage,
  osErrorCode,
} from "../core/errors.js";
import { sanitizePathComponent } from "../core/path-safety.js";
import type { BundleConfig } from "../types/config.js";
import type { Bundle, BundleSpec } from "../types/pipeline.js";
import { BUNDLE_FORMATS, binaryRelativePath, bundleDirName, type BundleFormat } from "./formats.js";
import { buildPlist, bundleInfoEntries } from "./plist.js";

export const PACKAGE_TYPE = "BNDL";
export const SIGNATURE = "????";

export type BundleOptions = {
  /** Directory the bundle is created in. */
  outDir: string;
  bundle: BundleConfig;
};

/**
 * Bundler: lay out a plugin bundle for `spec.sourceArtifact` and return where
 * it landed. The bundle is assembled in a staging directory next to its final
 * location and swapped in, so an existing bundle is replaced whole.
 */
export function bundle(spec: BundleSpec, opts: BundleOptions): Bundle {
  const format = BUNDLE_FORMATS[opts.bundle.format];

  let productName: string;
  try {
    productName = sanitizePathComponent(spec.productName);
  } catch (e: unknown) {
    throw new BundleWriteFailedError(`Invalid product name: ${errorMessage(e)}`, { cause: e });
  }

  assertArtifact(spec.sourceArtifact.path);

  const outDir = path.resolve(opts.outDir);
  const rootPath = path.join(outDir, bundleDirName(productName, format));
  const stagingPath = `${rootPath}.staging-${process.pid}`;

  let step = "create bundle directory";
  let stepPath = stagingPath;
  let staged = false;
  try {
    fs.mkdirSync(outDir, { recursive: true });
    staged = true;
    fs.rmSync(stagingPath, { recursive: true, force: true });
    writeLayout(stagingPath, productName, format, opts.bundle, spec.sourceArtifact.path, (s, p) => {
      step = s;
      stepPath = p;
    });

    step = "replace bundle";
    stepPath = rootPath;
    fs.rmSync(rootPath, { recursive: true, force: true });
    fs.renameSync(stagingPath, rootPath);
  } catch (e: unknown) {
    const leftover = staged ? discardStaging(stagingPath) : null;
    const suffix = leftover ? ` (staging directory left at ${stagingPath}: ${leftover})` : "";
    throw new BundleWriteFailedError(`Failed to ${step}: ${errorMessage(e)}${suffix}`, {
      path: stepPath,
      osCode: osErrorCode(e),
      cause: e,
    });
  }

  return {
    rootPath,
    binaryPath: path.join(rootPath, ...binaryRelativePath(productName, format)),
  };
}

/** Remove the staging directory; returns why it could not be removed, or null. */
function discardStaging(stagingPath: string): string | null {
  try {
    fs.rmSync(stagingPath, { recursive: true, force: true });
    return null;
  } catch (e: unknown) {
    return errorMessage(e);
  }
}

function assertArtifact(artifactPath: string): void {
  let stat: Stats;
  try {
    stat = fs.statSync(artifactPath);
  } catch (e: unknown) {
    throw new MissingArtifactError("bundle", artifactPath, { osCode: osErrorCode(e), cause: e });
  }
  if (!stat.isFile()) {
    throw new MissingArtifactError("bundle", artifactPath);
  }
}

function writeLayout(
  root: string,
  productName: string,
  format: BundleFormat,
  config: BundleConfig,
  artifactPath: string,
  track: (step: string, p: string) => void,
): void {
  const metadataDir = path.join(root, ...format.metadataDir);
  const binaryDir = path.join(root, ...format.binaryDir);

  track("create bundle directory", binaryDir);
  fs.mkdirSync(metadataDir, { recursive: true });
  fs.mkdirSync(binaryDir, { recursive: true });

  const plistPath = path.join(metadataDir, "Info.plist");
  track("write Info.plist", plistPath);
  const plist = buildPlist(
    bundleInfoEntries({
      productName,
      identifier: `${config.identifier_prefix}.${productName}`,
      version: config.version,
      packageType: PACKAGE_TYPE,
      signature: SIGNATURE,
      info: config.info,
    }),
  );
  fs.writeFileSync(plistPath, plist, "utf8");

  if (format.writePkgInfo) {
    const pkgInfoPath = path.join(metadataDir, "PkgInfo");
    track("write PkgInfo", pkgInfoPath);
    fs.writeFileSync(pkgInfoPath, `${PACKAGE_TYPE}${SIGNATURE}`, "utf8");
  }

  const binaryPath = path.join(binaryDir, productName);
  track("copy binary", binaryPath);
  fs.copyFileSync(artifactPath, binaryPath);
  fs.chmodSync(binaryPath, 0o755);
}
