import { XMLBuilder } from "fast-xml-parser";

export type PlistValue = string | boolean;

/** Ordered key/value pairs of a top-level plist `<dict>`. */
export type PlistEntries = Array<[key: string, value: PlistValue]>;

const PLIST_HEADER =
  '<?xml version="1.0" encoding="UTF-8"?>\n' +
  '<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">\n';

type OrderedNode = { [tag: string]: OrderedNode[] | string | Record<string, string> };

function valueNode(value: PlistValue): OrderedNode {
  if (typeof value === "boolean") return { [value ? "true" : "false"]: [] };
  return { string: [{ "#text": value }] };
}

/**
 * Serialize entries as an XML property list. Key order is preserved, which
 * fast-xml-parser only guarantees in `preserveOrder` mode.
 */
export function buildPlist(entries: PlistEntries): string {
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    indentBy: "\t",
    suppressEmptyNode: true,
  });

  const dict: OrderedNode[] = [];
  for (const [key, value] of entries) {
    dict.push({ key: [{ "#text": key }] });
    dict.push(valueNode(value));
  }

  const doc: OrderedNode[] = [{ plist: [{ dict }], ":@": { "@_version": "1.0" } }];
  const body: string = builder.build(doc);
  return PLIST_HEADER + body.trimStart();
}

export type BundleInfo = {
  productName: string;
  identifier: string;
  version: string;
  packageType: string;
  signature: string;
  info: string;
};

/** Info.plist entries for a loadable plugin bundle. */
export function bundleInfoEntries(info: BundleInfo): PlistEntries {
  return [
    ["CFBundleDevelopmentRegion", "English"],
    ["CFBundleExecutable", info.productName],
    ["CFBundleGetInfoString", info.info || `${info.productName} ${info.version}`],
    ["CFBundleIconFile", ""],
    ["CFBundleIdentifier", info.identifier],
    ["CFBundleInfoDictionaryVersion", "6.0"],
    ["CFBundleName", info.productName],
    ["CFBundlePackageType", info.packageType],
    ["CFBundleSignature", info.signature],
    ["CFBundleShortVersionString", info.version],
    ["CFBundleVersion", info.version],
    ["CSResourcesFileMapped", true],
  ];
}
