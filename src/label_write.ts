import fs from "fs";
import yaml from "js-yaml";
import { UsbbwError, describeError } from "./errors.js";
import { isRecord, writeText } from "./util.js";

const header = "# usbbw configuration\n";

function readOwnLayer(file: string): Record<string, unknown> {
  if (!fs.existsSync(file)) return {};
  let doc: unknown;
  try {
    doc = yaml.load(fs.readFileSync(file, "utf8"), { filename: file });
  } catch (e) {
    throw new UsbbwError("ConfigParseError", `invalid YAML: ${describeError(e)}`, { file, cause: e });
  }
  if (doc === undefined || doc === null) return {};
  if (!isRecord(doc)) throw new UsbbwError("ConfigParseError", "top level must be a mapping", { file });
  return doc;
}

/**
 * Stores `label` under `products[configKey]` in the given layer, leaving every
 * other key in place. Inherited layers are not read or touched.
 */
export function writeProductLabel(file: string, configKey: string, label: string): void {
  writeProductLabels(file, { [configKey]: label });
}

export function writeProductLabels(file: string, labels: Record<string, string>): void {
  const doc = readOwnLayer(file);
  const current = doc.products;
  let products: Record<string, unknown> = {};
  if (isRecord(current)) {
    products = current;
  } else if (current !== undefined && current !== null) {
    throw new UsbbwError("ConfigParseError", "expected a mapping", { file, key: "products" });
  }
  doc.products = { ...products, ...labels };
  const body = yaml.dump(doc, { lineWidth: -1, quotingType: '"' });
  writeText(file, fs.existsSync(file) ? body : header + body);
}
