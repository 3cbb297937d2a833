import path from "node:path";
import { readPluginEnv } from "../config/env";
import { polygonToWkt } from "../footprint/geometry";
import { detectProductTypes } from "../fs/productLocator";
import { formatValidityInstant } from "../grammar/timestamps";
import { formatContentHash, hashFile } from "../hash/contentHash";
import { loadPlugin } from "../index";
import { toNamespaceProperties } from "../namespace/s5pNamespace";
import { footprintCallbacks } from "./footprintLogging";

function usage() {
  console.log("Usage: npm run s5p:analyze -- <product-file> [--type <product-type>] [--no-footprint]");
}

function getArg(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

async function main() {
  const inputPath = process.argv[2];
  if (!inputPath || inputPath.startsWith("--")) {
    usage();
    process.exitCode = 1;
    return;
  }

  const env = readPluginEnv();
  const inspectContents = env.extractFootprint && !process.argv.includes("--no-footprint");
  const registry = await loadPlugin({ ...footprintCallbacks(env), extractFootprint: inspectContents });
  const filePath = path.resolve(process.cwd(), inputPath);

  const explicitType = getArg("--type");
  const candidates = explicitType ? [explicitType] : detectProductTypes(filePath, registry);
  if (!candidates.length) {
    throw new Error(`No registered product type identifies ${path.basename(filePath)}`);
  }
  if (candidates.length > 1) {
    console.warn(`Multiple product types identify this file, using the first: ${candidates.join(", ")}`);
  }

  const productType = candidates[0];
  const classifier = registry.resolve(productType);
  if (!classifier) {
    throw new Error(`Unknown product type: ${productType}`);
  }
  if (!classifier.identify([filePath])) {
    throw new Error(`${path.basename(filePath)} is not a ${productType} product`);
  }

  const record = classifier.analyze([filePath], inspectContents);
  const digest = hashFile(filePath, classifier.hashAlgorithm);

  console.log(`Product type: ${productType} (${classifier.variant})`);
  console.log({
    productName: record.core.productName,
    creationDate: record.core.creationDate.toISOString(),
    validityStart: formatValidityInstant(record.core.validityStart),
    validityStop: formatValidityInstant(record.core.validityStop),
    footprint: record.core.footprint ? polygonToWkt(record.core.footprint) : null,
  });
  console.log({ s5p: toNamespaceProperties(record) });
  console.log(`Hash: ${formatContentHash(classifier.hashAlgorithm, digest)}`);
  console.log(`Archive path: ${classifier.archivePath(record)}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
