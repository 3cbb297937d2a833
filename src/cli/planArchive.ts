import path from "node:path";
import { readPluginEnv } from "../config/env";
import { locateProducts, resolveDateFolder } from "../fs/productLocator";
import { loadPlugin } from "../index";
import { footprintCallbacks } from "./footprintLogging";

function usage() {
  console.log("Usage: npm run s5p:plan -- <folder|YYYY-MM-DD>");
}

async function main() {
  const input = process.argv[2];
  if (!input || input.startsWith("--")) {
    usage();
    process.exitCode = 1;
    return;
  }

  const env = readPluginEnv();
  // Archive layout only depends on filenames.
  const registry = await loadPlugin({ ...footprintCallbacks(env), extractFootprint: false });
  const folder = resolveDateFolder(input, env.inboxRoot);
  const { recognized, unrecognized } = locateProducts(folder, registry);

  console.log(`Scanning ${folder}`);
  let failures = 0;
  for (const item of recognized) {
    const [productType] = item.productTypes;
    const classifier = registry.resolve(productType);
    if (!classifier) continue;
    const name = path.basename(item.filePath);
    try {
      const record = classifier.analyze([item.filePath], false);
      const target = path.join(env.archiveRoot, classifier.archivePath(record), name);
      console.log(`${productType}\t${name}\t-> ${target}`);
    } catch (error) {
      failures += 1;
      const message = error instanceof Error ? error.message : String(error);
      console.error(`${productType}\t${name}\tFAILED: ${message}`);
    }
  }

  if (unrecognized.length) {
    console.warn(`Unrecognized files (${unrecognized.length}):`);
    console.warn(unrecognized.map((filePath) => path.basename(filePath)));
  }
  console.log(`OK ${recognized.length - failures} planned, ${failures} failed, ${unrecognized.length} unrecognized.`);
  if (failures) process.exitCode = 1;
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
