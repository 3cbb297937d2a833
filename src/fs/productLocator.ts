import fs from "node:fs";
import path from "node:path";
import type { ProductTypeRegistry } from "../registry/productTypeRegistry";

export function resolveDateFolder(inputPathOrDate: string, inboxRoot: string): string {
  const isDate = /^\d{4}-\d{2}-\d{2}$/.test(inputPathOrDate);
  if (!isDate) {
    return inputPathOrDate;
  }
  return path.join(inboxRoot, inputPathOrDate);
}

export function listCandidateFiles(folder: string): string[] {
  if (!fs.existsSync(folder)) {
    throw new Error(`Folder not found: ${folder}`);
  }
  return fs
    .readdirSync(folder, { withFileTypes: true })
    .filter((entry) => entry.isFile() && !entry.name.startsWith("."))
    .map((entry) => path.join(folder, entry.name))
    .sort();
}

/** Every registered type whose classifier identifies the file on its own. */
export function detectProductTypes(filePath: string, registry: ProductTypeRegistry): string[] {
  return registry.listProductTypes().filter((productType) => {
    const classifier = registry.resolve(productType);
    return classifier !== null && classifier.identify([filePath]);
  });
}

export type LocatedProduct = {
  filePath: string;
  productTypes: string[];
};

export function locateProducts(folder: string, registry: ProductTypeRegistry): {
  recognized: LocatedProduct[];
  unrecognized: string[];
} {
  const recognized: LocatedProduct[] = [];
  const unrecognized: string[] = [];

  for (const filePath of listCandidateFiles(folder)) {
    const productTypes = detectProductTypes(filePath, registry);
    if (productTypes.length) {
      recognized.push({ filePath, productTypes });
    } else {
      unrecognized.push(filePath);
    }
  }

  return { recognized, unrecognized };
}
