import fs from "node:fs";
import crypto from "node:crypto";
import type { HashAlgorithm } from "../classifier/types";

export const PRODUCT_HASH_ALGORITHM: HashAlgorithm = "md5";

export function hashFile(filePath: string, algorithm: HashAlgorithm = PRODUCT_HASH_ALGORITHM): string {
  const data = fs.readFileSync(filePath);
  return crypto.createHash(algorithm).update(data).digest("hex");
}

/** `<algorithm>:<hex>`, the form archive catalogues store. */
export function formatContentHash(algorithm: HashAlgorithm, digest: string): string {
  return `${algorithm}:${digest}`;
}
