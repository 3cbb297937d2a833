import { PRODUCT_HASH_ALGORITHM } from "../hash/contentHash";
import { namespaces } from "../namespace/s5pNamespace";
import type { ProductVariant } from "../registry/productTypes";
import type { ProductClassifier } from "./types";

export type ClassifierTraits = Pick<
  ProductClassifier,
  "productType" | "variant" | "usesEnclosingDirectory" | "usesContentHash" | "hashAlgorithm" | "namespaces"
>;

export function classifierTraits(productType: string, variant: ProductVariant): ClassifierTraits {
  return {
    productType,
    variant,
    usesEnclosingDirectory: false,
    usesContentHash: true,
    hashAlgorithm: PRODUCT_HASH_ALGORITHM,
    namespaces,
  };
}
