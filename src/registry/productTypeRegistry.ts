import { createGenericAuxClassifier } from "../classifier/genericAuxClassifier";
import { createLegacyAuxClassifier } from "../classifier/legacyAuxClassifier";
import { createStandardClassifier } from "../classifier/standardClassifier";
import type { ProductClassifier } from "../classifier/types";
import { NO_FOOTPRINT, type FootprintResolver } from "../footprint/footprintResolver";
import {
  getProductTypeDefinition,
  listProductTypes,
  type ProductTypeDefinition,
} from "./productTypes";

export type ProductTypeRegistry = {
  listProductTypes(): string[];
  /** Null for identifiers outside the catalog. */
  resolve(productType: string): ProductClassifier | null;
};

export type ProductTypeRegistryOptions = {
  footprintResolver?: FootprintResolver;
};

export function createClassifier(
  definition: ProductTypeDefinition,
  footprints: FootprintResolver = NO_FOOTPRINT
): ProductClassifier {
  switch (definition.variant) {
    case "standard":
      return createStandardClassifier(definition, footprints);
    case "generic_aux":
      return createGenericAuxClassifier(definition);
    case "legacy_aux":
      return createLegacyAuxClassifier(definition);
    default: {
      const unreachable: never = definition;
      throw new Error(`Unhandled product variant: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function createProductTypeRegistry(options: ProductTypeRegistryOptions = {}): ProductTypeRegistry {
  const footprints = options.footprintResolver ?? NO_FOOTPRINT;
  const classifiers = new Map<string, ProductClassifier>();

  return {
    listProductTypes,
    resolve(productType: string): ProductClassifier | null {
      const cached = classifiers.get(productType);
      if (cached) return cached;

      const definition = getProductTypeDefinition(productType);
      if (!definition) return null;

      const classifier = createClassifier(definition, footprints);
      classifiers.set(productType, classifier);
      return classifier;
    },
  };
}
