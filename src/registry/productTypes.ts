import catalogJson from "./productCatalog.json";
import { MISSION_PREFIX } from "../grammar/templates";

export const AUX_CATEGORIES = [
  "calibration",
  "configuration",
  "lookupTable",
  "reference",
  "dynamic",
] as const;

export type AuxCategory = (typeof AUX_CATEGORIES)[number];

export type ProductLevel = "L1B" | "L2";

export type StandardProductType = {
  variant: "standard";
  id: string;
  level: ProductLevel;
  fileType: string;
  fileClass: string;
};

export type GenericAuxProductType = {
  variant: "generic_aux";
  id: string;
  category: AuxCategory;
  fileType: string;
  extension: "nc" | "cfg";
};

export type LegacyAuxProductType = {
  variant: "legacy_aux";
  id: string;
  category: AuxCategory;
  fileType: string;
};

export type ProductTypeDefinition =
  | StandardProductType
  | GenericAuxProductType
  | LegacyAuxProductType;

export type ProductVariant = ProductTypeDefinition["variant"];

export type ProductCatalogSource = {
  fileClasses: string[];
  level1: string[];
  level2: string[];
  excludedCombinations: { fileType: string; fileClass: string }[];
  auxiliary: Record<AuxCategory, string[]>;
};

export const LEGACY_SNOW_ICE_FILE_TYPE = "AUX_NISE__";
export const LEGACY_SNOW_ICE_PRODUCT_TYPE = `${MISSION_PREFIX}_${LEGACY_SNOW_ICE_FILE_TYPE}`;
export const CONFIGURATION_PREFIX = "CFG_";

const FAMILY_CODE = /^[A-Z0-9_]{10}$/;
const FILE_CLASS = /^[A-Z]{4}$/;

function assertFamilyCode(code: string, group: string): void {
  if (!FAMILY_CODE.test(code)) {
    throw new Error(`Invalid ${group} family code '${code}': expected 10 characters of [A-Z0-9_]`);
  }
}

export function standardProductTypeId(fileType: string, fileClass: string): string {
  return `${MISSION_PREFIX}_${fileType}_${fileClass}`;
}

export function auxProductTypeId(fileType: string): string {
  return `${MISSION_PREFIX}_${fileType}`;
}

export function buildProductCatalog(source: ProductCatalogSource): ProductTypeDefinition[] {
  for (const fileClass of source.fileClasses) {
    if (!FILE_CLASS.test(fileClass)) {
      throw new Error(`Invalid file class '${fileClass}': expected 4 characters of [A-Z]`);
    }
  }

  const excluded = new Set(
    source.excludedCombinations.map((entry) => standardProductTypeId(entry.fileType, entry.fileClass))
  );
  const definitions: ProductTypeDefinition[] = [];

  const addStandard = (level: ProductLevel, codes: string[]) => {
    for (const fileType of codes) {
      assertFamilyCode(fileType, level);
      for (const fileClass of source.fileClasses) {
        const id = standardProductTypeId(fileType, fileClass);
        if (excluded.has(id)) continue;
        definitions.push({ variant: "standard", id, level, fileType, fileClass });
      }
    }
  };

  addStandard("L1B", source.level1);
  addStandard("L2", source.level2);

  for (const category of AUX_CATEGORIES) {
    for (const fileType of source.auxiliary[category]) {
      assertFamilyCode(fileType, category);
      const id = auxProductTypeId(fileType);
      if (id === LEGACY_SNOW_ICE_PRODUCT_TYPE) {
        definitions.push({ variant: "legacy_aux", id, category, fileType });
        continue;
      }
      const extension = fileType.startsWith(CONFIGURATION_PREFIX) ? "cfg" : "nc";
      definitions.push({ variant: "generic_aux", id, category, fileType, extension });
    }
  }

  const seen = new Set<string>();
  for (const definition of definitions) {
    if (seen.has(definition.id)) {
      throw new Error(`Duplicate product type '${definition.id}' in catalog`);
    }
    seen.add(definition.id);
  }

  return definitions;
}

export const PRODUCT_TYPE_DEFINITIONS: readonly ProductTypeDefinition[] = buildProductCatalog(catalogJson);

const DEFINITIONS_BY_ID = new Map(PRODUCT_TYPE_DEFINITIONS.map((definition) => [definition.id, definition] as const));

export function listProductTypes(): string[] {
  return PRODUCT_TYPE_DEFINITIONS.map((definition) => definition.id);
}

export function getProductTypeDefinition(id: string): ProductTypeDefinition | null {
  return DEFINITIONS_BY_ID.get(id) ?? null;
}

export const isStandardProductType = (definition: ProductTypeDefinition): definition is StandardProductType =>
  definition.variant === "standard";
