import {
  isStandardProductType,
  PRODUCT_TYPE_DEFINITIONS,
  type ProductTypeDefinition,
} from "../registry/productTypes";

type Group = "standard" | "aux";

function usage() {
  console.log("Usage: npm run s5p:types -- [--group standard|aux]");
}

function getArg(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

function parseGroup(value: string | undefined): Group | null | undefined {
  if (value === undefined) return undefined;
  if (value === "standard" || value === "aux") return value;
  return null;
}

function describe(definition: ProductTypeDefinition): string {
  switch (definition.variant) {
    case "standard":
      return `${definition.id}\t${definition.level}\t${definition.fileClass}`;
    case "generic_aux":
      return `${definition.id}\t${definition.category}\t.${definition.extension}`;
    case "legacy_aux":
      return `${definition.id}\t${definition.category}\tNISE_SSMISF18_<date>.HDFEOS`;
  }
}

function main(): void {
  const group = parseGroup(getArg("--group"));
  if (group === null) {
    usage();
    process.exitCode = 1;
    return;
  }

  const selected = PRODUCT_TYPE_DEFINITIONS.filter((definition) => {
    if (!group) return true;
    return group === "standard" ? isStandardProductType(definition) : !isStandardProductType(definition);
  });

  for (const definition of selected) {
    console.log(describe(definition));
  }
  console.log(`${selected.length} product types`);
}

main();
