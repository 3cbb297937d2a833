import { standardArchivePath } from "../archive/archivePath";
import type { FootprintResolver } from "../footprint/footprintResolver";
import { getField, parseFilename, productNameOf } from "../grammar/filenameGrammar";
import { standardGrammar } from "../grammar/templates";
import { parseCompactTimestamp } from "../grammar/timestamps";
import type { StandardProductType } from "../registry/productTypes";
import { identifySingle, parseIntegerField, requireSinglePath, requireTimestamp } from "./fields";
import { classifierTraits } from "./traits";
import type { MetadataRecord, ProductClassifier, StandardMetadataRecord } from "./types";

export function createStandardClassifier(
  definition: StandardProductType,
  footprints: FootprintResolver
): ProductClassifier {
  const grammar = standardGrammar(definition.fileType, definition.fileClass);

  const analyze = (paths: readonly string[], inspectContents = true): StandardMetadataRecord => {
    const filePath = requireSinglePath(grammar.name, paths);
    const fields = parseFilename(grammar, filePath);
    const context = { grammar: grammar.name, filePath };

    const timestamp = (name: "validityStart" | "validityStop" | "creationDate"): Date => {
      const value = getField(fields, name);
      return requireTimestamp(parseCompactTimestamp(value), name, value, context);
    };
    const integer = (name: "orbit" | "collection" | "processorVersion"): number =>
      parseIntegerField(getField(fields, name), name, context);

    return {
      variant: "standard",
      core: {
        productName: productNameOf(grammar, filePath),
        creationDate: timestamp("creationDate"),
        validityStart: timestamp("validityStart"),
        validityStop: timestamp("validityStop"),
        footprint: inspectContents ? footprints.resolve(filePath) : null,
      },
      s5p: {
        fileClass: getField(fields, "fileClass"),
        fileType: getField(fields, "fileType"),
        orbit: integer("orbit"),
        collection: integer("collection"),
        processorVersion: integer("processorVersion"),
      },
    };
  };

  return {
    ...classifierTraits(definition.id, "standard"),
    canInspectContents: footprints.available,
    identify: (paths) => identifySingle(grammar, paths),
    analyze,
    archivePath: (record: MetadataRecord) => standardArchivePath(record),
  };
}
