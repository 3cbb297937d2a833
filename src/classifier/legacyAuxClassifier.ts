import { auxArchivePath } from "../archive/archivePath";
import { getField, parseFilename, productNameOf } from "../grammar/filenameGrammar";
import { LEGACY_AUX_GRAMMAR } from "../grammar/templates";
import { addDaysUtc, parseCompactDate } from "../grammar/timestamps";
import type { LegacyAuxProductType } from "../registry/productTypes";
import { identifySingle, requireSinglePath, requireTimestamp } from "./fields";
import { classifierTraits } from "./traits";
import type { AuxMetadataRecord, MetadataRecord, ProductClassifier } from "./types";

export const LEGACY_AUX_FILE_CLASS = "OPER";

// Daily snow/ice extent files keep their upstream name: one file per day, no creation time.
export function createLegacyAuxClassifier(definition: LegacyAuxProductType): ProductClassifier {
  const grammar = LEGACY_AUX_GRAMMAR;

  const analyze = (paths: readonly string[]): AuxMetadataRecord => {
    const filePath = requireSinglePath(grammar.name, paths);
    const fields = parseFilename(grammar, filePath);
    const value = getField(fields, "date");
    const validityStart = requireTimestamp(parseCompactDate(value), "date", value, {
      grammar: grammar.name,
      filePath,
    });

    return {
      variant: "legacy_aux",
      core: {
        productName: productNameOf(grammar, filePath),
        creationDate: new Date(validityStart.getTime()),
        validityStart,
        validityStop: addDaysUtc(validityStart, 1),
        footprint: null,
      },
      s5p: {
        fileClass: LEGACY_AUX_FILE_CLASS,
        fileType: definition.fileType,
      },
    };
  };

  return {
    ...classifierTraits(definition.id, "legacy_aux"),
    canInspectContents: false,
    identify: (paths) => identifySingle(grammar, paths),
    analyze,
    archivePath: (record: MetadataRecord) =>
      auxArchivePath({ familyCode: definition.fileType, validityStart: record.core.validityStart }),
  };
}
