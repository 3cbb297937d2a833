import { auxArchivePath } from "../archive/archivePath";
import { getField, parseFilename, productNameOf } from "../grammar/filenameGrammar";
import { auxGrammar } from "../grammar/templates";
import { parseCompactTimestamp, parseValidityStart, parseValidityStop } from "../grammar/timestamps";
import type { GenericAuxProductType } from "../registry/productTypes";
import { identifySingle, requireSinglePath, requireTimestamp } from "./fields";
import { classifierTraits } from "./traits";
import type { AuxMetadataRecord, MetadataRecord, ProductClassifier } from "./types";

/**
 * Auxiliary products (calibration, configuration, lookup tables, reference
 * and dynamic inputs). Validity windows may be open on either side:
 * 00000000T000000 as start and 99999999T999999 as stop.
 * Extension "" builds a grammar without any extension.
 */
export function createGenericAuxClassifier(
  definition: Pick<GenericAuxProductType, "id" | "fileType"> & { extension: string }
): ProductClassifier {
  const grammar = auxGrammar(definition.fileType, definition.extension);

  const analyze = (paths: readonly string[]): AuxMetadataRecord => {
    const filePath = requireSinglePath(grammar.name, paths);
    const fields = parseFilename(grammar, filePath);
    const context = { grammar: grammar.name, filePath };

    const start = getField(fields, "validityStart");
    const stop = getField(fields, "validityStop");
    const created = getField(fields, "creationDate");

    return {
      variant: "generic_aux",
      core: {
        productName: productNameOf(grammar, filePath),
        creationDate: requireTimestamp(parseCompactTimestamp(created), "creationDate", created, context),
        validityStart: requireTimestamp(parseValidityStart(start), "validityStart", start, context),
        validityStop: requireTimestamp(parseValidityStop(stop), "validityStop", stop, context),
        footprint: null,
      },
      s5p: {
        fileClass: getField(fields, "fileClass"),
        fileType: getField(fields, "fileType"),
      },
    };
  };

  return {
    ...classifierTraits(definition.id, "generic_aux"),
    canInspectContents: false,
    identify: (paths) => identifySingle(grammar, paths),
    analyze,
    archivePath: (record: MetadataRecord) =>
      auxArchivePath({ familyCode: definition.fileType, validityStart: record.core.validityStart }),
  };
}
