import { defineGrammar, field, fixedField, literal, type FilenameGrammar } from "./filenameGrammar";

// Naming convention of the Sentinel-5P ground segment:
// S5P_<class>_<type>_<start>_<stop>[_<orbit>_<collection>_<processor>]_<created>.<ext>

export type StandardField =
  | "fileClass"
  | "fileType"
  | "validityStart"
  | "validityStop"
  | "orbit"
  | "collection"
  | "processorVersion"
  | "creationDate";

export type AuxField = "fileClass" | "fileType" | "validityStart" | "validityStop" | "creationDate";

export type LegacyAuxField = "date";

export const MISSION_PREFIX = "S5P";
const TIMESTAMP = "[\\dT]{15}";

export function standardGrammar(fileType: string, fileClass: string): FilenameGrammar<StandardField> {
  return defineGrammar<StandardField>({
    name: `${MISSION_PREFIX}_${fileType}_${fileClass}`,
    slots: [
      literal(MISSION_PREFIX),
      fixedField("fileClass", fileClass),
      fixedField("fileType", fileType),
      field("validityStart", TIMESTAMP),
      field("validityStop", TIMESTAMP),
      field("orbit", ".{5}"),
      field("collection", ".{2}"),
      field("processorVersion", ".{6}"),
      field("creationDate", TIMESTAMP),
    ],
    extension: "nc",
  });
}

export function auxGrammar(fileType: string, extension: string): FilenameGrammar<AuxField> {
  return defineGrammar<AuxField>({
    name: `${MISSION_PREFIX}_${fileType}`,
    slots: [
      literal(MISSION_PREFIX),
      field("fileClass", "[A-Z0-9]{4}"),
      fixedField("fileType", fileType),
      field("validityStart", TIMESTAMP),
      field("validityStop", TIMESTAMP),
      field("creationDate", TIMESTAMP),
    ],
    extension,
  });
}

/** NSIDC near-real-time ice and snow extent, e.g. NISE_SSMISF18_20200115.HDFEOS */
export const LEGACY_AUX_GRAMMAR: FilenameGrammar<LegacyAuxField> = defineGrammar<LegacyAuxField>({
  name: "NISE_SSMISF18",
  slots: [literal("NISE"), literal("SSMISF18"), field("date", "\\d{8}")],
  extension: "HDFEOS",
});
