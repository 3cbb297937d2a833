import type { Polygon } from "../footprint/geometry";
import type { ProductVariant } from "../registry/productTypes";

export type CoreMetadata = {
  /** Filename without extension. */
  productName: string;
  creationDate: Date;
  validityStart: Date;
  validityStop: Date;
  footprint: Polygon | null;
};

export type AuxMissionMetadata = {
  fileClass: string;
  fileType: string;
};

export type StandardMissionMetadata = AuxMissionMetadata & {
  orbit: number;
  collection: number;
  processorVersion: number;
};

export type StandardMetadataRecord = {
  variant: "standard";
  core: CoreMetadata;
  s5p: StandardMissionMetadata;
};

export type AuxMetadataRecord = {
  variant: "generic_aux" | "legacy_aux";
  core: CoreMetadata;
  s5p: AuxMissionMetadata;
};

export type MetadataRecord = StandardMetadataRecord | AuxMetadataRecord;

export type HashAlgorithm = "md5" | "sha1" | "sha256";

export interface ProductClassifier {
  readonly productType: string;
  readonly variant: ProductVariant;
  /** Products are single files stored flat, never under a per-product directory. */
  readonly usesEnclosingDirectory: false;
  readonly usesContentHash: boolean;
  readonly hashAlgorithm: HashAlgorithm;
  /** False when no footprint reader is attached; registries from loadPlugin() attach one. */
  readonly canInspectContents: boolean;
  namespaces(): string[];
  identify(paths: readonly string[]): boolean;
  /**
   * Parses the product name (and, with `inspectContents`, the file itself).
   * Without a reader (see `canInspectContents`) the footprint stays null.
   * Throws FilenameGrammarError when the paths were not identified as this type.
   */
  analyze(paths: readonly string[], inspectContents?: boolean): MetadataRecord;
  archivePath(record: MetadataRecord): string;
}
