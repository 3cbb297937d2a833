import path from "node:path";
import { datePathParts, isMinTimestamp } from "../grammar/timestamps";
import type { MetadataRecord } from "../classifier/types";

export const ARCHIVE_ROOT_DIR = "sentinel-5p";

/** sentinel-5p/<fileType>/<fileClass>/YYYY/MM/DD of the validity start. */
export function standardArchivePath(record: MetadataRecord): string {
  const { year, month, day } = datePathParts(record.core.validityStart);
  return path.posix.join(ARCHIVE_ROOT_DIR, record.s5p.fileType, record.s5p.fileClass, year, month, day);
}

export function auxArchivePath(params: { familyCode: string; validityStart: Date }): string {
  if (isMinTimestamp(params.validityStart)) {
    return path.posix.join(ARCHIVE_ROOT_DIR, params.familyCode);
  }
  const { year, month } = datePathParts(params.validityStart);
  return path.posix.join(ARCHIVE_ROOT_DIR, params.familyCode, year, month);
}
