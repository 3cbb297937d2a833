import { polygonFromPosList, type Polygon } from "./geometry";

export const FOOTPRINT_OBJECT_PATH =
  "/METADATA/EOP_METADATA/om:featureOfInterest/eop:multiExtentOf/gml:surfaceMembers/gml:exterior";
export const FOOTPRINT_ATTRIBUTE = "gml:posList";

export interface ScientificFileHandle {
  /** Null when the object or the attribute does not exist, or is not text. */
  readStringAttribute(objectPath: string, attribute: string): string | null;
  close(): void;
}

export interface ScientificFileReader {
  readonly name: string;
  open(filePath: string): ScientificFileHandle;
}

export type FootprintUnavailableReason =
  | "reader_unavailable"
  | "open_failed"
  | "read_failed"
  | "close_failed"
  | "path_not_found"
  | "malformed_coordinates";

export type FootprintUnavailableInfo = {
  filePath: string;
  reason: FootprintUnavailableReason;
  error?: unknown;
};

export type FootprintResolverOptions = {
  reader: ScientificFileReader | null;
  onUnavailable?: (info: FootprintUnavailableInfo) => void;
};

export type FootprintResolver = {
  readonly available: boolean;
  resolve(filePath: string): Polygon | null;
};

export function createFootprintResolver(options: FootprintResolverOptions): FootprintResolver {
  const { reader, onUnavailable } = options;

  const unavailable = (info: FootprintUnavailableInfo): null => {
    if (onUnavailable) onUnavailable(info);
    return null;
  };

  const readPosList = (
    activeReader: ScientificFileReader,
    filePath: string
  ): string | FootprintUnavailableInfo => {
    let handle: ScientificFileHandle;
    try {
      handle = activeReader.open(filePath);
    } catch (error) {
      return { filePath, reason: "open_failed", error };
    }

    try {
      const posList = handle.readStringAttribute(FOOTPRINT_OBJECT_PATH, FOOTPRINT_ATTRIBUTE);
      return posList ?? { filePath, reason: "path_not_found" };
    } catch (error) {
      return { filePath, reason: "read_failed", error };
    } finally {
      try {
        handle.close();
      } catch (error) {
        if (onUnavailable) onUnavailable({ filePath, reason: "close_failed", error });
      }
    }
  };

  return {
    available: reader !== null,
    resolve(filePath: string): Polygon | null {
      if (!reader) return unavailable({ filePath, reason: "reader_unavailable" });

      const result = readPosList(reader, filePath);
      if (typeof result !== "string") return unavailable(result);

      const polygon = polygonFromPosList(result);
      return polygon ?? unavailable({ filePath, reason: "malformed_coordinates" });
    },
  };
}

export const NO_FOOTPRINT: FootprintResolver = createFootprintResolver({ reader: null });
