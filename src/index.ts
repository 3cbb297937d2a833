import type { ProductClassifier } from "./classifier/types";
import {
  createFootprintResolver,
  type FootprintUnavailableInfo,
} from "./footprint/footprintResolver";
import { loadH5FileReader, type H5ModuleLoader } from "./footprint/h5FileReader";
import {
  createProductTypeRegistry,
  type ProductTypeRegistry,
} from "./registry/productTypeRegistry";

export * from "./classifier/types";
export { FilenameGrammarError } from "./grammar/FilenameGrammarError";
export {
  MAX_TIMESTAMP_MS,
  MIN_TIMESTAMP_MS,
  OPEN_START_SENTINEL,
  OPEN_STOP_SENTINEL,
} from "./grammar/timestamps";
export { polygonToWkt, type GeoPoint, type Polygon } from "./footprint/geometry";
export {
  createFootprintResolver,
  type FootprintResolver,
  type FootprintUnavailableInfo,
  type ScientificFileHandle,
  type ScientificFileReader,
} from "./footprint/footprintResolver";
export { loadH5FileReader } from "./footprint/h5FileReader";
export { ARCHIVE_ROOT_DIR } from "./archive/archivePath";
export { namespace, namespaces, toNamespaceProperties, S5P_NAMESPACE } from "./namespace/s5pNamespace";
export { hashFile } from "./hash/contentHash";
export { createProductTypeRegistry, type ProductTypeRegistry } from "./registry/productTypeRegistry";

const defaultRegistry = createProductTypeRegistry();

export function productTypes(): string[] {
  return defaultRegistry.listProductTypes();
}

/** Classifier without a footprint reader (`canInspectContents` is false); use loadPlugin() for footprints. */
export function productTypePlugin(productType: string): ProductClassifier | null {
  return defaultRegistry.resolve(productType);
}

export type LoadPluginOptions = {
  extractFootprint?: boolean;
  h5Loader?: H5ModuleLoader;
  onReaderError?: (error: unknown) => void;
  onFootprintUnavailable?: (info: FootprintUnavailableInfo) => void;
};

/** Registry with the HDF5 footprint reader attached when it can be loaded. */
export async function loadPlugin(options: LoadPluginOptions = {}): Promise<ProductTypeRegistry> {
  const { extractFootprint = true, h5Loader, onReaderError, onFootprintUnavailable } = options;
  const reader = extractFootprint
    ? await loadH5FileReader({ loader: h5Loader, onError: onReaderError })
    : null;

  return createProductTypeRegistry({
    footprintResolver: createFootprintResolver({ reader, onUnavailable: onFootprintUnavailable }),
  });
}
