import type { ScientificFileHandle, ScientificFileReader } from "./footprintResolver";

type H5File = {
  /** Negative when the library could not open the file. */
  file_id: bigint;
  get(objectPath: string): unknown;
  close(): unknown;
};

export type H5Api = {
  ready: PromiseLike<unknown>;
  File: new (filename: string, mode: "r") => H5File;
};

export type H5ModuleLoader = () => Promise<H5Api>;

type H5AttributeHolder = {
  attrs: Record<string, { value: unknown } | undefined>;
};

const isAttributeHolder = (value: unknown): value is H5AttributeHolder =>
  typeof value === "object" &&
  value !== null &&
  "attrs" in value &&
  typeof value.attrs === "object" &&
  value.attrs !== null;

const importH5wasm: H5ModuleLoader = async () => {
  const mod = await import("h5wasm/node");
  return mod.default;
};

export function createH5FileReader(h5: H5Api): ScientificFileReader {
  return {
    name: "h5wasm",
    open(filePath: string): ScientificFileHandle {
      const file = new h5.File(filePath, "r");
      if (file.file_id < 0n) {
        throw new Error(`${filePath}: not an HDF5 file`);
      }
      return {
        readStringAttribute(objectPath: string, attribute: string): string | null {
          const entity = file.get(objectPath);
          if (!isAttributeHolder(entity)) return null;
          const value = entity.attrs[attribute]?.value;
          return typeof value === "string" ? value : null;
        },
        close() {
          file.close();
        },
      };
    },
  };
}

export type LoadH5FileReaderOptions = {
  loader?: H5ModuleLoader;
  onError?: (error: unknown) => void;
};

/**
 * Loads the HDF5 (netCDF-4) reader once. Resolves to null when the module is
 * missing or its runtime fails to start, so callers fall back to no footprint.
 */
export async function loadH5FileReader(
  options: LoadH5FileReaderOptions = {}
): Promise<ScientificFileReader | null> {
  const { loader = importH5wasm, onError } = options;
  try {
    const h5 = await loader();
    await h5.ready;
    return createH5FileReader(h5);
  } catch (error) {
    if (onError) onError(error);
    return null;
  }
}
