import type { FootprintUnavailableInfo } from "../footprint/footprintResolver";
import type { PluginEnv } from "../config/env";

export function footprintCallbacks(env: PluginEnv) {
  return {
    extractFootprint: env.extractFootprint,
    onReaderError: (error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`HDF5 reader unavailable, footprints disabled: ${message}`);
    },
    onFootprintUnavailable: (info: FootprintUnavailableInfo) => {
      if (!env.debug) return;
      const detail = info.error instanceof Error ? ` (${info.error.message})` : "";
      console.warn(`No footprint for ${info.filePath}: ${info.reason}${detail}`);
    },
  };
}
