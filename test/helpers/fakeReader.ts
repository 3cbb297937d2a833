import { vi } from "vitest";
import type { ScientificFileHandle, ScientificFileReader } from "../../src/footprint/footprintResolver";

export function makeFakeReader(posList: string | null) {
  const close = vi.fn();
  const readStringAttribute = vi.fn((_objectPath: string, _attribute: string) => posList);
  const open = vi.fn((_filePath: string): ScientificFileHandle => ({ readStringAttribute, close }));
  const reader: ScientificFileReader = { name: "fake", open };
  return { reader, open, readStringAttribute, close };
}
