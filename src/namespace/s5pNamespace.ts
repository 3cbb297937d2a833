import type { MetadataRecord } from "../classifier/types";

export const S5P_NAMESPACE = "s5p";

export type NamespaceFieldType = "text" | "integer";

export type NamespaceField = {
  name: string;
  type: NamespaceFieldType;
  indexed: boolean;
  /** Only standard L1/L2 products carry this field. */
  optional: boolean;
};

export const S5P_NAMESPACE_FIELDS: readonly NamespaceField[] = [
  { name: "file_class", type: "text", indexed: true, optional: false },
  { name: "file_type", type: "text", indexed: true, optional: false },
  { name: "orbit", type: "integer", indexed: true, optional: true },
  { name: "collection", type: "integer", indexed: true, optional: true },
  { name: "processor_version", type: "integer", indexed: true, optional: true },
];

export type NamespaceProperties = Record<string, string | number>;

export function namespaces(): string[] {
  return [S5P_NAMESPACE];
}

export function namespace(name: string): readonly NamespaceField[] | null {
  return name === S5P_NAMESPACE ? S5P_NAMESPACE_FIELDS : null;
}

export function toNamespaceProperties(record: MetadataRecord): NamespaceProperties {
  const properties: NamespaceProperties = {
    file_class: record.s5p.fileClass,
    file_type: record.s5p.fileType,
  };
  if (record.variant === "standard") {
    properties.orbit = record.s5p.orbit;
    properties.collection = record.s5p.collection;
    properties.processor_version = record.s5p.processorVersion;
  }
  return properties;
}
