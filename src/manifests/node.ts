// Manifest document model.
// Purpose: represent schema-less parsed YAML as a tagged variant so traversal can dispatch on `type`.
// Assumes input comes from js-yaml (plain objects, arrays, scalars, Date, Uint8Array).

// =============================================================================
// TYPES
// =============================================================================

export type ScalarValue = string | number | boolean | null;

export type MappingNode = {
  type: "mapping";
  entries: Array<[string, ManifestNode]>;
};

export type SequenceNode = {
  type: "sequence";
  items: ManifestNode[];
};

export type ScalarNode = {
  type: "scalar";
  value: ScalarValue;
};

export type ManifestNode = MappingNode | SequenceNode | ScalarNode;

// =============================================================================
// CONSTRUCTION
// =============================================================================

export function mapping(entries: Record<string, ManifestNode> | Array<[string, ManifestNode]>): MappingNode {
  return { type: "mapping", entries: Array.isArray(entries) ? entries : Object.entries(entries) };
}

export function scalar(value: ScalarValue): ScalarNode {
  return { type: "scalar", value };
}

export function toManifestNode(value: unknown): ManifestNode {
  if (value === null || value === undefined) {
    return scalar(null);
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return scalar(value);
  }
  if (typeof value === "bigint") {
    return scalar(value.toString());
  }
  if (value instanceof Date) {
    return scalar(Number.isNaN(value.getTime()) ? String(value) : value.toISOString());
  }
  if (value instanceof Uint8Array) {
    return scalar(Buffer.from(value).toString("base64"));
  }
  if (Array.isArray(value)) {
    return { type: "sequence", items: value.map((item) => toManifestNode(item)) };
  }
  if (typeof value === "object") {
    return mapping(Object.entries(value).map(([key, item]): [string, ManifestNode] => [key, toManifestNode(item)]));
  }

  return scalar(String(value));
}

// =============================================================================
// ACCESSORS
// =============================================================================

export function getEntry(node: ManifestNode | undefined, key: string): ManifestNode | undefined {
  if (node?.type !== "mapping") return undefined;
  const entry = node.entries.find(([entryKey]) => entryKey === key);
  return entry?.[1];
}

export function getPath(node: ManifestNode | undefined, keys: string[]): ManifestNode | undefined {
  let current = node;
  for (const key of keys) {
    current = getEntry(current, key);
    if (!current) return undefined;
  }
  return current;
}

export function getItems(node: ManifestNode | undefined): ManifestNode[] {
  return node?.type === "sequence" ? node.items : [];
}

export function getString(node: ManifestNode | undefined): string | undefined {
  return node?.type === "scalar" && typeof node.value === "string" ? node.value : undefined;
}

/** Scalar rendered as text; `undefined` for null, mappings, sequences, and missing nodes. */
export function getScalarText(node: ManifestNode | undefined): string | undefined {
  if (node?.type !== "scalar" || node.value === null) return undefined;
  return String(node.value);
}
