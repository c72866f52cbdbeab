import { getEntry, getScalarText, getString, mapping, scalar, type ManifestNode } from "../manifests/node.js";

import { apiCategory, isTrackedApiVersion } from "./api-version.js";
import { NOT_AVAILABLE, kindApiVersionKey, type ResourceAssociation, type TemplateFragment } from "./types.js";

type WorkItem = { kind: "visit"; node: ManifestNode } | { kind: "emit"; association: ResourceAssociation };

export type ScanOptions = {
  /** Skip the root mapping's own `apiVersion`, e.g. the Composition's identity. */
  skipRootApiVersion?: boolean;
};

/**
 * Collect every tracked `apiVersion` in the document together with its sibling `kind`.
 *
 * Uses an explicit stack; associations come out in the same order as a
 * depth-first walk that checks each mapping key before descending into its value.
 */
export function scanResources(root: ManifestNode, options: ScanOptions = {}): ResourceAssociation[] {
  const found: ResourceAssociation[] = [];
  const rootItems = expand(root).filter((item) => !(options.skipRootApiVersion && item.kind === "emit"));
  const stack: WorkItem[] = rootItems.reverse();

  while (stack.length > 0) {
    const item = stack.pop();
    if (!item) break;

    if (item.kind === "emit") {
      found.push(item.association);
      continue;
    }

    stack.push(...expand(item.node).reverse());
  }

  return found;
}

export function scanTemplateFragment(fragment: TemplateFragment): ResourceAssociation[] {
  return scanResources(
    mapping({
      apiVersion: scalar(fragment.apiVersion),
      kind: scalar(fragment.kind),
    }),
  );
}

function expand(node: ManifestNode): WorkItem[] {
  switch (node.type) {
    case "scalar":
      return [];
    case "sequence":
      return node.items.map((child): WorkItem => ({ kind: "visit", node: child }));
    case "mapping": {
      const items: WorkItem[] = [];
      for (const [key, value] of node.entries) {
        if (key === "apiVersion") {
          const association = toAssociation(node, value);
          if (association) {
            items.push({ kind: "emit", association });
          }
        }
        items.push({ kind: "visit", node: value });
      }
      return items;
    }
  }
}

function toAssociation(owner: ManifestNode, apiVersionNode: ManifestNode): ResourceAssociation | null {
  const apiVersion = getString(apiVersionNode);
  if (apiVersion === undefined || !isTrackedApiVersion(apiVersion)) {
    return null;
  }

  const kind = getScalarText(getEntry(owner, "kind")) ?? NOT_AVAILABLE;
  return {
    kindApiVersion: kindApiVersionKey(kind, apiVersion),
    kind,
    apiVersion,
    category: apiCategory(apiVersion),
  };
}
