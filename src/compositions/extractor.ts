// Composition extraction.
// Purpose: turn one parsed manifest document into extraction records for a Composition.
// Assumes non-Composition documents are routine input and yield no records.

import { logRunEvent, type JsonlLogger } from "../core/logger.js";
import { getItems, getPath, getScalarText, getString, type ManifestNode } from "../manifests/node.js";

import { scanResources, scanTemplateFragment } from "./resource-scanner.js";
import { extractTemplateFragments } from "./template-extractor.js";
import {
  COMPOSITION_API_VERSION,
  COMPOSITION_KIND,
  NOT_AVAILABLE,
  createPlaceholderAssociation,
  kindApiVersionKey,
  type CompositeTypeReference,
  type CompositionExtraction,
  type ResourceAssociation,
} from "./types.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function isComposition(doc: ManifestNode): boolean {
  return (
    getString(getPath(doc, ["apiVersion"])) === COMPOSITION_API_VERSION &&
    getString(getPath(doc, ["kind"])) === COMPOSITION_KIND
  );
}

export function readCompositeTypeRef(doc: ManifestNode): CompositeTypeReference {
  const ref = getPath(doc, ["spec", "compositeTypeRef"]);
  return {
    kind: getScalarText(getPath(ref, ["kind"])) ?? NOT_AVAILABLE,
    apiVersion: getScalarText(getPath(ref, ["apiVersion"])) ?? NOT_AVAILABLE,
  };
}

export function readFunctionRefs(doc: ManifestNode): string[] {
  return pipelineSteps(doc).map(
    (step) => getScalarText(getPath(step, ["functionRef", "name"])) ?? NOT_AVAILABLE,
  );
}

export function extractComposition(
  doc: ManifestNode,
  filePath: string,
  log?: JsonlLogger,
): CompositionExtraction {
  if (!isComposition(doc)) {
    return { isComposition: false, records: [], functionRefs: [] };
  }

  const compositeRef = readCompositeTypeRef(doc);
  const compositionKey = kindApiVersionKey(compositeRef.kind, compositeRef.apiVersion);
  const functionRefs = readFunctionRefs(doc);

  const resources: ResourceAssociation[] = [
    ...scanResources(doc, { skipRootApiVersion: true }),
    ...scanPipelineTemplates(doc, log),
  ];
  if (resources.length === 0) {
    resources.push(createPlaceholderAssociation());
  }

  logRunEvent(
    log,
    "composition.extracted",
    { file: filePath, composition: compositionKey, resources: resources.length, functions: functionRefs },
    "debug",
  );

  return {
    isComposition: true,
    records: resources.map((resource) => ({
      filePath,
      compositionKindApiVersion: compositionKey,
      resource,
    })),
    functionRefs,
  };
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function pipelineSteps(doc: ManifestNode): ManifestNode[] {
  return getItems(getPath(doc, ["spec", "pipeline"]));
}

function scanPipelineTemplates(doc: ManifestNode, log?: JsonlLogger): ResourceAssociation[] {
  const found: ResourceAssociation[] = [];

  for (const step of pipelineSteps(doc)) {
    const template = getString(getPath(step, ["input", "inline", "template"]));
    if (!template) continue;

    for (const fragment of extractTemplateFragments(template, log)) {
      found.push(...scanTemplateFragment(fragment));
    }
  }

  return found;
}
