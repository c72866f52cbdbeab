// Composition inventory types.
// Purpose: shared shapes for extracted resource associations, records, and aggregates.

export const NOT_AVAILABLE = "N/A";

export const COMPOSITION_API_VERSION = "apiextensions.crossplane.io/v1";
export const COMPOSITION_KIND = "Composition";

// =============================================================================
// EXTRACTION
// =============================================================================

export type ResourceAssociation = {
  kindApiVersion: string;
  kind: string;
  apiVersion: string;
  category: string;
};

export type ExtractionRecord = {
  filePath: string;
  compositionKindApiVersion: string;
  resource: ResourceAssociation;
};

export type CompositeTypeReference = {
  kind: string;
  apiVersion: string;
};

export type TemplateFragment = {
  apiVersion: string;
  kind: string;
};

export type CompositionExtraction = {
  isComposition: boolean;
  records: ExtractionRecord[];
  functionRefs: string[];
};

// =============================================================================
// AGGREGATES
// =============================================================================

export type AggregatedStatistic = {
  kindApiVersion: string;
  kind: string;
  apiVersion: string;
  category: string;
  totalOccurrences: number;
  foundInNFiles: number;
  usedByNCompositions: number;
};

export type FileMappingEntry = {
  kindApiVersion: string;
  totalFiles: number;
  totalOccurrences: number;
  fileLocations: string[];
};

export function kindApiVersionKey(kind: string, apiVersion: string): string {
  return `${kind}_${apiVersion}`;
}

export function createPlaceholderAssociation(): ResourceAssociation {
  return {
    kindApiVersion: NOT_AVAILABLE,
    kind: NOT_AVAILABLE,
    apiVersion: NOT_AVAILABLE,
    category: "",
  };
}
