// Extraction record aggregation.
// Purpose: derive per-resource occurrence statistics and file-location mappings from raw records.
// Assumes records arrive in discovery order; ties keep that order.

import type { AggregatedStatistic, ExtractionRecord, FileMappingEntry } from "./types.js";

// =============================================================================
// STATISTICS
// =============================================================================

type StatisticGroup = {
  statistic: AggregatedStatistic;
  files: Set<string>;
  compositions: Set<string>;
};

export function aggregateStatistics(records: ExtractionRecord[]): AggregatedStatistic[] {
  const groups = new Map<string, StatisticGroup>();

  for (const record of records) {
    const { kindApiVersion, kind, apiVersion, category } = record.resource;
    const key = JSON.stringify([kindApiVersion, kind, apiVersion, category]);

    let group = groups.get(key);
    if (!group) {
      group = {
        statistic: {
          kindApiVersion,
          kind,
          apiVersion,
          category,
          totalOccurrences: 0,
          foundInNFiles: 0,
          usedByNCompositions: 0,
        },
        files: new Set(),
        compositions: new Set(),
      };
      groups.set(key, group);
    }

    group.statistic.totalOccurrences += 1;
    group.files.add(record.filePath);
    group.compositions.add(record.compositionKindApiVersion);
  }

  // Array.prototype.sort is stable, so equal counts stay in first-seen order.
  return [...groups.values()]
    .map(({ statistic, files, compositions }) => ({
      ...statistic,
      foundInNFiles: files.size,
      usedByNCompositions: compositions.size,
    }))
    .sort((a, b) => b.totalOccurrences - a.totalOccurrences);
}

// =============================================================================
// FILE MAPPING
// =============================================================================

export function buildFileMapping(records: ExtractionRecord[]): FileMappingEntry[] {
  const byResource = new Map<string, Map<string, number>>();

  for (const record of records) {
    const key = record.resource.kindApiVersion;
    let fileCounts = byResource.get(key);
    if (!fileCounts) {
      fileCounts = new Map();
      byResource.set(key, fileCounts);
    }
    fileCounts.set(record.filePath, (fileCounts.get(record.filePath) ?? 0) + 1);
  }

  const entries = [...byResource.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  return entries.map(([kindApiVersion, counts]) => {
    const fileCounts = [...counts.entries()].sort((a, b) => b[1] - a[1]);

    return {
      kindApiVersion,
      totalFiles: fileCounts.length,
      totalOccurrences: fileCounts.reduce((sum, [, count]) => sum + count, 0),
      fileLocations: fileCounts.map(([filePath, count]) => formatFileLocation(filePath, count)),
    };
  });
}

function formatFileLocation(filePath: string, count: number): string {
  return `${filePath} (${count} occurrences)`;
}
