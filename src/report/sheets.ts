// Report sheet layout.
// Purpose: turn report tables into named sheets with headers, rows, and column widths.
// Assumes every cell renders as its string form when measuring width.

import type { AggregatedStatistic, ExtractionRecord, FileMappingEntry } from "../compositions/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReportTables = {
  records: ExtractionRecord[];
  statistics: AggregatedStatistic[];
  fileMapping: FileMappingEntry[];
  functions: string[];
};

export type CellValue = string | number;

export type SheetColumn = {
  header: string;
  width: number;
  wrap?: boolean;
};

export type SheetData = {
  name: string;
  columns: SheetColumn[];
  rows: CellValue[][];
};

export type SheetLayoutOptions = {
  maxColumnWidth: number;
};

export const SHEET_NAMES = {
  raw: "Raw Data",
  statistics: "MR Statistics",
  fileMapping: "File Mapping",
  functions: "Functions",
} as const;

const COLUMN_PADDING = 2;
const FILE_LOCATIONS_WIDTH = 100;

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildReportSheets(tables: ReportTables, options: SheetLayoutOptions): SheetData[] {
  const raw = layoutSheet(
    SHEET_NAMES.raw,
    [
      "File Path",
      "Composition Kind/API Version",
      "Managed Resource (MR) Kind/API Version",
      "Kind",
      "API Version",
      "Category",
    ],
    tables.records.map((record) => [
      record.filePath,
      record.compositionKindApiVersion,
      record.resource.kindApiVersion,
      record.resource.kind,
      record.resource.apiVersion,
      record.resource.category,
    ]),
    options,
  );

  const statistics = layoutSheet(
    SHEET_NAMES.statistics,
    [
      "Kind/API Version",
      "Kind",
      "API Version",
      "Category",
      "Total Occurrences",
      "Found in N Files",
      "Used by N Compositions",
    ],
    tables.statistics.map((stat) => [
      stat.kindApiVersion,
      stat.kind,
      stat.apiVersion,
      stat.category,
      stat.totalOccurrences,
      stat.foundInNFiles,
      stat.usedByNCompositions,
    ]),
    options,
  );

  const fileMapping = layoutSheet(
    SHEET_NAMES.fileMapping,
    ["Kind/API Version", "Total Files", "Total Occurrences", "File Locations"],
    tables.fileMapping.map((entry) => [
      entry.kindApiVersion,
      entry.totalFiles,
      entry.totalOccurrences,
      entry.fileLocations.join("\n"),
    ]),
    options,
  );
  const locations = fileMapping.columns[3];
  if (locations) {
    locations.width = FILE_LOCATIONS_WIDTH;
    locations.wrap = true;
  }

  const functions = layoutSheet(
    SHEET_NAMES.functions,
    ["Function Reference"],
    tables.functions.map((name) => [name]),
    options,
  );

  return [raw, statistics, fileMapping, functions];
}

export function computeColumnWidths(headers: string[], rows: CellValue[][], maxColumnWidth: number): number[] {
  return headers.map((header, index) => {
    const longest = rows.reduce((max, row) => Math.max(max, String(row[index] ?? "").length), header.length);
    return Math.min(longest + COLUMN_PADDING, maxColumnWidth);
  });
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function layoutSheet(
  name: string,
  headers: string[],
  rows: CellValue[][],
  options: SheetLayoutOptions,
): SheetData {
  const widths = computeColumnWidths(headers, rows, options.maxColumnWidth);
  return {
    name,
    columns: headers.map((header, index) => ({ header, width: widths[index] ?? header.length })),
    rows,
  };
}
