/**
 * Run coordinator for a composition inventory.
 * Purpose: walk the manifest tree, extract every Composition, and own the record list and function catalog.
 * Assumptions: files are processed one at a time; a failing file is logged and skipped.
 * Usage: runExtraction(config, { logger, onProgress }) then hand the result to the report writer.
 */

import fs from "node:fs";
import path from "node:path";

import { aggregateStatistics, buildFileMapping } from "../compositions/aggregate.js";
import { extractComposition } from "../compositions/extractor.js";
import { FunctionCatalog } from "../compositions/function-catalog.js";
import type { ExtractionRecord } from "../compositions/types.js";
import type { RunConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { logRunEvent, type JsonlLogger } from "../core/logger.js";
import { findManifestFiles, type DiscoveryOptions } from "../manifests/discovery.js";
import { loadManifestDocuments } from "../manifests/loader.js";
import type { ManifestNode } from "../manifests/node.js";
import type { ReportTables } from "../report/sheets.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExtractionPorts = {
  findFiles: (root: string, options: DiscoveryOptions) => string[];
  loadDocuments: (filePath: string) => ManifestNode[];
};

export type ExtractionProgress = {
  processed: number;
  total: number;
  filePath: string;
};

export type ExtractionRunOptions = {
  logger?: JsonlLogger;
  onProgress?: (progress: ExtractionProgress) => void;
  ports?: Partial<ExtractionPorts>;
};

export type FailedFile = {
  filePath: string;
  message: string;
};

export type ExtractionRun = {
  root: string;
  records: ExtractionRecord[];
  functions: string[];
  compositions: number;
  filesScanned: number;
  filesFailed: FailedFile[];
};

const DEFAULT_PORTS: ExtractionPorts = {
  findFiles: findManifestFiles,
  loadDocuments: loadManifestDocuments,
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function runExtraction(config: RunConfig, options: ExtractionRunOptions = {}): ExtractionRun {
  const ports: ExtractionPorts = { ...DEFAULT_PORTS, ...options.ports };
  const log = options.logger;
  const root = resolveRootDir(config.root);

  logRunEvent(log, "run.start", { root, include: config.include, exclude: config.exclude });

  let dirsSkipped = 0;
  const files = ports.findFiles(root, {
    include: config.include,
    exclude: config.exclude,
    onUnreadableDir: (dir, err) => {
      dirsSkipped += 1;
      logRunEvent(log, "discovery.dir_failed", { dir, error: formatErrorMessage(err) }, "warn");
    },
  });
  logRunEvent(log, "discovery.complete", { files: files.length, dirs_skipped: dirsSkipped }, "debug");

  const records: ExtractionRecord[] = [];
  const catalog = new FunctionCatalog();
  const filesFailed: FailedFile[] = [];
  let compositions = 0;

  files.forEach((filePath, index) => {
    try {
      const documents = ports.loadDocuments(filePath);
      let fileRecords = 0;

      for (const doc of documents) {
        const extraction = extractComposition(doc, filePath, log);
        if (!extraction.isComposition) continue;

        compositions += 1;
        fileRecords += extraction.records.length;
        records.push(...extraction.records);
        catalog.merge(extraction.functionRefs);
      }

      logRunEvent(
        log,
        "file.processed",
        { file: filePath, documents: documents.length, records: fileRecords },
        "debug",
      );
    } catch (err) {
      const message = formatErrorMessage(err);
      filesFailed.push({ filePath, message });
      logRunEvent(log, "file.failed", { file: filePath, error: message }, "error");
    }

    options.onProgress?.({ processed: index + 1, total: files.length, filePath });
  });

  if (records.length === 0) {
    logRunEvent(log, "run.empty", { files: files.length }, "warn");
  }

  logRunEvent(log, "run.complete", {
    files: files.length,
    failed: filesFailed.length,
    compositions,
    records: records.length,
    functions: catalog.size,
  });

  return {
    root,
    records,
    functions: catalog.sorted(),
    compositions,
    filesScanned: files.length,
    filesFailed,
  };
}

export function buildReportTables(run: ExtractionRun): ReportTables {
  return {
    records: run.records,
    statistics: aggregateStatistics(run.records),
    fileMapping: buildFileMapping(run.records),
    functions: run.functions,
  };
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function resolveRootDir(root: string): string {
  const resolved = path.resolve(root);

  let stat: fs.Stats;
  try {
    stat = fs.statSync(resolved);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Manifest root not found.",
      message: `Path does not exist: ${resolved}`,
      hint: "Pass an existing directory containing Composition manifests.",
      cause: err,
    });
  }

  if (!stat.isDirectory()) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Manifest root is not a directory.",
      message: `Path is not a directory: ${resolved}`,
      hint: "Pass the directory that holds the manifests, not a single file.",
    });
  }

  return resolved;
}
