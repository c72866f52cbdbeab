/*
 * Extract command: scan a manifest tree and write the composition inventory workbook.
 * Assumptions: progress is drawn on stderr only when it is a TTY; summaries go to stdout.
 * Common usage: `composition-inventory ./platform -o inventory.xlsx -v`.
 */

import { Command } from "commander";

import {
  buildReportTables,
  runExtraction,
  type ExtractionProgress,
  type ExtractionRun,
  type ExtractionRunOptions,
} from "../app/run-extraction.js";
import { DEFAULT_OUTPUT_FILE } from "../core/config.js";
import { resolveRunConfig } from "../core/config-loader.js";
import { createAnsiFormatter, resolveColorEnabled, type AnsiFormatter } from "../core/error-format.js";
import { JsonlLogger, logRunEvent, resolveLogLevel } from "../core/logger.js";
import { buildReportSheets } from "../report/sheets.js";
import { writeWorkbook } from "../report/xlsx-writer.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExtractCommandOptions = {
  verbose?: boolean;
  output?: string;
  config?: string;
  logFile?: string;
  include?: string[];
  exclude?: string[];
  json?: boolean;
};

export type ExtractSummary = {
  root: string;
  files_scanned: number;
  files_failed: number;
  compositions: number;
  records: number;
  functions: number;
  report_path: string | null;
};

export type OutputStream = NodeJS.WritableStream & { isTTY?: boolean };

export type ExtractIo = {
  stdout: OutputStream;
  stderr: OutputStream;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function configureExtractCommand(program: Command, io?: ExtractIo): Command {
  return program
    .argument("<root>", "Directory containing Crossplane manifests")
    .option("-v, --verbose", "Enable debug logging")
    .option("-o, --output <file>", `Path to output Excel file (default: ${DEFAULT_OUTPUT_FILE})`)
    .option("--config <file>", "YAML config file with run defaults")
    .option("--log-file <file>", "Path to the JSONL log file")
    .option("--include <glob>", "Manifest glob to include (repeatable)", collectGlobs)
    .option("--exclude <glob>", "Manifest glob to exclude (repeatable)", collectGlobs)
    .option("--json", "Print the run summary as JSON", false)
    .action(async (root: string, opts: ExtractCommandOptions) => {
      await extractCommand(root, opts, io);
    });
}

// =============================================================================
// EXTRACT COMMAND
// =============================================================================

export async function extractCommand(
  root: string,
  opts: ExtractCommandOptions,
  io: ExtractIo = { stdout: process.stdout, stderr: process.stderr },
): Promise<ExtractSummary> {
  const config = resolveRunConfig({
    root,
    configPath: opts.config,
    overrides: {
      output: opts.output,
      log_file: opts.logFile,
      verbose: opts.verbose,
      include: opts.include,
      exclude: opts.exclude,
    },
  });

  const logger = new JsonlLogger(
    config.log_file,
    { run_id: defaultRunId() },
    { minLevel: resolveLogLevel(config.verbose), truncate: true },
  );
  const color = createAnsiFormatter(resolveColorEnabled({ stream: io.stdout }));
  const progress = opts.json ? undefined : createProgressLine(io.stderr);

  const runOptions: ExtractionRunOptions = { logger, onProgress: progress?.update };
  let run: ExtractionRun;
  try {
    run = runExtraction(config, runOptions);
  } finally {
    progress?.done();
  }

  let reportPath: string | null = null;
  if (run.records.length > 0) {
    const sheets = buildReportSheets(buildReportTables(run), { maxColumnWidth: config.max_column_width });
    reportPath = await writeWorkbook(config.output, sheets);
    logRunEvent(logger, "report.written", { path: reportPath, sheets: sheets.length });
  } else {
    logRunEvent(logger, "report.skipped", { reason: "no records" }, "warn");
  }

  const summary: ExtractSummary = {
    root: run.root,
    files_scanned: run.filesScanned,
    files_failed: run.filesFailed.length,
    compositions: run.compositions,
    records: run.records.length,
    functions: run.functions.length,
    report_path: reportPath,
  };

  if (opts.json) {
    io.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
  } else {
    printSummary(io.stdout, summary, config.output, color);
  }

  return summary;
}

// =============================================================================
// OUTPUT
// =============================================================================

function printSummary(
  stdout: OutputStream,
  summary: ExtractSummary,
  outputLabel: string,
  color: AnsiFormatter,
): void {
  const lines: string[] = [];

  if (summary.records > 0) {
    lines.push(color(`Extracted ${summary.records} entries`, ["green"]));
  } else {
    lines.push(color("No Composition entries found", ["yellow"]));
  }

  if (summary.files_failed > 0) {
    lines.push(color(`Skipped ${summary.files_failed} file(s) that could not be parsed; see the log.`, ["yellow"]));
  }

  if (summary.report_path) {
    lines.push(color(`Results saved to ${outputLabel}`, ["green"]));
  }

  stdout.write(`${lines.join("\n")}\n`);
}

function createProgressLine(stream: OutputStream): {
  update: (progress: ExtractionProgress) => void;
  done: () => void;
} | undefined {
  if (!stream.isTTY) {
    return undefined;
  }

  let drawn = false;
  return {
    update: ({ processed, total }) => {
      drawn = true;
      stream.write(`\rExtracting Compositions... ${processed}/${total}`);
    },
    done: () => {
      if (drawn) stream.write("\n");
    },
  };
}

function collectGlobs(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

function defaultRunId(): string {
  return new Date().toISOString().replace(/[-:]/g, "").replace(/\..+$/, "");
}
