import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { JsonlLogger, logRunEvent, resolveLogLevel } from "./logger.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

function readLines(filePath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(filePath, "utf8")
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("JsonlLogger", () => {
  it("writes one JSON object per event with context fields", () => {
    const dir = makeTempDir("logger-context-");
    const logPath = path.join(dir, "logs", "run.log");
    const logger = new JsonlLogger(logPath, { run_id: "run-1" });

    logRunEvent(logger, "file.processed", { file: "a.yaml", records: 2 });

    const [line] = readLines(logPath);
    expect(line?.level).toBe("info");
    expect(line?.type).toBe("file.processed");
    expect(line?.run_id).toBe("run-1");
    expect(line?.payload).toEqual({ file: "a.yaml", records: 2 });
    expect(typeof line?.ts).toBe("string");
  });

  it("drops events below the minimum level", () => {
    const dir = makeTempDir("logger-level-");
    const logPath = path.join(dir, "run.log");
    const logger = new JsonlLogger(logPath, {}, { minLevel: resolveLogLevel(false) });

    logRunEvent(logger, "template.fragment_parse_failed", undefined, "debug");
    logRunEvent(logger, "file.failed", { file: "b.yaml" }, "error");

    expect(readLines(logPath).map((line) => line.type)).toEqual(["file.failed"]);
    expect(logger.isEnabled("debug")).toBe(false);
  });

  it("truncates an existing log when requested", () => {
    const dir = makeTempDir("logger-truncate-");
    const logPath = path.join(dir, "run.log");
    fs.writeFileSync(logPath, "stale\n", "utf8");

    const logger = new JsonlLogger(logPath, {}, { truncate: true, minLevel: "debug" });
    logger.log({ type: "run.start", level: "debug" });

    expect(readLines(logPath)).toHaveLength(1);
  });
});
