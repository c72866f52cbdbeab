import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";

import type { ExtractIo } from "../cli/extract.js";
import { main } from "../index.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const FIXTURE_REPO = path.resolve(__dirname, "../../test/fixtures/platform-mini-repo");
const tempDirs: string[] = [];

// =============================================================================
// HELPERS
// =============================================================================

export type CliRun = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type LogEvent = {
  ts: string;
  level: string;
  type: string;
  run_id?: string;
  payload?: Record<string, unknown>;
};

export async function makeTempDir(prefix = "inventory-acceptance-"): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export async function createTempRepoFromFixture(): Promise<string> {
  const tempRoot = await makeTempDir();
  const repoDir = path.join(tempRoot, "repo");
  await fse.copy(FIXTURE_REPO, repoDir);
  return repoDir;
}

export async function cleanupTempDirs(): Promise<void> {
  for (const dir of tempDirs) {
    await fs.rm(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
}

export async function runCli(args: string[]): Promise<CliRun> {
  const stdout = new CaptureStream();
  const stderr = new CaptureStream();
  const io: ExtractIo = { stdout, stderr };

  const exitCode = await main(["node", "composition-inventory", ...args], io);

  return { exitCode, stdout: stdout.text(), stderr: stderr.text() };
}

export async function readLogEvents(logPath: string): Promise<LogEvent[]> {
  const raw = await fs.readFile(logPath, "utf8");
  return raw
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line) => JSON.parse(line) as LogEvent);
}

class CaptureStream extends Writable {
  private readonly chunks: string[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  text(): string {
    return this.chunks.join("");
  }
}
