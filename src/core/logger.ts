// JSONL run logger.
// Purpose: append structured events to a log file, one JSON object per line.
// Assumes a single writer per file; writes are synchronous so a crash keeps prior lines.

import fs from "node:fs";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = {
  type: string;
  level?: LogLevel;
  payload?: JsonObject;
};

export type JsonlLoggerOptions = {
  minLevel?: LogLevel;
  truncate?: boolean;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  readonly filePath: string;
  private readonly context: JsonObject;
  private readonly minLevel: LogLevel;

  constructor(filePath: string, context: JsonObject = {}, options: JsonlLoggerOptions = {}) {
    this.filePath = path.resolve(filePath);
    this.context = context;
    this.minLevel = options.minLevel ?? "info";

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    if (options.truncate) {
      fs.writeFileSync(this.filePath, "", "utf8");
    }
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  log(event: LogEvent): void {
    const level = event.level ?? "info";
    if (!this.isEnabled(level)) return;

    const line: JsonObject = {
      ts: new Date().toISOString(),
      level,
      type: event.type,
      ...this.context,
    };
    if (event.payload) {
      line.payload = event.payload;
    }

    fs.appendFileSync(this.filePath, `${JSON.stringify(line)}\n`, "utf8");
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function logRunEvent(
  logger: JsonlLogger | undefined,
  type: string,
  payload?: JsonObject,
  level: LogLevel = "info",
): void {
  logger?.log({ type, level, payload });
}

export function resolveLogLevel(verbose: boolean): LogLevel {
  return verbose ? "debug" : "info";
}
