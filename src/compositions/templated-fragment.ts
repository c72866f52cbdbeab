import { formatErrorMessage } from "../core/error-format.js";
import { logRunEvent, type JsonlLogger } from "../core/logger.js";

import type { TemplateFragment } from "./types.js";

// Values stop at whitespace or the opening brace of a template action.
const API_VERSION_PATTERN = /apiVersion:\s*([^\s{]+)/;
const KIND_PATTERN = /kind:\s*([^\s{]+)/;

const PREVIEW_LIMIT = 200;

/**
 * Pull the first `apiVersion`/`kind` pair out of text that mixes YAML with
 * template actions. Returns null unless both keys carry a literal value.
 */
export function parseTemplatedFragment(content: string, log?: JsonlLogger): TemplateFragment | null {
  try {
    const apiVersion = captureValue(API_VERSION_PATTERN, content);
    const kind = captureValue(KIND_PATTERN, content);
    if (!apiVersion || !kind) {
      return null;
    }

    return { apiVersion, kind };
  } catch (err) {
    logRunEvent(
      log,
      "template.fragment_parse_failed",
      { error: formatErrorMessage(err), content: content.slice(0, PREVIEW_LIMIT) },
      "debug",
    );
    return null;
  }
}

function captureValue(pattern: RegExp, content: string): string | null {
  const raw = pattern.exec(content)?.[1]?.trim();
  if (!raw) {
    return null;
  }

  const unquoted = stripQuotes(raw);
  return unquoted.length > 0 ? unquoted : null;
}

function stripQuotes(value: string): string {
  const first = value[0];
  if (value.length >= 2 && (first === '"' || first === "'") && value.endsWith(first)) {
    return value.slice(1, -1);
  }
  return value;
}
