// Inline template fragment extraction.
// Purpose: split a templated text blob into candidate resource documents without evaluating the template.
// Assumes documents open with an `apiVersion:` line confirmed by `kind:` or `metadata:` within two lines.

import { formatErrorMessage } from "../core/error-format.js";
import { logRunEvent, type JsonlLogger } from "../core/logger.js";

import { parseTemplatedFragment } from "./templated-fragment.js";
import type { TemplateFragment } from "./types.js";

const START_MARKER = "apiVersion:";
const CONFIRM_MARKERS = ["kind:", "metadata:"];
const CONFIRM_WINDOW = 3;
const DOCUMENT_SEPARATOR = "---";

type ScanState = "idle" | "in-fragment";

export function extractTemplateFragments(template: string, log?: JsonlLogger): TemplateFragment[] {
  try {
    const fragments = scanTemplate(template, log);
    logRunEvent(log, "template.extracted", { fragments: fragments.length }, "debug");
    return fragments;
  } catch (err) {
    logRunEvent(log, "template.extract_failed", { error: formatErrorMessage(err) }, "error");
    return [];
  }
}

function scanTemplate(template: string, log?: JsonlLogger): TemplateFragment[] {
  const lines = template.split("\n");
  const fragments: TemplateFragment[] = [];
  let state: ScanState = "idle";
  let buffer: string[] = [];

  const flush = (): void => {
    if (buffer.length === 0) return;
    const fragment = parseTemplatedFragment(buffer.join(" "), log);
    if (fragment) {
      fragments.push(fragment);
    }
    buffer = [];
  };

  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed.startsWith("#")) return;

    if (startsDocument(lines, index)) {
      if (state === "in-fragment") {
        flush();
      }
      buffer = [];
      state = "in-fragment";
    }

    if (state === "in-fragment") {
      buffer.push(line);
    }

    if (trimmed === DOCUMENT_SEPARATOR && state === "in-fragment") {
      flush();
      state = "idle";
    }
  });

  flush();
  return fragments;
}

function startsDocument(lines: string[], index: number): boolean {
  if (!lines[index]?.includes(START_MARKER)) {
    return false;
  }

  // Lookahead reads raw lines, comments included.
  const window = lines.slice(index, index + CONFIRM_WINDOW).join("");
  return CONFIRM_MARKERS.some((marker) => window.includes(marker));
}
