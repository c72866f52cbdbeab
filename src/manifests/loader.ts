import fs from "node:fs";

import * as yaml from "js-yaml";

import { ManifestLoadError } from "../core/errors.js";

import { toManifestNode, type ManifestNode } from "./node.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadManifestDocuments(filePath: string): ManifestNode[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new ManifestLoadError(filePath, `Failed to read ${filePath}`, err);
  }

  return parseManifestStream(content, filePath);
}

export function parseManifestStream(content: string, filePath = "<inline>"): ManifestNode[] {
  let documents: unknown[];
  try {
    documents = yaml.loadAll(content, null, { filename: filePath });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ManifestLoadError(filePath, `Failed to parse ${filePath}: ${reason}`, err);
  }

  return documents.filter((doc) => !isEmptyDocument(doc)).map((doc) => toManifestNode(doc));
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function isEmptyDocument(doc: unknown): boolean {
  if (doc === null || doc === undefined || doc === false || doc === 0 || doc === "") {
    return true;
  }
  if (Array.isArray(doc)) {
    return doc.length === 0;
  }
  if (typeof doc === "object" && !(doc instanceof Date)) {
    return Object.keys(doc).length === 0;
  }
  return false;
}
