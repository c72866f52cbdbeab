// Manifest file discovery.
// Purpose: list candidate manifest files under a root, filtered by include/exclude globs.
// Assumes globs are written with forward slashes and match root-relative paths.
// Symlinked files are listed; symlinked directories are not descended.

import fs from "node:fs";
import path from "node:path";

import { minimatch } from "minimatch";

export type DiscoveryOptions = {
  include: string[];
  exclude?: string[];
  // Called for each directory that cannot be listed; the walk skips it and continues.
  onUnreadableDir?: (dir: string, error: unknown) => void;
};

export function findManifestFiles(root: string, options: DiscoveryOptions): string[] {
  const rootDir = path.resolve(root);
  const exclude = options.exclude ?? [];
  const matches: string[] = [];
  const pending: string[] = [rootDir];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      options.onUnreadableDir?.(dir, err);
      continue;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(fullPath);
        continue;
      }
      if (!entry.isFile() && !(entry.isSymbolicLink() && isFileTarget(fullPath))) continue;

      const relative = toPosixPath(path.relative(rootDir, fullPath));
      if (matchesAny(relative, options.include) && !matchesAny(relative, exclude)) {
        matches.push(fullPath);
      }
    }
  }

  return matches.sort();
}

function isFileTarget(linkPath: string): boolean {
  try {
    return fs.statSync(linkPath).isFile();
  } catch {
    // Dangling or looping link.
    return false;
  }
}

function matchesAny(relativePath: string, patterns: string[]): boolean {
  return patterns.some((pattern) => minimatch(relativePath, toPosixPath(pattern), { dot: true }));
}

function toPosixPath(value: string): string {
  return value.split(path.sep).join("/");
}
