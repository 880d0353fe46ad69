// src/file-discovery.ts — Walk the input tree
// Dot-files are skipped and exclude globs are matched with picomatch. Symlinked
// files inside the root are kept; symlinked directories are never followed.

import { readdirSync, statSync, realpathSync, type Stats } from "node:fs";
import { resolve, relative, join, sep } from "node:path";
import picomatch from "picomatch";
import { DocnormError, type Warning } from "./types.js";

/**
 * Discover every file under `rootDir`, as sorted `/`-separated paths
 * relative to the root.
 */
export function discoverFiles(
  rootDir: string,
  excludePatterns: string[] = [],
  warnings: Warning[] = [],
): string[] {
  const absRoot = resolve(rootDir);
  const files: string[] = [];
  walkDirectory(absRoot, absRoot, files, warnings);

  const relativePaths = files.map((f) => relative(absRoot, f).split(sep).join("/"));
  return filterAndSort(relativePaths, excludePatterns);
}

function walkDirectory(
  dir: string,
  rootDir: string,
  results: string[],
  warnings: Warning[],
): void {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new DocnormError(`Cannot read directory: ${msg}`, "io", dir, { cause: err });
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      walkDirectory(fullPath, rootDir, results, warnings);
    } else if (entry.isSymbolicLink()) {
      followSymlink(fullPath, entry.name, rootDir, results, warnings);
    } else if (entry.isFile() && !entry.name.startsWith(".")) {
      results.push(fullPath);
    }
  }
}

function followSymlink(
  fullPath: string,
  name: string,
  rootDir: string,
  results: string[],
  warnings: Warning[],
): void {
  let realRoot: string;
  let realPath: string;
  let stat: Stats;
  try {
    realRoot = realpathSync(rootDir);
    realPath = realpathSync(fullPath);
    stat = statSync(realPath);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot resolve symlink: ${msg}`,
      file: fullPath,
    });
    return;
  }

  if (realPath !== realRoot && !realPath.startsWith(realRoot + sep)) {
    warnings.push({
      level: "info",
      module: "file-discovery",
      message: `Symlink ${relative(rootDir, fullPath)} points outside the input directory — skipped`,
      file: fullPath,
    });
    return;
  }

  if (stat.isDirectory()) {
    warnings.push({
      level: "info",
      module: "file-discovery",
      message: `Symlinked directory ${relative(rootDir, fullPath)} not followed`,
      file: fullPath,
    });
  } else if (stat.isFile() && !name.startsWith(".")) {
    results.push(fullPath);
  }
}

function filterAndSort(files: string[], excludePatterns: string[]): string[] {
  if (excludePatterns.length === 0) {
    return files.sort();
  }

  const isExcluded = picomatch(excludePatterns, { dot: true });
  return files.filter((f) => !isExcluded(f)).sort();
}
