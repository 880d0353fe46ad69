// src/processor.ts — Directory orchestrator
// Reads and transforms every document before anything is written; other
// files are copied byte for byte to the mirrored path.

import { readFileSync, writeFileSync, copyFileSync, mkdirSync, rmSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import type { DocumentResult, ProcessSummary, ResolvedConfig, Warning } from "./types.js";
import { DocnormError, DOCUMENT_EXTENSION } from "./types.js";
import { discoverFiles } from "./file-discovery.js";
import { processText } from "./transform.js";
import { applyReadmeOrdinals } from "./ordinal.js";

export type ProcessOptions = Pick<
  ResolvedConfig,
  "inputDir" | "outputDir" | "dryRun" | "ordinal" | "exclude" | "sectionAnchors" | "verbose"
>;

/** Verbose logger — writes to stderr only when verbose is enabled. */
function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

export function isDocumentChanged(doc: DocumentResult): boolean {
  return doc.updated !== doc.original || doc.outputRelativePath !== doc.relativePath;
}

/**
 * Normalize every document under `inputDir` into `outputDir` (which may be
 * the same directory). In dry-run mode nothing is written.
 */
export function processDirectory(
  options: ProcessOptions,
  warnings: Warning[] = [],
): ProcessSummary {
  const inputDir = resolve(options.inputDir);
  const outputDir = resolve(options.outputDir);
  const inPlace = inputDir === outputDir;

  const files = discoverFiles(inputDir, options.exclude, warnings);
  vlog(options.verbose, `Discovered ${files.length} files under ${inputDir}`);

  const documents: DocumentResult[] = [];
  const copied: string[] = [];

  for (const relativePath of files) {
    if (!DOCUMENT_EXTENSION.test(relativePath)) {
      copied.push(relativePath);
      continue;
    }
    const original = readText(join(inputDir, relativePath));
    documents.push({
      relativePath,
      outputRelativePath: relativePath,
      original,
      updated: processText(original, { sectionAnchors: options.sectionAnchors }),
    });
  }

  if (options.ordinal) {
    applyReadmeOrdinals(documents);
  }

  const changed = documents.filter(isDocumentChanged).map((doc) => doc.outputRelativePath);
  vlog(options.verbose, `${changed.length} of ${documents.length} documents changed`);

  if (!options.dryRun) {
    if (!inPlace) {
      for (const relativePath of copied) {
        copyFile(join(inputDir, relativePath), join(outputDir, relativePath));
      }
    }
    for (const doc of documents) {
      writeDocument(doc, inputDir, outputDir, inPlace);
    }
  }

  return { documents, copied, changed };
}

function writeDocument(
  doc: DocumentResult,
  inputDir: string,
  outputDir: string,
  inPlace: boolean,
): void {
  if (inPlace && !isDocumentChanged(doc)) return;

  writeText(join(outputDir, doc.outputRelativePath), doc.updated);

  if (inPlace && doc.outputRelativePath !== doc.relativePath) {
    const stale = join(inputDir, doc.relativePath);
    try {
      rmSync(stale);
    } catch (err: unknown) {
      throw ioError("Cannot remove renamed file", stale, err);
    }
  }
}

function readText(path: string): string {
  try {
    return readFileSync(path, "utf-8");
  } catch (err: unknown) {
    throw ioError("Cannot read file", path, err);
  }
}

function writeText(path: string, content: string): void {
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
  } catch (err: unknown) {
    throw ioError("Cannot write file", path, err);
  }
}

function copyFile(from: string, to: string): void {
  try {
    mkdirSync(dirname(to), { recursive: true });
    copyFileSync(from, to);
  } catch (err: unknown) {
    throw ioError("Cannot copy file", from, err);
  }
}

function ioError(action: string, path: string, err: unknown): DocnormError {
  const msg = err instanceof Error ? err.message : String(err);
  return new DocnormError(`${action} ${path}: ${msg}`, "io", path, { cause: err });
}
