// src/ordinal.ts — Number the pages a README index lists (01-, 02-, ...)
// Works on the in-memory document set, so dry runs report renames too.

import { posix } from "node:path";
import type { DocumentResult } from "./types.js";
import { splitLines } from "./text-lines.js";

const BROKEN_LINK = /\]\([^)]*\n[^)]*\)/g;
const INDEX_ITEM = /^\s*-\s+\[[^\]]+\]\(([^)]+)\)\s*$/;
const MARKDOWN_LINK_TARGET = /\]\(([^)]+)\)/g;
const ALREADY_NUMBERED = /^\d{2}-/;
const README = "README.md";

function isExternal(target: string): boolean {
  return target.startsWith("http://") || target.startsWith("https://");
}

/**
 * Local `.md` targets of the `- [Title](target)` lines in a README, in order.
 */
export function parseReadmeIndex(text: string): string[] {
  const joined = text.replace(BROKEN_LINK, (match) => match.replaceAll("\n", ""));
  const items: string[] = [];
  for (const line of splitLines(joined)) {
    const match = INDEX_ITEM.exec(line);
    if (!match) continue;
    const target = match[1];
    if (isExternal(target) || !target.toLowerCase().endsWith(".md")) continue;
    items.push(target);
  }
  return items;
}

/**
 * Map each index target to its numbered name. Numbering follows index
 * position, so already-numbered entries still take up a slot.
 */
export function buildOrdinalMapping(readmeText: string): Map<string, string> {
  const mapping = new Map<string, string>();
  parseReadmeIndex(readmeText).forEach((target, index) => {
    const slash = target.lastIndexOf("/");
    const dir = target.slice(0, slash + 1);
    const filename = target.slice(slash + 1);
    if (ALREADY_NUMBERED.test(filename)) return;
    const ordinal = String(index + 1).padStart(2, "0");
    mapping.set(target, `${dir}${ordinal}-${filename}`);
  });
  return mapping;
}

/**
 * Rewrite `](target)` links that resolve, from `fromDir`, to a renamed
 * document. Only the file name changes; any `./`, `../` or directory part and
 * the `#anchor` are kept.
 */
export function rewriteMarkdownLinks(
  text: string,
  fromDir: string,
  renames: ReadonlyMap<string, string>,
): string {
  return text.replace(MARKDOWN_LINK_TARGET, (match, target: string) => {
    if (isExternal(target) || target.startsWith("/")) return match;

    const hash = target.indexOf("#");
    const path = hash === -1 ? target : target.slice(0, hash);
    const anchor = hash === -1 ? "" : target.slice(hash);
    if (path === "") return match;

    const renamed = renames.get(posix.join(fromDir, path));
    if (renamed === undefined) return match;
    const prefix = path.slice(0, path.lastIndexOf("/") + 1);
    return `](${prefix}${posix.basename(renamed)}${anchor})`;
  });
}

function depth(path: string): number {
  return path.split("/").length;
}

/**
 * Rename the pages each README index lists, then point every link at a
 * renamed page to its new name. The README nearest to a page numbers it;
 * entries naming no document are ignored. Mutates `documents`.
 */
export function applyReadmeOrdinals(documents: DocumentResult[]): void {
  const byPath = new Map<string, DocumentResult>(documents.map((doc) => [doc.relativePath, doc]));
  const readmes = documents
    .filter((doc) => posix.basename(doc.relativePath) === README)
    .sort((a, b) => depth(b.relativePath) - depth(a.relativePath) || (a.relativePath < b.relativePath ? -1 : 1));

  // old path → new path, relative to the input root
  const renames = new Map<string, string>();
  for (const readme of readmes) {
    const dir = posix.dirname(readme.relativePath);
    for (const [from, to] of buildOrdinalMapping(readme.updated)) {
      const oldPath = posix.join(dir, from);
      if (renames.has(oldPath) || !byPath.has(oldPath)) continue;
      renames.set(oldPath, posix.join(dir, to));
    }
  }
  if (renames.size === 0) return;

  for (const doc of documents) {
    doc.updated = rewriteMarkdownLinks(doc.updated, posix.dirname(doc.relativePath), renames);
  }
  for (const [oldPath, newPath] of renames) {
    const doc = byPath.get(oldPath);
    if (doc) doc.outputRelativePath = newPath;
  }
}
