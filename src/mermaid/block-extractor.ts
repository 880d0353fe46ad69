// src/mermaid/block-extractor.ts — Find mermaid fences and repair their bodies
// Every block is label-sanitized; only flowchart/graph blocks get branch
// label relocation.

import { splitLines, joinLines } from "../text-lines.js";
import { sanitizeNodeLabels } from "./label-sanitizer.js";
import { buildEdgeModel } from "./edge-model.js";
import { resolveBranchLabels } from "./branch-resolver.js";
import { rewriteLines } from "./line-rewriter.js";

const FENCE = "```";
const FLOWCHART_KEYWORDS = ["flowchart", "graph"] as const;

export type DiagramKind = "flowchart" | "other";

/**
 * Classify a block by its first non-blank line.
 */
export function diagramKind(lines: readonly string[]): DiagramKind {
  const first = lines.find((line) => line.trim() !== "");
  if (first === undefined) return "other";
  const trimmed = first.trim();
  return FLOWCHART_KEYWORDS.some((keyword) => trimmed.startsWith(keyword))
    ? "flowchart"
    : "other";
}

/**
 * Relocate branch labels in one flowchart body.
 */
export function moveBranchLabels(lines: readonly string[]): string[] {
  const model = buildEdgeModel(lines);
  resolveBranchLabels(model);
  return rewriteLines(lines, model.edges);
}

export function sanitizeMermaidBlock(lines: readonly string[]): string[] {
  const sanitized = sanitizeNodeLabels(lines);
  if (diagramKind(sanitized) === "flowchart") {
    return moveBranchLabels(sanitized);
  }
  return sanitized;
}

function isOpeningFence(line: string): boolean {
  return line.startsWith(FENCE) && line.includes("mermaid");
}

/**
 * Rewrite the body of every mermaid fence in a document. An unterminated
 * block at the end of the document is still repaired.
 */
export function sanitizeMermaid(text: string): string {
  const out: string[] = [];
  let block: string[] | null = null;

  for (const line of splitLines(text)) {
    if (block === null) {
      out.push(line);
      if (isOpeningFence(line)) block = [];
      continue;
    }

    if (line.startsWith(FENCE)) {
      out.push(...sanitizeMermaidBlock(block), line);
      block = null;
    } else {
      block.push(line);
    }
  }

  if (block !== null) out.push(...sanitizeMermaidBlock(block));

  return joinLines(out, text);
}
