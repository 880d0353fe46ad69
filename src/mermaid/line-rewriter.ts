// src/mermaid/line-rewriter.ts — Serialize edges back onto their source lines

import type { Edge } from "../types.js";

export function formatEdge(edge: Edge): string {
  const label = edge.label === undefined ? "" : `|"${edge.label}"|`;
  return `${edge.indent}${edge.source} ${edge.arrow}${label} ${edge.destination}`;
}

/**
 * Return a copy of `lines` with every edge line regenerated from its record.
 * Lines that are not edges are copied through unchanged.
 */
export function rewriteLines(lines: readonly string[], edges: readonly Edge[]): string[] {
  const out = [...lines];
  for (const edge of edges) {
    out[edge.position] = formatEdge(edge);
  }
  return out;
}
