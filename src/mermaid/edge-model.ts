// src/mermaid/edge-model.ts — Line grammar and directed-edge model for flowchart blocks
//
// Grammar, one line at a time:
//   node   := ws? ID ws? '["' text '"]' ...
//   edge   := ws? ID ws? ARROW ws? ('|"' label '"|' ws?)? ID ws?    (whole line)
//   other  := anything else
// ID is [A-Za-z0-9_]+ and ARROW is one or more of - . = followed by >.

import type { DiagramLine, Edge, EdgeModel } from "../types.js";

const NODE_DECLARATION = /^\s*([A-Za-z0-9_]+)\s*\["(.*?)"\]/;
const EDGE_LINE =
  /^(\s*)([A-Za-z0-9_]+)\s*([-.=]+>)\s*(?:\|"([^"]*)"\|\s*)?([A-Za-z0-9_]+)\s*$/;

/**
 * Classify a single diagram line.
 */
export function parseLine(line: string, position: number): DiagramLine {
  const edge = EDGE_LINE.exec(line);
  if (edge) {
    const [, indent, source, arrow, , destination] = edge;
    // Unmatched optional group: undefined, not "".
    const label: string | undefined = edge[4];
    return {
      kind: "edge",
      position,
      edge: { position, indent, source, arrow, label, destination },
    };
  }

  const node = NODE_DECLARATION.exec(line);
  if (node) {
    return { kind: "node", position, id: node[1], text: node[2] };
  }

  return { kind: "other", position, raw: line };
}

export function parseLines(lines: readonly string[]): DiagramLine[] {
  return lines.map((line, position) => parseLine(line, position));
}

/**
 * Build the edge list, node label map and outgoing index for one block.
 * Later node declarations overwrite earlier ones.
 */
export function buildEdgeModel(lines: readonly string[]): EdgeModel {
  const edges: Edge[] = [];
  const nodeLabels = new Map<string, string>();
  const outgoing = new Map<string, number[]>();

  for (const parsed of parseLines(lines)) {
    switch (parsed.kind) {
      case "node":
        nodeLabels.set(parsed.id, parsed.text);
        break;
      case "edge": {
        const index = edges.push(parsed.edge) - 1;
        const list = outgoing.get(parsed.edge.source);
        if (list) list.push(index);
        else outgoing.set(parsed.edge.source, [index]);
        break;
      }
      case "other":
        break;
    }
  }

  return { edges, nodeLabels, outgoing };
}
