import { describe, it, expect } from "vitest";
import { buildEdgeModel } from "../src/mermaid/edge-model.js";
import {
  resolveBranchLabels,
  chooseEdge,
  edgeScore,
  isBranchLabel,
  labelPolarity,
} from "../src/mermaid/branch-resolver.js";
import type { Edge } from "../src/types.js";

function labels(lines: string[]): (string | undefined)[] {
  const model = buildEdgeModel(lines);
  resolveBranchLabels(model);
  return model.edges.map((e) => e.label);
}

// ─── Scoring ─────────────────────────────────────────────────────────────────

describe("edgeScore", () => {
  it("scores positive text for positive polarity", () => {
    expect(edgeScore("Success", "positive")).toBe(1);
  });

  it("penalizes negative hints for positive polarity", () => {
    expect(edgeScore("Error: timeout", "positive")).toBe(-2);
  });

  it("reverses the sign for negative polarity", () => {
    expect(edgeScore("Error: timeout", "negative")).toBe(2);
    expect(edgeScore("Success", "negative")).toBe(-1);
  });

  it("counts each hint once, as a substring", () => {
    expect(edgeScore("Use useful users", "positive")).toBe(1);
    // "remove" and the "use" inside "user"
    expect(edgeScore("Remove user", "positive")).toBe(2);
  });

  it("is case-insensitive", () => {
    expect(edgeScore("CONNECTED", "positive")).toBe(1);
  });
});

describe("labelPolarity / isBranchLabel", () => {
  it("classifies branch words regardless of case and padding", () => {
    expect(labelPolarity("Yes")).toBe("positive");
    expect(labelPolarity(" TRUE ")).toBe("positive");
    expect(labelPolarity("no")).toBe("negative");
    expect(labelPolarity("False")).toBe("negative");
    expect(labelPolarity("maybe")).toBeNull();
  });

  it("only treats yes/no/true/false as branch labels", () => {
    expect(isBranchLabel("YES")).toBe(true);
    expect(isBranchLabel("ok")).toBe(false);
    expect(isBranchLabel(undefined)).toBe(false);
    expect(isBranchLabel("")).toBe(false);
  });
});

// ─── chooseEdge ──────────────────────────────────────────────────────────────

describe("chooseEdge", () => {
  const edge = (destination: string, label?: string): Edge => ({
    position: 0,
    indent: "",
    source: "B",
    arrow: "-->",
    destination,
    label,
  });

  it("returns null for no candidates", () => {
    expect(chooseEdge([], new Map(), [], "positive")).toBeNull();
  });

  it("picks a lone candidate without scoring", () => {
    const edges = [edge("X")];
    expect(chooseEdge(edges, new Map([["X", "Error"]]), [0], "positive")).toBe(0);
  });

  it("picks the single highest scorer", () => {
    const edges = [edge("S"), edge("E")];
    const nodes = new Map([["S", "Success"], ["E", "Error: timeout"]]);
    expect(chooseEdge(edges, nodes, [0, 1], "positive")).toBe(0);
    expect(chooseEdge(edges, nodes, [0, 1], "negative")).toBe(1);
  });

  it("abstains on a tie at a positive score", () => {
    const edges = [edge("R1"), edge("R2")];
    const nodes = new Map([["R1", "Ready"], ["R2", "Ready to ship"]]);
    expect(chooseEdge(edges, nodes, [0, 1], "positive")).toBeNull();
  });

  it("falls back to the only unlabeled candidate when nothing scores", () => {
    const edges = [edge("X"), edge("Y", "maybe")];
    expect(chooseEdge(edges, new Map(), [0, 1], "positive")).toBe(0);
  });

  it("abstains when nothing scores and several candidates are unlabeled", () => {
    const edges = [edge("X"), edge("Y")];
    expect(chooseEdge(edges, new Map(), [0, 1], "positive")).toBeNull();
  });

  it("uses the raw node id when the destination is undeclared", () => {
    const edges = [edge("proceed"), edge("halt")];
    expect(chooseEdge(edges, new Map(), [0, 1], "positive")).toBe(0);
  });
});

// ─── resolveBranchLabels ─────────────────────────────────────────────────────

describe("resolveBranchLabels", () => {
  it("moves an incoming yes onto the success exit of the decision node", () => {
    const model = buildEdgeModel([
      'A -->|"yes"| B',
      "B --> S",
      "B --> E",
      'S["Success"]',
      'E["Error: timeout"]',
    ]);

    const moves = resolveBranchLabels(model);

    expect(moves).toEqual([{ from: 0, to: 1, label: "yes" }]);
    expect(model.edges.map((e) => e.label)).toEqual([undefined, "yes", undefined]);
  });

  it("moves an incoming no onto the failure exit", () => {
    expect(
      labels([
        'A -->|"no"| B',
        "B --> S",
        "B --> E",
        'S["Success"]',
        'E["Error: timeout"]',
      ]),
    ).toEqual([undefined, undefined, "no"]);
  });

  it("keeps the label's original spelling when moving it", () => {
    expect(
      labels(['A -->|"YES"| B', "B --> S", "B --> E", 'S["Ready"]', 'E["Invalid"]']),
    ).toEqual([undefined, "YES", undefined]);
  });

  it("never relocates a label whose source has several exits", () => {
    const model = buildEdgeModel([
      'A -->|"yes"| B',
      "A --> C",
      "B --> S",
      "B --> E",
      'S["Success"]',
      'E["Error"]',
    ]);

    expect(resolveBranchLabels(model)).toEqual([]);
    expect(model.edges[0].label).toBe("yes");
  });

  it("abstains when the exits tie", () => {
    const model = buildEdgeModel(['A -->|"yes"| B', "B --> X", "B --> Y"]);
    expect(resolveBranchLabels(model)).toEqual([]);
    expect(model.edges.map((e) => e.label)).toEqual(["yes", undefined, undefined]);
  });

  it("does nothing when the destination is not a decision node", () => {
    const model = buildEdgeModel(['A -->|"yes"| B', "B --> S", 'S["Success"]']);
    expect(resolveBranchLabels(model)).toEqual([]);
  });

  it("ignores labels that are not branch words", () => {
    const model = buildEdgeModel(['A -->|"retry"| B', "B --> S", "B --> E", 'S["Success"]']);
    expect(resolveBranchLabels(model)).toEqual([]);
  });

  it("never overwrites an exit that already has a label", () => {
    // S would score highest, but it is labeled, which leaves E as the lone candidate.
    expect(
      labels([
        'A -->|"yes"| B',
        'B -->|"maybe"| S',
        "B --> E",
        'S["Success"]',
        'E["Error: timeout"]',
      ]),
    ).toEqual([undefined, "maybe", "yes"]);
  });

  it("abstains when every exit is already labeled", () => {
    expect(
      labels(['A -->|"yes"| B', 'B -->|"ok"| S', 'B -->|"ko"| E']),
    ).toEqual(["yes", "ok", "ko"]);
  });

  it("hands out targets first come first served", () => {
    const model = buildEdgeModel([
      'A -->|"yes"| B',
      'C -->|"true"| B',
      "B --> S",
      "B --> E",
      'S["Success"]',
      'E["Error: timeout"]',
    ]);

    const moves = resolveBranchLabels(model);

    expect(moves).toEqual([
      { from: 0, to: 2, label: "yes" },
      { from: 1, to: 3, label: "true" },
    ]);
    expect(new Set(moves.map((m) => m.to)).size).toBe(moves.length);
  });

  it("uses the most recent node declaration", () => {
    expect(
      labels([
        'A -->|"yes"| B',
        "B --> S",
        "B --> E",
        'S["Error"]',
        'S["Success"]',
        'E["Error: timeout"]',
      ]),
    ).toEqual([undefined, "yes", undefined]);
  });
});
