// src/mermaid/branch-resolver.ts — Move yes/no labels onto the decision edge they describe
//
// Exporters often write `A -->|"yes"| B` where B is the decision node and the
// "yes" really belongs on one of B's exits. For each such label this picks the
// exit whose destination text best matches the label's polarity, or leaves
// the diagram alone when the evidence is ambiguous.

import type { Edge, EdgeModel, LabelMove, Polarity } from "../types.js";

export const BRANCH_LABELS: ReadonlySet<string> = new Set(["yes", "no", "true", "false"]);

// "remove" is kept as a positive hint; dropping it would change which exits
// existing documents resolve to.
export const POSITIVE_HINTS: readonly string[] = [
  "add",
  "use",
  "enable",
  "create",
  "remove",
  "success",
  "ready",
  "connected",
  "established",
  "proceed",
  "continue",
];

export const NEGATIVE_HINTS: readonly string[] = [
  "fail",
  "error",
  "invalid",
  "reject",
  "timeout",
  "blocked",
  "missing",
  "not",
  "false",
  "empty",
  "return",
  "skip",
  "default",
];

export function isBranchLabel(label: string | undefined): label is string {
  return label !== undefined && BRANCH_LABELS.has(label.trim().toLowerCase());
}

export function labelPolarity(label: string): Polarity | null {
  const lowered = label.trim().toLowerCase();
  if (lowered === "yes" || lowered === "true") return "positive";
  if (lowered === "no" || lowered === "false") return "negative";
  return null;
}

/**
 * Score destination text for a polarity. Each hint counts once if it appears
 * anywhere in the text, case-insensitively.
 */
export function edgeScore(text: string, polarity: Polarity): number {
  const lowered = text.toLowerCase();
  const positive = POSITIVE_HINTS.filter((hint) => lowered.includes(hint)).length;
  const negative = NEGATIVE_HINTS.filter((hint) => lowered.includes(hint)).length;
  return polarity === "positive" ? positive - negative : negative - positive;
}

/**
 * Pick the candidate edge a branch label should move to, or null to abstain.
 * Ties are never broken; a best score of zero or less falls back to the only
 * unlabeled candidate, if there is exactly one.
 */
export function chooseEdge(
  edges: readonly Edge[],
  nodeLabels: ReadonlyMap<string, string>,
  candidates: readonly number[],
  polarity: Polarity,
): number | null {
  if (candidates.length === 0) return null;
  if (candidates.length === 1) return candidates[0];

  const scored = candidates.map((index) => {
    const destination = edges[index].destination;
    return { index, score: edgeScore(nodeLabels.get(destination) ?? destination, polarity) };
  });
  const best = Math.max(...scored.map((s) => s.score));

  if (best <= 0) {
    const unlabeled = candidates.filter((index) => edges[index].label === undefined);
    return unlabeled.length === 1 ? unlabeled[0] : null;
  }

  const winners = scored.filter((s) => s.score === best);
  return winners.length === 1 ? winners[0].index : null;
}

/**
 * Relocate branch labels in place, in file order, first come first served.
 * Returns the moves performed.
 */
export function resolveBranchLabels(model: EdgeModel): LabelMove[] {
  const { edges } = model;
  // Targets already handed to an earlier label in this pass.
  const claimed = new Set<number>();
  const moves: LabelMove[] = [];

  edges.forEach((edge, index) => {
    const label = edge.label;
    const target = findTarget(model, index, claimed);
    if (target === null || label === undefined) return;

    edges[target].label = label;
    edge.label = undefined;
    claimed.add(target);
    moves.push({ from: index, to: target, label });
  });

  return moves;
}

function findTarget(
  model: EdgeModel,
  index: number,
  claimed: ReadonlySet<number>,
): number | null {
  const { edges, nodeLabels, outgoing } = model;
  const edge = edges[index];

  if (claimed.has(index)) return null;
  if (!isBranchLabel(edge.label)) return null;
  // A label on a single-exit source feeding a decision node is the only kind we move.
  if ((outgoing.get(edge.source)?.length ?? 0) > 1) return null;

  const exits = outgoing.get(edge.destination) ?? [];
  if (exits.length < 2) return null;

  const candidates = exits.filter((i) => edges[i].label === undefined);
  if (candidates.length === 0) return null;

  const polarity = labelPolarity(edge.label);
  if (polarity === null) return null;
  return chooseEdge(edges, nodeLabels, candidates, polarity);
}
