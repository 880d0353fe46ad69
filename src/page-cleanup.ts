// src/page-cleanup.ts — Strip exporter noise from generated wiki pages

import { splitLines, joinLines } from "./text-lines.js";

const LINK_COPIED = /\s*Link copied!/g;
const ASK_PROMPT_PREFIX = "Ask Devin about";

/**
 * Drop everything above the first markdown heading. Pages without a heading,
 * or that already start with one, come back untouched.
 */
export function stripPreamble(text: string): string {
  const lines = splitLines(text);
  const firstHeading = lines.findIndex((line) => line.trimStart().startsWith("#"));
  if (firstHeading <= 0) return text;
  return joinLines(lines.slice(firstHeading), text);
}

export function removeLinkCopied(text: string): string {
  return text.replace(LINK_COPIED, "");
}

/**
 * Remove the "Ask Devin about ..." prompt lines the exporter appends to
 * sections.
 */
export function removeAskDevinLines(text: string): string {
  const kept = splitLines(text).filter(
    (line) => !line.trim().startsWith(ASK_PROMPT_PREFIX),
  );
  return joinLines(kept, text);
}
