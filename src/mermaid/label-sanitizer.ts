// src/mermaid/label-sanitizer.ts — Replace markdown the renderer rejects inside node text
// Applies to every mermaid block, flowchart or not.

export const LIST_PLACEHOLDER = "Unsupported markdown: list";
export const LINK_PLACEHOLDER = "Unsupported markdown: link";

const NODE_TEXT = /\["(.*?)"\]/g;
const LINE_BREAK = /<br\s*\/?>/;
const LIST_ITEM = /^\s*(?:\d+\.\s+|[-*+]\s+)/;
const MARKDOWN_LINK = /\[[^\]]+\]\([^)]+\)/g;
const BARE_URL = /https?:\/\/\S+/g;

/**
 * True when any `<br>`-separated part of the label starts like a list item.
 */
export function containsListMarker(label: string): boolean {
  return label.split(LINE_BREAK).some((part) => LIST_ITEM.test(part.trim()));
}

export function sanitizeLabel(label: string): string {
  if (containsListMarker(label)) return LIST_PLACEHOLDER;
  return label
    .replace(MARKDOWN_LINK, LINK_PLACEHOLDER)
    .replace(BARE_URL, LINK_PLACEHOLDER);
}

export function sanitizeNodeLabels(lines: readonly string[]): string[] {
  return lines.map((line) =>
    line.replace(NODE_TEXT, (_match, text: string) => `["${sanitizeLabel(text)}"]`),
  );
}
