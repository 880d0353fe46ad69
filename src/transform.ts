// src/transform.ts — Whole-document transform
// Pass order is fixed; later passes rely on what earlier ones produce.

import type { TransformOptions } from "./types.js";
import { DEFAULT_SECTION_ANCHORS } from "./types.js";
import { stripPreamble, removeLinkCopied, removeAskDevinLines } from "./page-cleanup.js";
import { fixInternalLinks, fixSectionLinks, stripGithubBlobSha } from "./link-rewriter.js";
import { sanitizeMermaid } from "./mermaid/block-extractor.js";

/**
 * Normalize one markdown document. Applying it twice gives the same result
 * as applying it once.
 */
export function processText(text: string, options: TransformOptions = {}): string {
  const sectionAnchors = options.sectionAnchors ?? DEFAULT_SECTION_ANCHORS;

  let result = stripPreamble(text);
  result = removeLinkCopied(result);
  result = removeAskDevinLines(result);
  result = fixInternalLinks(result);
  result = fixSectionLinks(result, sectionAnchors);
  result = stripGithubBlobSha(result);
  result = sanitizeMermaid(result);
  return result;
}
