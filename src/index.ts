// src/index.ts — Library API
// processText() for a single document, normalize() for a directory tree.

import type { ProcessSummary, ResolvedConfig, Warning } from "./types.js";
import { DEFAULT_SECTION_ANCHORS } from "./types.js";
import { processDirectory } from "./processor.js";

export type {
  Edge,
  DiagramLine,
  EdgeModel,
  Polarity,
  LabelMove,
  ResolvedConfig,
  FileConfig,
  TransformOptions,
  DocumentResult,
  ProcessSummary,
  Warning,
  DocnormErrorCode,
} from "./types.js";
export { DocnormError, DEFAULT_SECTION_ANCHORS, ENGINE_VERSION } from "./types.js";

export { processText } from "./transform.js";
export { stripPreamble, removeLinkCopied, removeAskDevinLines } from "./page-cleanup.js";
export { fixInternalLinks, fixSectionLinks, stripGithubBlobSha } from "./link-rewriter.js";
export { sanitizeMermaid, sanitizeMermaidBlock, moveBranchLabels, diagramKind } from "./mermaid/block-extractor.js";
export type { DiagramKind } from "./mermaid/block-extractor.js";
export { sanitizeLabel, sanitizeNodeLabels, LIST_PLACEHOLDER, LINK_PLACEHOLDER } from "./mermaid/label-sanitizer.js";
export { parseLine, parseLines, buildEdgeModel } from "./mermaid/edge-model.js";
export { resolveBranchLabels, chooseEdge, edgeScore } from "./mermaid/branch-resolver.js";
export { formatEdge, rewriteLines } from "./mermaid/line-rewriter.js";
export { parseReadmeIndex, buildOrdinalMapping, rewriteMarkdownLinks, applyReadmeOrdinals } from "./ordinal.js";
export { discoverFiles } from "./file-discovery.js";
export { processDirectory } from "./processor.js";

/**
 * Normalize a directory tree. `outputDir` defaults to `inputDir` (in place).
 */
export function normalize(
  options: Partial<ResolvedConfig> & { inputDir: string },
  warnings: Warning[] = [],
): ProcessSummary {
  return processDirectory(
    {
      inputDir: options.inputDir,
      outputDir: options.outputDir ?? options.inputDir,
      dryRun: options.dryRun ?? false,
      ordinal: options.ordinal ?? false,
      exclude: options.exclude ?? [],
      sectionAnchors: options.sectionAnchors ?? { ...DEFAULT_SECTION_ANCHORS },
      verbose: options.verbose ?? false,
    },
    warnings,
  );
}
