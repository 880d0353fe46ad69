// src/types.ts — Shared types for docnorm

// ─── Diagram model ───────────────────────────────────────────────────────────

/** One directed connection parsed from a single flowchart line. */
export interface Edge {
  /** Index of the source line inside the diagram block. */
  position: number;
  indent: string;
  source: string;
  destination: string;
  /** Arrow glyphs exactly as written (`-->`, `-.->`, `==>`, ...). */
  arrow: string;
  /** `undefined` when the line carries no `|"..."|` block. */
  label?: string;
}

/** One line of a diagram block, classified by the line grammar. */
export type DiagramLine =
  | { kind: "node"; position: number; id: string; text: string }
  | { kind: "edge"; position: number; edge: Edge }
  | { kind: "other"; position: number; raw: string };

export interface EdgeModel {
  edges: Edge[];
  nodeLabels: Map<string, string>;
  /** Source id → indices into `edges`, in file order. */
  outgoing: Map<string, number[]>;
}

export type Polarity = "positive" | "negative";

export interface LabelMove {
  from: number;
  to: number;
  label: string;
}

// ─── Configuration ───────────────────────────────────────────────────────────

export interface ResolvedConfig {
  inputDir: string;
  outputDir: string;
  inPlace: boolean;
  dryRun: boolean;
  ordinal: boolean;
  exclude: string[];
  sectionAnchors: Record<string, string>;
  verbose: boolean;
  quiet: boolean;
}

/** Shape accepted from docnorm.config.json or the `docnorm` key in package.json. */
export interface FileConfig {
  exclude?: string[];
  sectionAnchors?: Record<string, string>;
  ordinal?: boolean;
}

export interface TransformOptions {
  sectionAnchors?: Record<string, string>;
}

// ─── Processing results ──────────────────────────────────────────────────────

export interface DocumentResult {
  /** Path relative to the input root, using `/` separators. */
  relativePath: string;
  /** Path relative to the output root; differs from relativePath after ordinal renaming. */
  outputRelativePath: string;
  original: string;
  updated: string;
}

export interface ProcessSummary {
  documents: DocumentResult[];
  copied: string[];
  /** Relative output paths of documents whose content or name changed. */
  changed: string[];
}

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export type DocnormErrorCode = "usage" | "io";

export class DocnormError extends Error {
  constructor(
    message: string,
    public readonly code: DocnormErrorCode,
    public readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DocnormError";
  }
}

export const ENGINE_VERSION = "0.3.0";

export const DEFAULT_SECTION_ANCHORS: Readonly<Record<string, string>> = {
  "Networking Section": "networking-configuration",
  "Virtual Environment Section": "virtual-environment-setup",
  "Module Import Section": "module-import-issues",
  "WSL.exe Section": "wslexe-issues",
  "Path Translation Section": "path-translation-issues",
  "Performance Section": "performance-optimization",
  "Line Ending Section": "line-ending-issues",
  "Distribution Section": "distribution-selection",
};

export const DOCUMENT_EXTENSION = /\.md$/i;
