// src/cli.ts — Command-line flow: parse, resolve, normalize, report
// Returns the exit code; warnings collected so far are printed even when a
// fatal error cuts the run short.

import { relative } from "node:path";
import { normalize, DocnormError, ENGINE_VERSION } from "./index.js";
import { parseCliArgs, resolveConfig } from "./config.js";
import type { Warning } from "./types.js";

const HELP_TEXT = `
docnorm v${ENGINE_VERSION}

Usage:
  docnorm <input_dir> <output_dir> [options]
  docnorm <input_dir> --in-place [options]

Arguments:
  input_dir            Directory of exported wiki pages
  output_dir           Where to write normalized pages (required unless --in-place)

Options:
  --in-place           Rewrite files in place instead of writing to output_dir
  --dry-run            Print files that would change without writing output
  --ordinal            Prefix pages listed in each README index with 01-, 02-, ...
  --exclude, -x        Glob of relative paths to skip (repeatable)
  --config, -c         Path to config file (default: docnorm.config.json)
  --quiet, -q          Suppress warnings
  --verbose, -v        Print progress to stderr
  --help, -h           Show this help text

Examples:
  docnorm ./export ./docs
  docnorm ./docs --in-place --ordinal
  docnorm ./export ./docs --dry-run
`.trim();

export interface CliStreams {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
}

function printWarnings(warnings: Warning[], stderr: CliStreams["stderr"]): void {
  for (const w of warnings) {
    const where = w.file ? ` (${w.file})` : "";
    stderr.write(`[${w.level}] ${w.module}: ${w.message}${where}\n`);
  }
}

export async function runCli(
  argv: string[],
  streams: CliStreams = process,
): Promise<number> {
  const { stdout, stderr } = streams;
  const warnings: Warning[] = [];
  let quiet = false;

  try {
    const args = await parseCliArgs(argv);
    quiet = args.quiet;

    if (args.help) {
      stdout.write(HELP_TEXT + "\n");
      return 0;
    }

    const config = resolveConfig(args, warnings);
    const summary = normalize(config, warnings);

    if (!quiet) printWarnings(warnings, stderr);

    if (config.dryRun) {
      for (const path of summary.changed) {
        stdout.write(path + "\n");
      }
    } else if (config.verbose) {
      stderr.write(
        `[INFO] Wrote ${summary.documents.length} documents and copied ${summary.copied.length} files to ${relative(process.cwd(), config.outputDir) || "."}\n`,
      );
    }
    return 0;
  } catch (err: unknown) {
    if (!quiet) printWarnings(warnings, stderr);
    if (err instanceof DocnormError && err.code === "usage") {
      stderr.write(`[error] ${err.message}\n\n${HELP_TEXT}\n`);
      return 2;
    }
    const msg = err instanceof Error ? err.message : String(err);
    stderr.write(`[error] ${msg}\n`);
    return 1;
  }
}
