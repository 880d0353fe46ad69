// src/config.ts — Config Resolver
// Merge order: defaults ← config file ← CLI args. Arguments are parsed with mri.

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import type { FileConfig, ResolvedConfig, Warning } from "./types.js";
import { DEFAULT_SECTION_ANCHORS, DocnormError } from "./types.js";

export interface ParsedArgs {
  positionals: string[];
  inPlace: boolean;
  dryRun: boolean;
  ordinal?: boolean;
  exclude: string[];
  config?: string;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
}

const CONFIG_FILENAME = "docnorm.config.json";
const PACKAGE_JSON_KEY = "docnorm";

/**
 * Resolve config from CLI args, config file, and defaults.
 * Throws a usage error when the output directory is missing outside
 * in-place mode.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const [input, output] = args.positionals;
  if (!input) {
    throw new DocnormError("input_dir is required", "usage");
  }
  if (!args.inPlace && !output) {
    throw new DocnormError("output_dir is required unless --in-place is set", "usage");
  }
  if (args.inPlace && output) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `--in-place is set; ignoring output_dir ${output}`,
    });
  }

  const fileConfig = loadConfigFile(args.config, cwd, warnings);
  const inputDir = resolve(cwd, input);

  return {
    inputDir,
    outputDir: args.inPlace || !output ? inputDir : resolve(cwd, output),
    inPlace: args.inPlace,
    dryRun: args.dryRun,
    ordinal: args.ordinal ?? fileConfig?.ordinal ?? false,
    exclude: [...(fileConfig?.exclude ?? []), ...args.exclude],
    sectionAnchors: { ...DEFAULT_SECTION_ANCHORS, ...fileConfig?.sectionAnchors },
    verbose: args.verbose,
    quiet: args.quiet,
  };
}

function loadConfigFile(
  configPath: string | undefined,
  cwd: string,
  warnings: Warning[],
): FileConfig | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  // docnorm key in package.json
  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      if (isRecord(pkg) && PACKAGE_JSON_KEY in pkg) {
        return toFileConfig(pkg[PACKAGE_JSON_KEY], pkgJson, warnings);
      }
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({
        level: "info",
        module: "config",
        message: `Skipping unparsable package.json: ${msg}`,
        file: pkgJson,
      });
    }
  }

  return null;
}

function parseConfigFile(
  filePath: string,
  warnings: Warning[],
): FileConfig | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    return toFileConfig(parsed, filePath, warnings);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

/**
 * Keep the recognized, well-typed keys of a config object; warn about the rest.
 */
export function toFileConfig(
  value: unknown,
  file: string,
  warnings: Warning[],
): FileConfig | null {
  if (!isRecord(value)) {
    warnings.push({ level: "warn", module: "config", message: "Config must be a JSON object", file });
    return null;
  }

  const config: FileConfig = {};
  const invalid = (key: string, expected: string) =>
    warnings.push({
      level: "warn",
      module: "config",
      message: `Ignoring "${key}": expected ${expected}`,
      file,
    });

  if (value.exclude !== undefined) {
    if (Array.isArray(value.exclude) && value.exclude.every((p) => typeof p === "string")) {
      config.exclude = value.exclude.filter((p): p is string => typeof p === "string");
    } else {
      invalid("exclude", "an array of glob strings");
    }
  }

  if (value.sectionAnchors !== undefined) {
    const anchors = value.sectionAnchors;
    if (isRecord(anchors) && Object.values(anchors).every((a) => typeof a === "string")) {
      config.sectionAnchors = Object.fromEntries(
        Object.entries(anchors).filter((e): e is [string, string] => typeof e[1] === "string"),
      );
    } else {
      invalid("sectionAnchors", "an object of section name → anchor strings");
    }
  }

  if (value.ordinal !== undefined) {
    if (typeof value.ordinal === "boolean") config.ordinal = value.ordinal;
    else invalid("ordinal", "a boolean");
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStringList(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  const list: unknown[] = Array.isArray(value) ? value : [value];
  return list.map(String).filter((s) => s !== "");
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(
  argv: string[],
): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { c: "config", q: "quiet", v: "verbose", x: "exclude", h: "help" },
    boolean: ["in-place", "dry-run", "ordinal", "quiet", "verbose", "help"],
    string: ["config", "exclude"],
  });

  return {
    positionals: args._.map(String),
    inPlace: args["in-place"] ?? false,
    dryRun: args["dry-run"] ?? false,
    // Only an explicit --ordinal / --no-ordinal overrides the config file
    ordinal: argv.some((a) => a === "--ordinal" || a === "--no-ordinal")
      ? Boolean(args.ordinal)
      : undefined,
    exclude: toStringList(args.exclude),
    config: args.config ?? undefined,
    quiet: args.quiet ?? false,
    verbose: args.verbose ?? false,
    help: args.help ?? false,
  };
}
