import { describe, it, expect, afterEach } from "vitest";
import { join } from "node:path";
import { runCli, type CliStreams } from "../src/cli.js";
import { makeTree, removeTree } from "./helpers.js";

function capture(): CliStreams & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: { write: (chunk: string) => out.push(chunk) },
    stderr: { write: (chunk: string) => err.push(chunk) },
  };
}

describe("runCli", () => {
  const roots: string[] = [];
  const tree = (files: Record<string, string>) => {
    const root = makeTree(files);
    roots.push(root);
    return root;
  };

  afterEach(() => {
    for (const root of roots.splice(0)) removeTree(root);
  });

  it("prints changed documents in dry-run mode", async () => {
    const input = tree({
      "intro.md": "preamble\n# Intro\n",
      "same.md": "# Same\n",
      "docnorm.config.json": "{}",
    });
    const io = capture();

    const code = await runCli(
      [input, join(input, "out"), "--dry-run", "-c", join(input, "docnorm.config.json")],
      io,
    );

    expect(code).toBe(0);
    expect(io.out).toEqual(["intro.md\n"]);
    expect(io.err).toEqual([]);
  });

  it("exits 2 with the usage text when output_dir is missing", async () => {
    const io = capture();

    expect(await runCli(["only-input"], io)).toBe(2);
    expect(io.err[0].startsWith("[error] output_dir is required unless --in-place is set\n\ndocnorm v")).toBe(true);
  });

  it("prints collected warnings before a fatal write error", async () => {
    const input = tree({ "a.md": "# A\n" });
    const blocked = tree({ blocker: "not a directory" });
    const output = join(blocked, "blocker", "out");
    const missing = join(input, "missing.json");
    const io = capture();

    const code = await runCli([input, output, "--config", missing], io);

    expect(code).toBe(1);
    expect(io.err[0]).toBe(`[warn] config: Config file not found: ${missing}\n`);
    expect(io.err[1].startsWith(`[error] Cannot write file ${join(output, "a.md")}: `)).toBe(true);
    expect(io.err).toHaveLength(2);
  });

  it("keeps warnings quiet on a fatal error with --quiet", async () => {
    const input = tree({ "a.md": "# A\n" });
    const blocked = tree({ blocker: "not a directory" });
    const io = capture();

    const code = await runCli(
      [input, join(blocked, "blocker", "out"), "-q", "--config", join(input, "missing.json")],
      io,
    );

    expect(code).toBe(1);
    expect(io.err).toHaveLength(1);
    expect(io.err[0].startsWith("[error] Cannot write file ")).toBe(true);
  });
});
