// src/text-lines.ts — Line splitting that round-trips the trailing newline

/**
 * Split text into lines. A trailing newline does not produce an empty last
 * line, and a `\r` before each `\n` is dropped.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Join lines back together, ending with a newline only if `original` did.
 */
export function joinLines(lines: readonly string[], original: string): string {
  const joined = lines.join("\n");
  return original.endsWith("\n") ? joined + "\n" : joined;
}
