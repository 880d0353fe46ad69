// src/link-rewriter.ts — Site-relative links → absolute GitHub links
// Section links are remapped before blob SHAs are stripped, so the final
// anchor links carry no SHA.

import { DEFAULT_SECTION_ANCHORS } from "./types.js";

const GITHUB = "https://github.com";
const REPO_PATH = String.raw`/[^)/\s]+/[^)/\s]+(?:/[^\s)]*)?`;

const INTERNAL_LINK = new RegExp(String.raw`\]\((${REPO_PATH})\)`, "g");
const REF_STYLE_LINK = new RegExp(String.raw`^(\s*\[[^\]]+\]:\s*)(${REPO_PATH})`, "gm");
const BLOB_SHA = /https:\/\/github\.com\/([^/]+)\/([^/]+)\/blob\/([0-9a-f]{7,40})\//g;

/**
 * Prefix `](/owner/repo/...)` links and `[ref]: /owner/repo/...`
 * definitions with the GitHub origin.
 */
export function fixInternalLinks(text: string): string {
  return text
    .replace(INTERNAL_LINK, (_match, path: string) => `](${GITHUB}${path})`)
    .replace(REF_STYLE_LINK, (_match, lead: string, path: string) => `${lead}${GITHUB}${path}`);
}

/**
 * Point `.../blob/<sha>/<Section name>` links at the matching README anchor.
 */
export function fixSectionLinks(
  text: string,
  sectionAnchors: Readonly<Record<string, string>> = DEFAULT_SECTION_ANCHORS,
): string {
  let result = text;
  for (const [section, anchor] of Object.entries(sectionAnchors)) {
    const pattern = new RegExp(
      String.raw`https://github\.com/([^/]+)/([^/]+)/blob/([0-9a-f]{7,40})/` + escapeRegExp(section),
      "g",
    );
    result = result.replace(
      pattern,
      (_match, owner: string, repo: string, sha: string) =>
        `${GITHUB}/${owner}/${repo}/blob/${sha}/README.md#${anchor}`,
    );
  }
  return result;
}

export function stripGithubBlobSha(text: string): string {
  return text.replace(BLOB_SHA, `${GITHUB}/$1/$2/`);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}
