/**
 * Plain-text renderers. Downstream consumers parse these blocks, so the
 * layout is fixed.
 */

import type { CommitDetails } from "../git/types.js";
import type { MergeReport } from "./types.js";

export const SEPARATOR = "=".repeat(65);

export function renderMergeReport({ merge, patches }: MergeReport): string {
  const lines = [
    SEPARATOR,
    `MERGE: ${merge.subject}`,
    `HASH: ${merge.hash}`,
    "",
    "COVER LETTER / MERGE MESSAGE:",
    merge.body,
    "",
    "PATCHES:",
    ...patches.map((patch) => `  ${patch.shortHash} ${patch.subject}`),
    "",
  ];
  return lines.join("\n") + "\n";
}

export function renderCommitDetails(commit: CommitDetails): string {
  const lines = [
    SEPARATOR,
    `COMMIT: ${commit.hash}`,
    `AUTHOR: ${commit.author}`,
    `DATE: ${commit.date}`,
    "FILES:",
    ...commit.files.map((file) => `  ${file}`),
    "",
    commit.message,
    "",
  ];
  return lines.join("\n") + "\n";
}
