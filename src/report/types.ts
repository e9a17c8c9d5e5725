import type { CommitSummary, MergeCommit, RevisionRange } from "../git/types.js";

export interface ReportRequest {
  range: RevisionRange;
  /** Path of interest, relative to the repository root */
  path: string;
}

/** Receives rendered report text, block by block */
export type ReportWriter = (text: string) => void;

export interface MergeReport {
  merge: MergeCommit;
  /** Commits the merge brought in, oldest first */
  patches: CommitSummary[];
}

export type ExclusionReason = "not-a-merge" | "nested-merge" | "tag-pull" | "irrelevant" | "query-failed";

export type MergeOutcome =
  | { kind: "included"; report: MergeReport }
  | { kind: "excluded"; hash: string; reason: ExclusionReason };

export interface MergeReportStats {
  scanned: number;
  reported: number;
  excluded: Record<ExclusionReason, number>;
}

export interface FileCommitStats {
  listed: number;
  reported: number;
  skipped: number;
}
