/**
 * Git history types
 *
 * Everything here is read from the repository and discarded after the run;
 * nothing is cached across runs.
 */

/**
 * Commits reachable from `to` but not from `from`.
 * `inclusive` widens the range to `from^..to` so `from` itself is included.
 */
export interface RevisionRange {
  from: string;
  to: string;
  inclusive?: boolean;
}

/**
 * One line of a range listing (`%h %s`)
 */
export interface CommitSummary {
  shortHash: string;
  subject: string;
}

/**
 * A merge with its two relevant parents resolved.
 * Octopus merges are reduced to parents 1 and 2.
 */
export interface MergeCommit {
  hash: string;
  subject: string;
  body: string;
  targetParent: string;
  incomingParent: string;
}

/**
 * Full detail of a single commit (file-commit report)
 */
export interface CommitDetails {
  hash: string;
  subject: string;
  /** Full commit message */
  message: string;
  /** "Name <email>" */
  author: string;
  /** Committer date, ISO-like "YYYY-MM-DD HH:MM:SS +ZZZZ" */
  date: string;
  files: string[];
}

export interface ListCommitOptions {
  /** Restrict to commits touching this path */
  path?: string;
  /** Drop merge commits (`--no-merges`) */
  noMerges?: boolean;
}

/**
 * Query interface over a repository's history.
 *
 * Listings come newest-first, the way `git log` walks; callers reverse them
 * when they need chronological order.
 */
export interface GitHistorySource {
  /** Absolute path of the working tree root; throws outside a repository */
  findRepositoryRoot(): Promise<string>;
  /** Full hash of the commit `rev` names; throws RevisionNotFoundError */
  verifyRevision(rev: string): Promise<string>;
  listMerges(range: RevisionRange): Promise<string[]>;
  getSubject(hash: string): Promise<string>;
  getBody(hash: string): Promise<string>;
  /** Full hash of parent `parentIndex` (1-based), null when there is no such parent */
  resolveParent(hash: string, parentIndex: number): Promise<string | null>;
  listCommits(range: RevisionRange, pathFilter?: string): Promise<CommitSummary[]>;
  listCommitHashes(range: RevisionRange, options?: ListCommitOptions): Promise<string[]>;
  hasAnyMerge(range: RevisionRange): Promise<boolean>;
  getCommitDetails(hash: string): Promise<CommitDetails>;
}
