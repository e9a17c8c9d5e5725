/**
 * Error types for fatal conditions.
 *
 * Per-merge query failures never reach the user; they exclude the merge and are
 * logged at debug level. Everything here ends the run with a non-zero exit.
 */

export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(args: readonly string[], exitCode: number | null, stderr: string, cause?: unknown) {
    const detail = stderr.trim() || (cause instanceof Error ? cause.message : "unknown failure");
    super(`git ${args.join(" ")} failed: ${detail}`, { cause });
    this.name = "GitCommandError";
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class RevisionNotFoundError extends Error {
  readonly revision: string;

  constructor(revision: string, cause?: unknown) {
    super(`Unknown revision: ${revision}`, { cause });
    this.name = "RevisionNotFoundError";
    this.revision = revision;
  }
}

export class NotAGitRepositoryError extends Error {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Not in a git repository: ${path}`, { cause });
    this.name = "NotAGitRepositoryError";
    this.path = path;
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** Message of any thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
