/**
 * GitHistoryReader — the GitHistorySource used outside tests.
 *
 * Commit objects (subject, body, parents, author, changed files) are read with
 * isomorphic-git straight from .git, falling back to the git CLI when the
 * object store can't be read that way (worktrees, partial clones, alternates).
 * Range walks always go through `git log`, which owns range and pathspec
 * semantics (history simplification, rename-free path matching).
 */

import git, { type ReadCommitResult } from "isomorphic-git";
import * as fs from "node:fs";
import { resolve } from "node:path";

import type { GitSettings } from "../config.js";
import { GitCommandError, NotAGitRepositoryError, RevisionNotFoundError } from "../errors.js";
import { runLog, type RunLogger } from "../logging/run-logger.js";
import { formatGitDate, formatRange, parseCommitMessage, splitLines } from "./commit-message.js";
import { runGit } from "./git-cli.js";
import type {
  CommitDetails,
  CommitSummary,
  GitHistorySource,
  ListCommitOptions,
  RevisionRange,
} from "./types.js";

const FULL_SHA = /^[0-9a-f]{40}$/;

export class GitHistoryReader implements GitHistorySource {
  private readonly repoPath: string;
  private readonly settings: GitSettings;
  private readonly logger: RunLogger;

  // isomorphic-git pack file cache (shared across reads within one run)
  private cache: object = {};
  private root: string | null = null;

  constructor(repoPath: string, settings: GitSettings, logger: RunLogger = runLog) {
    this.repoPath = resolve(repoPath);
    this.settings = settings;
    this.logger = logger;
  }

  private runAt(cwd: string, args: readonly string[]): Promise<string> {
    return runGit(args, { cwd, settings: this.settings, logger: this.logger });
  }

  /**
   * Run git from the repository root, where pathspecs resolve against the
   * top level whichever subdirectory repoPath names.
   */
  private async git(args: readonly string[]): Promise<string> {
    return this.runAt(await this.findRepositoryRoot(), args);
  }

  async findRepositoryRoot(): Promise<string> {
    if (this.root === null) {
      this.root = await this.locateRoot();
    }
    return this.root;
  }

  private async locateRoot(): Promise<string> {
    try {
      return await git.findRoot({ fs, filepath: this.repoPath });
    } catch {
      try {
        const stdout = await this.runAt(this.repoPath, ["rev-parse", "--show-toplevel"]);
        return stdout.trim();
      } catch (error) {
        throw new NotAGitRepositoryError(this.repoPath, error);
      }
    }
  }

  async verifyRevision(rev: string): Promise<string> {
    try {
      const stdout = await this.git(["rev-parse", "--verify", "--quiet", `${rev}^{commit}`]);
      const hash = stdout.trim();
      if (!hash) throw new RevisionNotFoundError(rev);
      return hash;
    } catch (error) {
      if (error instanceof RevisionNotFoundError) throw error;
      throw new RevisionNotFoundError(rev, error);
    }
  }

  async listMerges(range: RevisionRange): Promise<string[]> {
    const stdout = await this.git(["log", "--merges", "--format=%H", formatRange(range)]);
    return splitLines(stdout);
  }

  /**
   * Read a commit object with isomorphic-git.
   * Returns null when it can't (caller then asks the CLI).
   */
  private async readCommitObject(hash: string): Promise<ReadCommitResult | null> {
    if (!FULL_SHA.test(hash)) return null;
    try {
      const dir = await this.findRepositoryRoot();
      return await git.readCommit({ fs, dir, oid: hash, cache: this.cache });
    } catch (error) {
      this.logger.debug("GitHistoryReader", `isomorphic-git readCommit failed for ${hash}, using CLI`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async getSubject(hash: string): Promise<string> {
    const object = await this.readCommitObject(hash);
    if (object) return parseCommitMessage(object.commit.message).subject;

    const stdout = await this.git(["show", "-s", "--format=%s", hash]);
    return stdout.trim();
  }

  async getBody(hash: string): Promise<string> {
    const object = await this.readCommitObject(hash);
    if (object) return parseCommitMessage(object.commit.message).body;

    const stdout = await this.git(["show", "-s", "--format=%b", hash]);
    return stdout.trimEnd();
  }

  async resolveParent(hash: string, parentIndex: number): Promise<string | null> {
    const object = await this.readCommitObject(hash);
    if (object) return object.commit.parent[parentIndex - 1] ?? null;

    try {
      const stdout = await this.git(["rev-parse", "--verify", "--quiet", `${hash}^${parentIndex}`]);
      return stdout.trim() || null;
    } catch (error) {
      // rev-parse --quiet exits 1 with no output for a missing parent
      if (error instanceof GitCommandError && error.exitCode === 1 && !error.stderr.trim()) {
        return null;
      }
      throw error;
    }
  }

  async listCommits(range: RevisionRange, pathFilter?: string): Promise<CommitSummary[]> {
    const args = ["log", "--format=%h %s", formatRange(range)];
    if (pathFilter) args.push("--", pathFilter);

    const stdout = await this.git(args);
    return splitLines(stdout).map((line) => {
      const space = line.indexOf(" ");
      return space === -1
        ? { shortHash: line, subject: "" }
        : { shortHash: line.slice(0, space), subject: line.slice(space + 1) };
    });
  }

  async listCommitHashes(range: RevisionRange, options: ListCommitOptions = {}): Promise<string[]> {
    const args = ["log"];
    if (options.noMerges) args.push("--no-merges");
    args.push("--format=%H", formatRange(range));
    if (options.path) args.push("--", options.path);

    return splitLines(await this.git(args));
  }

  async hasAnyMerge(range: RevisionRange): Promise<boolean> {
    const stdout = await this.git(["log", "--merges", "--format=%H", "-n", "1", formatRange(range)]);
    return stdout.trim().length > 0;
  }

  async getCommitDetails(hash: string): Promise<CommitDetails> {
    const object = await this.readCommitObject(hash);
    if (object) {
      const { commit } = object;
      let files: string[];
      try {
        files =
          commit.parent.length === 0
            ? await this.listAllFiles(object.oid)
            : await this.diffTrees(commit.parent[0], object.oid);
      } catch {
        files = await this.listChangedFilesViaCli(hash);
      }
      return {
        hash: object.oid,
        subject: parseCommitMessage(commit.message).subject,
        message: commit.message.trim(),
        author: `${commit.author.name} <${commit.author.email}>`,
        date: formatGitDate(commit.committer.timestamp, commit.committer.timezoneOffset),
        files,
      };
    }

    const stdout = await this.git(["show", "-s", "--format=%H%x00%s%x00%an <%ae>%x00%ci%x00%B", hash]);
    const [fullHash = hash, subject = "", author = "", date = "", message = ""] = stdout.split("\0");
    return {
      hash: fullHash.trim(),
      subject,
      message: message.trim(),
      author,
      date,
      files: await this.listChangedFilesViaCli(hash),
    };
  }

  private async listChangedFilesViaCli(hash: string): Promise<string[]> {
    return splitLines(await this.git(["show", "--name-only", "--format=", hash]));
  }

  /**
   * List all files in a commit's tree (for root commits with no parent)
   */
  private async listAllFiles(commitOid: string): Promise<string[]> {
    const dir = await this.findRepositoryRoot();
    const files: string[] = [];

    await git.walk({
      fs,
      dir,
      trees: [git.TREE({ ref: commitOid })],
      cache: this.cache,
      map: async (filepath, entries) => {
        const entry = entries[0];
        if (!entry) return;
        const type = await entry.type();
        if (type === "blob" && filepath !== ".") {
          files.push(filepath);
        }
      },
    });

    return files;
  }

  /**
   * Diff two commit trees to find changed files
   */
  private async diffTrees(parentOid: string, commitOid: string): Promise<string[]> {
    const dir = await this.findRepositoryRoot();
    const changedFiles: string[] = [];

    await git.walk({
      fs,
      dir,
      trees: [git.TREE({ ref: parentOid }), git.TREE({ ref: commitOid })],
      cache: this.cache,
      map: async (filepath, entries) => {
        if (filepath === ".") return;
        const [parentEntry, commitEntry] = entries;

        const parentOidFile = parentEntry ? await parentEntry.oid() : undefined;
        const commitOidFile = commitEntry ? await commitEntry.oid() : undefined;

        if (parentOidFile !== commitOidFile) {
          // Only include blobs, not trees
          const type = commitEntry
            ? await commitEntry.type()
            : parentEntry
              ? await parentEntry.type()
              : undefined;
          if (type === "blob") {
            changedFiles.push(filepath);
          }
        }
      },
    });

    return changedFiles.sort();
  }
}
