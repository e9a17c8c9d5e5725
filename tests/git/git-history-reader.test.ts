/**
 * Tests for GitHistoryReader
 *
 * No git process is spawned: node:child_process and isomorphic-git are both
 * replaced by scripted fakes, so each test states exactly what git "answers".
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

import { GitCommandError, NotAGitRepositoryError, RevisionNotFoundError } from "../../src/errors.js";
import { GitHistoryReader } from "../../src/git/git-history-reader.js";
import { RunLogger } from "../../src/logging/run-logger.js";

interface GitAnswer {
  stdout?: string;
  stderr?: string;
  code?: number;
}

interface FakeCommitObject {
  oid: string;
  commit: {
    message: string;
    parent: string[];
    author: { name: string; email: string; timestamp: number; timezoneOffset: number };
    committer: { name: string; email: string; timestamp: number; timezoneOffset: number };
  };
}

interface FakeEntry {
  oid: () => Promise<string>;
  type: () => Promise<string>;
}

const cli = vi.hoisted(() => ({
  answer: (_args: string[]): GitAnswer => ({ stdout: "" }),
  calls: [] as Array<{ file: string; args: string[]; options: { cwd?: string; timeout?: number; env?: Record<string, string | undefined> } }>,
}));

const iso = vi.hoisted(() => ({
  root: "/repo" as string | null,
  commits: new Map<string, FakeCommitObject>(),
  trees: new Map<string, Record<string, string>>(),
  walkFails: false,
}));

// Callback shaped like the promisified execFile: resolves { stdout, stderr },
// rejects with an error carrying code and stderr
vi.mock("node:child_process", () => ({
  execFile: (
    file: string,
    args: string[],
    options: { cwd?: string; timeout?: number; env?: Record<string, string | undefined> },
    callback: (error: Error | null, result?: { stdout: string; stderr: string }) => void,
  ) => {
    cli.calls.push({ file, args, options });
    const answer = cli.answer(args);
    if (answer.code) {
      callback(
        Object.assign(new Error("Command failed"), {
          code: answer.code,
          stdout: answer.stdout ?? "",
          stderr: answer.stderr ?? "",
        }),
      );
    } else {
      callback(null, { stdout: answer.stdout ?? "", stderr: "" });
    }
  },
}));

vi.mock("isomorphic-git", () => ({
  default: {
    findRoot: async () => {
      if (!iso.root) throw new Error("NotFoundError: Could not find .git");
      return iso.root;
    },
    readCommit: async ({ oid }: { oid: string }) => {
      const object = iso.commits.get(oid);
      if (!object) throw new Error(`NotFoundError: Could not find ${oid}`);
      return object;
    },
    TREE: ({ ref }: { ref: string }) => ({ ref }),
    walk: async ({
      trees,
      map,
    }: {
      trees: Array<{ ref: string }>;
      map: (filepath: string, entries: Array<FakeEntry | null>) => Promise<unknown>;
    }) => {
      if (iso.walkFails) throw new Error("walk failed");
      const snapshots = trees.map((tree) => iso.trees.get(tree.ref) ?? {});
      const paths = [...new Set(snapshots.flatMap((snapshot) => Object.keys(snapshot)))].sort();
      await map(
        ".",
        snapshots.map(() => ({ oid: async () => "root", type: async () => "tree" })),
      );
      for (const path of paths) {
        await map(
          path,
          snapshots.map((snapshot) => {
            const oid = snapshot[path];
            return oid === undefined ? null : { oid: async () => oid, type: async () => "blob" };
          }),
        );
      }
    },
  },
}));

const MERGE = "a".repeat(40);
const PARENT_1 = "b".repeat(40);
const PARENT_2 = "c".repeat(40);

function commitObject(oid: string, message: string, parent: string[]): FakeCommitObject {
  const person = { name: "Ada", email: "ada@example.com", timestamp: 1_700_000_000, timezoneOffset: 0 };
  return { oid, commit: { message, parent, author: person, committer: person } };
}

function argsOf(index: number): string[] {
  return cli.calls[index]?.args ?? [];
}

describe("GitHistoryReader", () => {
  let reader: GitHistoryReader;

  beforeEach(() => {
    cli.answer = () => ({ stdout: "" });
    cli.calls.length = 0;
    iso.root = "/repo";
    iso.commits.clear();
    iso.trees.clear();
    iso.walkFails = false;
    reader = new GitHistoryReader("/repo", { binary: "git", timeoutMs: 5000, maxBuffer: 1024 }, new RunLogger({ debug: false }));
  });

  describe("process invocation", () => {
    it("should run git with the pager disabled, in the repo, with the configured timeout", async () => {
      await reader.listMerges({ from: "v1", to: "v2" });

      expect(cli.calls).toHaveLength(1);
      const [call] = cli.calls;
      expect(call.file).toBe("git");
      expect(call.options.cwd).toBe("/repo");
      expect(call.options.timeout).toBe(5000);
      expect(call.options.env?.GIT_PAGER).toBe("cat");
      expect(call.options.env?.GIT_TERMINAL_PROMPT).toBe("0");
    });

    it("should wrap failures in GitCommandError with exit code and stderr", async () => {
      cli.answer = () => ({ code: 128, stderr: "fatal: bad revision 'v9'\n" });

      const error = await reader.listMerges({ from: "v1", to: "v9" }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GitCommandError);
      if (!(error instanceof GitCommandError)) return;
      expect(error.exitCode).toBe(128);
      expect(error.message).toBe("git log --merges --format=%H v1..v9 failed: fatal: bad revision 'v9'");
    });
  });

  describe("subdirectory repoPath", () => {
    const settings = { binary: "git", timeoutMs: 5000, maxBuffer: 1024 };

    it("should run range walks from the repository root so pathspecs are root-relative", async () => {
      const nested = new GitHistoryReader("/repo/kernel", settings, new RunLogger({ debug: false }));

      await nested.listCommits({ from: PARENT_1, to: PARENT_2 }, "kernel/bpf/verifier.c");
      await nested.listCommitHashes({ from: "v1", to: "v2" }, { path: "kernel/bpf/verifier.c", noMerges: true });

      expect(cli.calls.map((call) => call.options.cwd)).toEqual(["/repo", "/repo"]);
      expect(argsOf(0)).toEqual(["log", "--format=%h %s", `${PARENT_1}..${PARENT_2}`, "--", "kernel/bpf/verifier.c"]);
    });

    it("should locate the root from repoPath, then run from the root", async () => {
      iso.root = null;
      cli.answer = (args) => ({ stdout: args[0] === "rev-parse" ? "/repo\n" : "" });
      const nested = new GitHistoryReader("/repo/kernel", settings, new RunLogger({ debug: false }));

      await nested.listMerges({ from: "v1", to: "v2" });

      expect(cli.calls.map((call) => [call.args[0], call.options.cwd])).toEqual([
        ["rev-parse", "/repo/kernel"],
        ["log", "/repo"],
      ]);
    });
  });

  describe("findRepositoryRoot", () => {
    it("should use isomorphic-git when it finds the root", async () => {
      expect(await reader.findRepositoryRoot()).toBe("/repo");
      expect(cli.calls).toHaveLength(0);
    });

    it("should fall back to rev-parse --show-toplevel", async () => {
      iso.root = null;
      cli.answer = () => ({ stdout: "/worktree\n" });

      expect(await reader.findRepositoryRoot()).toBe("/worktree");
      expect(argsOf(0)).toEqual(["rev-parse", "--show-toplevel"]);
    });

    it("should throw NotAGitRepositoryError when both fail", async () => {
      iso.root = null;
      cli.answer = () => ({ code: 128, stderr: "fatal: not a git repository" });

      await expect(reader.findRepositoryRoot()).rejects.toBeInstanceOf(NotAGitRepositoryError);
    });
  });

  describe("verifyRevision", () => {
    it("should resolve a revision to its commit hash", async () => {
      cli.answer = () => ({ stdout: `${MERGE}\n` });

      expect(await reader.verifyRevision("v6.3")).toBe(MERGE);
      expect(argsOf(0)).toEqual(["rev-parse", "--verify", "--quiet", "v6.3^{commit}"]);
    });

    it("should throw RevisionNotFoundError for unknown revisions", async () => {
      cli.answer = () => ({ code: 1 });

      await expect(reader.verifyRevision("nope")).rejects.toThrow("Unknown revision: nope");
      await expect(reader.verifyRevision("nope")).rejects.toBeInstanceOf(RevisionNotFoundError);
    });
  });

  describe("range listings", () => {
    it("should list merge hashes in git order", async () => {
      cli.answer = () => ({ stdout: `${MERGE}\n${PARENT_1}\n` });

      expect(await reader.listMerges({ from: "v1", to: "v2", inclusive: true })).toEqual([MERGE, PARENT_1]);
      expect(argsOf(0)).toEqual(["log", "--merges", "--format=%H", "v1^..v2"]);
    });

    it("should parse short hash and subject, with and without a path filter", async () => {
      cli.answer = () => ({ stdout: "abc1234 bpf: fix bounds\ndef5678 \n" });

      const commits = await reader.listCommits({ from: PARENT_1, to: PARENT_2 }, "kernel/bpf/verifier.c");

      expect(commits).toEqual([
        { shortHash: "abc1234", subject: "bpf: fix bounds" },
        { shortHash: "def5678", subject: "" },
      ]);
      expect(argsOf(0)).toEqual(["log", "--format=%h %s", `${PARENT_1}..${PARENT_2}`, "--", "kernel/bpf/verifier.c"]);

      await reader.listCommits({ from: PARENT_1, to: PARENT_2 });
      expect(argsOf(1)).toEqual(["log", "--format=%h %s", `${PARENT_1}..${PARENT_2}`]);
    });

    it("should list full hashes without merges for a path", async () => {
      cli.answer = () => ({ stdout: `${PARENT_2}\n` });

      const hashes = await reader.listCommitHashes({ from: "v1", to: "v2" }, { path: "a.c", noMerges: true });

      expect(hashes).toEqual([PARENT_2]);
      expect(argsOf(0)).toEqual(["log", "--no-merges", "--format=%H", "v1..v2", "--", "a.c"]);
    });

    it("should detect merges in a range from a single line of output", async () => {
      cli.answer = () => ({ stdout: `${MERGE}\n` });
      expect(await reader.hasAnyMerge({ from: PARENT_1, to: PARENT_2 })).toBe(true);
      expect(argsOf(0)).toEqual(["log", "--merges", "--format=%H", "-n", "1", `${PARENT_1}..${PARENT_2}`]);

      cli.answer = () => ({ stdout: "" });
      expect(await reader.hasAnyMerge({ from: PARENT_1, to: PARENT_2 })).toBe(false);
    });
  });

  describe("commit object reads", () => {
    beforeEach(() => {
      iso.commits.set(
        MERGE,
        commitObject(MERGE, "Merge branch 'fixes'\n\nCover letter.\n", [PARENT_1, PARENT_2]),
      );
    });

    it("should read subject, body and parents without spawning git", async () => {
      expect(await reader.getSubject(MERGE)).toBe("Merge branch 'fixes'");
      expect(await reader.getBody(MERGE)).toBe("Cover letter.");
      expect(await reader.resolveParent(MERGE, 1)).toBe(PARENT_1);
      expect(await reader.resolveParent(MERGE, 2)).toBe(PARENT_2);
      expect(await reader.resolveParent(MERGE, 3)).toBeNull();
      expect(cli.calls).toHaveLength(0);
    });

    it("should fall back to git show when the object can't be read", async () => {
      cli.answer = (args) => ({ stdout: args.includes("--format=%s") ? "Fallback subject\n" : "Body line\n\n" });

      expect(await reader.getSubject(PARENT_1)).toBe("Fallback subject");
      expect(await reader.getBody(PARENT_1)).toBe("Body line");
      expect(argsOf(0)).toEqual(["show", "-s", "--format=%s", PARENT_1]);
      expect(argsOf(1)).toEqual(["show", "-s", "--format=%b", PARENT_1]);
    });

    it("should go straight to the CLI for abbreviated revisions", async () => {
      cli.answer = () => ({ stdout: "Subject\n" });

      await reader.getSubject("HEAD~1");

      expect(argsOf(0)).toEqual(["show", "-s", "--format=%s", "HEAD~1"]);
    });

    it("should return null for a missing parent via rev-parse", async () => {
      cli.answer = () => ({ code: 1 });

      expect(await reader.resolveParent(PARENT_1, 2)).toBeNull();
      expect(argsOf(0)).toEqual(["rev-parse", "--verify", "--quiet", `${PARENT_1}^2`]);
    });

    it("should propagate other rev-parse failures", async () => {
      cli.answer = () => ({ code: 128, stderr: "fatal: bad object" });

      await expect(reader.resolveParent(PARENT_1, 2)).rejects.toBeInstanceOf(GitCommandError);
    });
  });

  describe("getCommitDetails", () => {
    it("should diff the commit tree against its first parent", async () => {
      iso.commits.set(PARENT_2, commitObject(PARENT_2, "bpf: fix bounds\n\nLonger text.\n", [PARENT_1]));
      iso.trees.set(PARENT_1, { "a.c": "1", "b.c": "2", "gone.c": "9" });
      iso.trees.set(PARENT_2, { "a.c": "1", "b.c": "3", "c.c": "4" });

      expect(await reader.getCommitDetails(PARENT_2)).toEqual({
        hash: PARENT_2,
        subject: "bpf: fix bounds",
        message: "bpf: fix bounds\n\nLonger text.",
        author: "Ada <ada@example.com>",
        date: "2023-11-14 22:13:20 +0000",
        files: ["b.c", "c.c", "gone.c"],
      });
      expect(cli.calls).toHaveLength(0);
    });

    it("should list every file of a root commit", async () => {
      iso.commits.set(PARENT_1, commitObject(PARENT_1, "Initial import\n", []));
      iso.trees.set(PARENT_1, { "README": "1", "src/main.c": "2" });

      const details = await reader.getCommitDetails(PARENT_1);

      expect(details.files).toEqual(["README", "src/main.c"]);
    });

    it("should ask git for changed files when the tree walk fails", async () => {
      iso.commits.set(PARENT_2, commitObject(PARENT_2, "bpf: fix bounds\n", [PARENT_1]));
      iso.walkFails = true;
      cli.answer = () => ({ stdout: "kernel/bpf/verifier.c\n" });

      const details = await reader.getCommitDetails(PARENT_2);

      expect(details.files).toEqual(["kernel/bpf/verifier.c"]);
      expect(argsOf(0)).toEqual(["show", "--name-only", "--format=", PARENT_2]);
    });

    it("should read everything from git show when the object can't be read", async () => {
      cli.answer = (args) =>
        args.includes("--name-only")
          ? { stdout: "a.c\nb.c\n" }
          : {
              stdout:
                [PARENT_2, "bpf: fix", "Ada <ada@example.com>", "2023-11-14 22:13:20 +0000", "bpf: fix\n\nbody\n"].join(
                  "\u0000",
                ) + "\n",
            };

      expect(await reader.getCommitDetails(PARENT_2)).toEqual({
        hash: PARENT_2,
        subject: "bpf: fix",
        message: "bpf: fix\n\nbody",
        author: "Ada <ada@example.com>",
        date: "2023-11-14 22:13:20 +0000",
        files: ["a.c", "b.c"],
      });
    });
  });
});
