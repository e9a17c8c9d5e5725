/**
 * Thin wrapper around the git executable.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

import type { GitSettings } from "../config.js";
import { GitCommandError } from "../errors.js";
import { runLog, type RunLogger } from "../logging/run-logger.js";

const execFileAsync = promisify(execFile);

export interface GitCliOptions {
  cwd: string;
  settings: GitSettings;
  logger?: RunLogger;
}

function exitCodeOf(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "number") {
    return error.code;
  }
  return null;
}

function stderrOf(error: unknown): string {
  if (typeof error === "object" && error !== null && "stderr" in error && typeof error.stderr === "string") {
    return error.stderr;
  }
  return "";
}

/**
 * Run `git <args>` and resolve with its stdout.
 * Rejects with GitCommandError on a non-zero exit, timeout or spawn failure.
 */
export async function runGit(args: readonly string[], options: GitCliOptions): Promise<string> {
  const { cwd, settings } = options;
  const logger = options.logger ?? runLog;
  const started = Date.now();

  try {
    const { stdout } = await execFileAsync(settings.binary, [...args], {
      cwd,
      timeout: settings.timeoutMs,
      maxBuffer: settings.maxBuffer,
      encoding: "utf8",
      env: { ...process.env, GIT_PAGER: "cat", GIT_TERMINAL_PROMPT: "0" },
    });
    logger.gitCall(args, Date.now() - started, true);
    return stdout;
  } catch (error) {
    logger.gitCall(args, Date.now() - started, false);
    throw new GitCommandError(args, exitCodeOf(error), stderrOf(error), error);
  }
}
