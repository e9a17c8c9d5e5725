/**
 * Report tools registration
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { errorMessage } from "../errors.js";
import type { GitHistorySource } from "../git/types.js";
import { runLog, type RunLogger } from "../logging/run-logger.js";
import { FileCommitLister } from "../report/file-commit-lister.js";
import { MergeReporter } from "../report/merge-reporter.js";
import type { ReportRequest } from "../report/types.js";
import * as schemas from "./schemas.js";

export interface ReportToolDependencies {
  createSource: (repoPath: string) => GitHistorySource;
  logger?: RunLogger;
}

export type ReportKind = "merges" | "commits";

export interface ToolTextResult {
  text: string;
  isError: boolean;
}

/**
 * Run a report and collect its text.
 * Fatal git failures become an error result instead of a rejection.
 */
export async function runReportTool(
  kind: ReportKind,
  args: schemas.RangeRequestInput,
  deps: ReportToolDependencies,
): Promise<ToolTextResult> {
  const logger = deps.logger ?? runLog;
  const source = deps.createSource(args.repoPath);
  const request: ReportRequest = {
    range: { from: args.from, to: args.to, inclusive: args.inclusive },
    path: args.path,
  };
  const blocks: string[] = [];
  const write = (text: string) => {
    blocks.push(text);
  };

  try {
    if (kind === "merges") {
      await new MergeReporter(source, logger).run(request, write);
    } else {
      await new FileCommitLister(source, logger).run(request, write);
    }
  } catch (error) {
    return { text: `Error: ${errorMessage(error)}`, isError: true };
  }

  if (blocks.length === 0) {
    const what = kind === "merges" ? "No qualifying merges" : "No commits";
    return { text: `${what} between ${args.from} and ${args.to} touched ${args.path}.`, isError: false };
  }
  return { text: blocks.join(""), isError: false };
}

export function registerReportTools(server: McpServer, deps: ReportToolDependencies): void {
  // merge_report
  server.registerTool(
    "merge_report",
    {
      title: "Merge Report",
      description:
        "List the merges in a revision range whose incoming branch touched a file. " +
        "Merges that contain nested merges and merges of tags ('Merge tag ...') are skipped. " +
        "Each block shows the merge subject, hash, full merge message (often the series cover letter) " +
        "and the commits the merge brought in, oldest first.",
      inputSchema: schemas.RangeRequestSchema,
    },
    async (args) => {
      const result = await runReportTool("merges", args, deps);
      return {
        content: [{ type: "text", text: result.text }],
        isError: result.isError,
      };
    },
  );

  // file_commits
  server.registerTool(
    "file_commits",
    {
      title: "File Commits",
      description:
        "List every non-merge commit in a revision range that modified a file, newest first, " +
        "with author, committer date, changed files and full message.",
      inputSchema: schemas.RangeRequestSchema,
    },
    async (args) => {
      const result = await runReportTool("commits", args, deps);
      return {
        content: [{ type: "text", text: result.text }],
        isError: result.isError,
      };
    },
  );
}
