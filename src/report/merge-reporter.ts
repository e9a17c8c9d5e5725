/**
 * MergeReporter — finds merges whose incoming branch touched a path.
 *
 * Single forward pass over `git log --merges <range>`. Each merge runs through
 * four gates in order; the first one that fails excludes it:
 *
 * 1. two parents resolvable        (else "not-a-merge")
 * 2. no merge inside parent1..parent2  (else "nested-merge")
 * 3. subject lacks "Merge tag"      (else "tag-pull")
 * 4. parent1..parent2 touches path  (else "irrelevant")
 *
 * Only the outer enumeration can fail the run. A query that fails for one
 * merge excludes that merge ("query-failed") and the pass moves on.
 */

import type { GitHistorySource, RevisionRange } from "../git/types.js";
import { errorMessage } from "../errors.js";
import { runLog, type RunLogger } from "../logging/run-logger.js";
import { verifyRange } from "./preflight.js";
import { renderMergeReport } from "./render.js";
import type {
  ExclusionReason,
  MergeOutcome,
  MergeReportStats,
  ReportRequest,
  ReportWriter,
} from "./types.js";

/**
 * Subject marker of merges that pull a whole tagged release.
 * A substring heuristic, kept as-is for output compatibility.
 */
export const TAG_PULL_MARKER = "Merge tag";

export function isTagPull(subject: string): boolean {
  return subject.includes(TAG_PULL_MARKER);
}

function emptyStats(): MergeReportStats {
  return {
    scanned: 0,
    reported: 0,
    excluded: { "not-a-merge": 0, "nested-merge": 0, "tag-pull": 0, irrelevant: 0, "query-failed": 0 },
  };
}

export class MergeReporter {
  private readonly source: GitHistorySource;
  private readonly logger: RunLogger;

  constructor(source: GitHistorySource, logger: RunLogger = runLog) {
    this.source = source;
    this.logger = logger;
  }

  /**
   * Write one block per qualifying merge, in enumeration order.
   * Rejects only when the repository, the range ends or the enumeration fail.
   */
  async run(request: ReportRequest, write: ReportWriter): Promise<MergeReportStats> {
    const { range, path } = request;
    await verifyRange(this.source, range, this.logger);

    this.logger.info("MergeReporter", `Analyzing merge commits between ${range.from} and ${range.to} that affect ${path}`);

    const merges = await this.source.listMerges(range);
    const stats = emptyStats();

    for (const hash of merges) {
      stats.scanned++;
      const outcome = await this.evaluate(hash, path);

      if (outcome.kind === "excluded") {
        stats.excluded[outcome.reason]++;
        this.logger.debug("MergeReporter", `Excluded ${hash}`, { reason: outcome.reason });
        continue;
      }

      const { merge } = outcome.report;
      this.logger.info("MergeReporter", `Found (${merge.hash})  ${merge.subject}`);
      write(renderMergeReport(outcome.report));
      stats.reported++;
    }

    this.logger.summary("MergeReporter", { ...stats, range, path });
    return stats;
  }

  /**
   * Run one merge through the gates
   */
  async evaluate(hash: string, path: string): Promise<MergeOutcome> {
    const excluded = (reason: ExclusionReason): MergeOutcome => ({ kind: "excluded", hash, reason });

    try {
      const subject = await this.source.getSubject(hash);

      const targetParent = await this.source.resolveParent(hash, 1);
      const incomingParent = await this.source.resolveParent(hash, 2);
      if (!targetParent || !incomingParent) return excluded("not-a-merge");

      const incoming: RevisionRange = { from: targetParent, to: incomingParent };

      if (await this.source.hasAnyMerge(incoming)) return excluded("nested-merge");

      if (isTagPull(subject)) return excluded("tag-pull");

      const touching = await this.source.listCommits(incoming, path);
      if (touching.length === 0) return excluded("irrelevant");

      const body = await this.source.getBody(hash);
      const patches = (await this.source.listCommits(incoming)).reverse();

      return {
        kind: "included",
        report: {
          merge: { hash, subject, body, targetParent, incomingParent },
          patches,
        },
      };
    } catch (error) {
      this.logger.debug("MergeReporter", `Query failed for ${hash}`, { error: errorMessage(error) });
      return excluded("query-failed");
    }
  }
}
