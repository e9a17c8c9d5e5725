/**
 * FileCommitLister — every non-merge commit in a range that modified a path,
 * newest first, with author, date, message and changed files.
 */

import { errorMessage } from "../errors.js";
import type { GitHistorySource } from "../git/types.js";
import { runLog, type RunLogger } from "../logging/run-logger.js";
import { verifyRange } from "./preflight.js";
import { renderCommitDetails } from "./render.js";
import type { FileCommitStats, ReportRequest, ReportWriter } from "./types.js";

export class FileCommitLister {
  private readonly source: GitHistorySource;
  private readonly logger: RunLogger;

  constructor(source: GitHistorySource, logger: RunLogger = runLog) {
    this.source = source;
    this.logger = logger;
  }

  async run(request: ReportRequest, write: ReportWriter): Promise<FileCommitStats> {
    const { range, path } = request;
    await verifyRange(this.source, range, this.logger);

    this.logger.info("FileCommitLister", `Analyzing commits between ${range.from} and ${range.to} that modified ${path}`);

    const hashes = await this.source.listCommitHashes(range, { path, noMerges: true });
    const stats: FileCommitStats = { listed: hashes.length, reported: 0, skipped: 0 };

    for (const hash of hashes) {
      try {
        const details = await this.source.getCommitDetails(hash);
        write(renderCommitDetails(details));
        stats.reported++;
      } catch (error) {
        stats.skipped++;
        this.logger.debug("FileCommitLister", `Skipped ${hash}`, { error: errorMessage(error) });
      }
    }

    this.logger.info("FileCommitLister", `Found ${stats.reported} commits`);
    this.logger.summary("FileCommitLister", { ...stats, range, path });
    return stats;
  }
}
