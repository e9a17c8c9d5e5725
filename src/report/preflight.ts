import type { GitHistorySource, RevisionRange } from "../git/types.js";
import { runLog, type RunLogger } from "../logging/run-logger.js";

/**
 * Fail fast when the repository or either end of the range is unusable.
 * Resolves with the repository root.
 */
export async function verifyRange(
  source: GitHistorySource,
  range: RevisionRange,
  logger: RunLogger = runLog,
): Promise<string> {
  const root = await source.findRepositoryRoot();
  const from = await source.verifyRevision(range.from);
  const to = await source.verifyRevision(range.to);
  logger.debug("Preflight", "Range verified", { root, from, to, inclusive: range.inclusive ?? false });
  return root;
}
