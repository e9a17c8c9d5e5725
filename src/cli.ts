/**
 * merge-report command line
 *
 *   merge-report --from <rev> --to <rev> --path <file> [--repo <dir>] [--inclusive]
 *   merge-report commits --from <rev> --to <rev> --path <file> [--repo <dir>] [--inclusive]
 *
 * Exit codes: 0 done (whatever the match count), 1 git failure, 2 usage or config error.
 */

import { parseArgs } from "node:util";
import { ZodError } from "zod";

import { loadConfig, type AppConfig } from "./config.js";
import { errorMessage, UsageError } from "./errors.js";
import { GitHistoryReader } from "./git/git-history-reader.js";
import type { GitHistorySource } from "./git/types.js";
import { RunLogger } from "./logging/run-logger.js";
import { FileCommitLister } from "./report/file-commit-lister.js";
import { MergeReporter } from "./report/merge-reporter.js";
import type { ReportRequest } from "./report/types.js";
import { RangeRequest } from "./tools/schemas.js";
import { NAME, VERSION } from "./version.js";

export const EXIT_OK = 0;
export const EXIT_GIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage:
  ${NAME} --from <rev> --to <rev> --path <file> [--repo <dir>] [--inclusive]
  ${NAME} commits --from <rev> --to <rev> --path <file> [--repo <dir>] [--inclusive]

Commands:
  (default)   merges in from..to whose incoming branch touched <file>
  commits     non-merge commits in from..to that modified <file>

Options:
  --from <rev>    start of the range (excluded unless --inclusive)
  --to <rev>      end of the range
  --path <file>   file of interest, relative to the repository root
  --repo <dir>    repository to analyze (default: current directory)
  --inclusive     include <from> itself (range from^..to)
  -h, --help      show this help
  -v, --version   show the version
`;

export interface CliDependencies {
  createSource: (repoPath: string, config: AppConfig, logger: RunLogger) => GitHistorySource;
  env: NodeJS.ProcessEnv;
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultDependencies: CliDependencies = {
  createSource: (repoPath, config, logger) => new GitHistoryReader(repoPath, config.git, logger),
  env: process.env,
  cwd: process.cwd(),
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

const FLAG_NAMES: Record<string, string> = {
  repoPath: "--repo",
  from: "--from",
  to: "--to",
  path: "--path",
  inclusive: "--inclusive",
};

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const key = String(issue.path[0] ?? "");
      const flag = FLAG_NAMES[key] ?? (key || "input");
      return `${flag}: ${issue.message}`;
    })
    .join("; ");
}

interface ParsedCommand {
  kind: "merges" | "commits";
  help: boolean;
  version: boolean;
  request?: ReportRequest & { repoPath: string };
}

/**
 * Listener for stdout "error": a reader that closed the pipe early
 * (`merge-report ... | head`) ends the process quietly.
 */
export function handleStdoutError(
  error: NodeJS.ErrnoException,
  exit: (code: number) => void = (code) => process.exit(code),
): void {
  if (error.code === "EPIPE") {
    exit(EXIT_OK);
    return;
  }
  throw error;
}

/**
 * Parse argv (without node and script) into a command.
 * Throws UsageError on anything malformed.
 */
export function parseCommand(argv: string[], cwd: string): ParsedCommand {
  const [first, ...rest] = argv;
  const kind = first === "commits" ? "commits" : "merges";
  const args = kind === "commits" ? rest : argv;

  let values: {
    from?: string;
    to?: string;
    path?: string;
    repo?: string;
    inclusive?: boolean;
    help?: boolean;
    version?: boolean;
  };
  try {
    ({ values } = parseArgs({
      args,
      options: {
        from: { type: "string" },
        to: { type: "string" },
        path: { type: "string" },
        repo: { type: "string" },
        inclusive: { type: "boolean" },
        help: { type: "boolean", short: "h" },
        version: { type: "boolean", short: "v" },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }

  if (values.help || values.version) {
    return { kind, help: values.help ?? false, version: values.version ?? false };
  }

  const parsed = RangeRequest.safeParse({
    repoPath: values.repo ?? cwd,
    from: values.from,
    to: values.to,
    path: values.path,
    inclusive: values.inclusive,
  });
  if (!parsed.success) {
    throw new UsageError(describeIssues(parsed.error));
  }

  const { repoPath, from, to, path, inclusive } = parsed.data;
  return {
    kind,
    help: false,
    version: false,
    request: { repoPath, range: { from, to, inclusive: inclusive ?? false }, path },
  };
}

export async function runCli(argv: string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };

  let command: ParsedCommand;
  try {
    command = parseCommand(argv, deps.cwd);
  } catch (error) {
    deps.stderr(`Error: ${errorMessage(error)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  if (command.help) {
    deps.stdout(USAGE);
    return EXIT_OK;
  }
  if (command.version) {
    deps.stdout(`${VERSION}\n`);
    return EXIT_OK;
  }
  if (!command.request) {
    deps.stderr(USAGE);
    return EXIT_USAGE;
  }

  let config: AppConfig;
  try {
    config = loadConfig(deps.env);
  } catch (error) {
    const detail = error instanceof ZodError
      ? error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
      : errorMessage(error);
    deps.stderr(`Error: invalid configuration: ${detail}\n`);
    return EXIT_USAGE;
  }

  const logger = new RunLogger({ debug: config.debug, logDir: config.logDir });
  const { repoPath, ...request } = command.request;
  const source = deps.createSource(repoPath, config, logger);

  try {
    if (command.kind === "merges") {
      await new MergeReporter(source, logger).run(request, deps.stdout);
    } else {
      await new FileCommitLister(source, logger).run(request, deps.stdout);
    }
  } catch (error) {
    deps.stderr(`Error: ${errorMessage(error)}\n`);
    return EXIT_GIT_FAILURE;
  }

  return EXIT_OK;
}
