/**
 * Run Logger
 *
 * All diagnostics go to stderr so stdout carries nothing but the report.
 * When DEBUG=1, debug lines are printed too and every line is mirrored into a
 * session file under ~/.merge-report/logs/ (or MERGE_REPORT_LOG_DIR).
 */

import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";

import { DEFAULT_LOG_DIR } from "../config.js";

export interface RunLoggerOptions {
  debug: boolean;
  logDir?: string;
}

export class RunLogger {
  private readonly debugEnabled: boolean;
  private readonly logDir: string;
  private logFile: string | null = null;
  private sessionStart = Date.now();
  private counters = {
    gitCalls: 0,
    gitFailures: 0,
  };

  constructor(options: RunLoggerOptions) {
    this.debugEnabled = options.debug;
    this.logDir = options.logDir ?? DEFAULT_LOG_DIR;

    if (this.debugEnabled) {
      this.initLogFile();
    }
  }

  get isDebug(): boolean {
    return this.debugEnabled;
  }

  private initLogFile(): void {
    try {
      if (!existsSync(this.logDir)) {
        mkdirSync(this.logDir, { recursive: true });
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
      this.logFile = join(this.logDir, `merge-report-${timestamp}.log`);

      const env = (key: string, fallback: string) => process.env[key] ?? `${fallback} (default)`;

      this.writeRaw(`
================================================================================
MERGE REPORT DEBUG LOG - Session started at ${new Date().toISOString()}
================================================================================
ENV:
  GIT_BINARY              = ${env("GIT_BINARY", "git")}
  GIT_COMMAND_TIMEOUT_MS  = ${env("GIT_COMMAND_TIMEOUT_MS", "60000")}
  GIT_MAX_BUFFER_MB       = ${env("GIT_MAX_BUFFER_MB", "256")}
  CWD                     = ${process.cwd()}
================================================================================
`);
    } catch (error) {
      this.logFile = null;
      console.error("[RunLogger] Failed to init log file:", error);
    }
  }

  private writeRaw(message: string): void {
    if (!this.logFile) return;
    try {
      appendFileSync(this.logFile, message + "\n");
    } catch (error) {
      // Stop mirroring rather than fail the run over a log file
      console.error("[RunLogger] Failed to write log file, disabling:", error);
      this.logFile = null;
    }
  }

  private formatTime(): string {
    const elapsed = Date.now() - this.sessionStart;
    const sec = Math.floor(elapsed / 1000);
    const ms = elapsed % 1000;
    return `+${sec.toString().padStart(4, " ")}.${ms.toString().padStart(3, "0")}s`;
  }

  private emit(line: string, data?: Record<string, unknown>): void {
    const suffix = data ? ` | ${JSON.stringify(data)}` : "";
    console.error(line + suffix);
    this.writeRaw(`[${this.formatTime()}] ${line}${suffix}`);
  }

  info(component: string, message: string, data?: Record<string, unknown>): void {
    this.emit(`[${component}] ${message}`, data);
  }

  warn(component: string, message: string, data?: Record<string, unknown>): void {
    this.emit(`[${component}] Warning: ${message}`, data);
  }

  /**
   * Debug-only trace line, prefixed with the elapsed session time
   */
  debug(component: string, message: string, data?: Record<string, unknown>): void {
    if (!this.debugEnabled) return;
    const suffix = data ? ` | ${JSON.stringify(data)}` : "";
    const line = `[${this.formatTime()}] [${component}] ${message}${suffix}`;
    console.error(line);
    this.writeRaw(line);
  }

  /**
   * Count a git invocation (for the session summary)
   */
  gitCall(args: readonly string[], durationMs: number, ok: boolean): void {
    this.counters.gitCalls++;
    if (!ok) this.counters.gitFailures++;
    this.debug("Git", `${ok ? "OK" : "FAILED"}: git ${args.join(" ")}`, { durationMs });
  }

  getCounters(): { gitCalls: number; gitFailures: number } {
    return { ...this.counters };
  }

  /**
   * Write run stats to the session file
   */
  summary(component: string, stats: Record<string, unknown>): void {
    this.writeRaw(`
--------------------------------------------------------------------------------
SUMMARY for ${component}
--------------------------------------------------------------------------------
${JSON.stringify(stats, null, 2)}
Session counters: ${JSON.stringify(this.counters)}
--------------------------------------------------------------------------------
`);
  }

  getLogPath(): string | null {
    return this.logFile;
  }
}

const DEBUG = process.env.DEBUG === "true" || process.env.DEBUG === "1";

// Singleton instance
export const runLog = new RunLogger({ debug: DEBUG, logDir: process.env.MERGE_REPORT_LOG_DIR });
