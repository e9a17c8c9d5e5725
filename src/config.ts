/**
 * Environment-driven settings for git access and logging.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

export const DEFAULT_LOG_DIR = join(homedir(), ".merge-report", "logs");

const flag = z
  .string()
  .optional()
  .transform((value) => value === "true" || value === "1");

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return fallback;
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a positive integer, got "${value}"` });
        return z.NEVER;
      }
      return parsed;
    });

const EnvSchema = z.object({
  GIT_BINARY: z.string().min(1).default("git"),
  GIT_COMMAND_TIMEOUT_MS: positiveInt(60_000),
  GIT_MAX_BUFFER_MB: positiveInt(256),
  DEBUG: flag,
  MERGE_REPORT_LOG_DIR: z.string().min(1).optional(),
});

export interface GitSettings {
  /** git executable */
  binary: string;
  /** Per-process timeout */
  timeoutMs: number;
  /** Max bytes of stdout accepted from one git process */
  maxBuffer: number;
}

export interface AppConfig {
  git: GitSettings;
  debug: boolean;
  logDir: string;
}

/**
 * Parse and validate settings from an environment map.
 * Throws a ZodError when a value is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    git: {
      binary: parsed.GIT_BINARY,
      timeoutMs: parsed.GIT_COMMAND_TIMEOUT_MS,
      maxBuffer: parsed.GIT_MAX_BUFFER_MB * 1024 * 1024,
    },
    debug: parsed.DEBUG,
    logDir: parsed.MERGE_REPORT_LOG_DIR ?? DEFAULT_LOG_DIR,
  };
}
