/**
 * Zod schemas shared by the MCP tools and the CLI
 *
 * Note: Schemas are exported as plain objects (not wrapped in z.object()) because
 * McpServer.registerTool() expects schemas in this format. The CLI wraps them
 * with z.object() itself.
 */

import { z } from "zod";

const revision = (what: string) =>
  z
    .string()
    .trim()
    .min(1, `${what} revision must not be empty`)
    .refine((value) => !value.startsWith("-"), `${what} revision must not start with "-"`);

export const RangeRequestSchema = {
  repoPath: z
    .string()
    .min(1)
    .describe("Path inside the git repository to analyze"),
  from: revision("Start").describe("Start of the range (tag, branch or commit); excluded unless inclusive"),
  to: revision("End").describe("End of the range (tag, branch or commit)"),
  path: z
    .string()
    .trim()
    .min(1, "path must not be empty")
    .describe("File of interest, relative to the repository root (e.g. 'kernel/bpf/verifier.c')"),
  inclusive: z
    .boolean()
    .optional()
    .describe("Include the 'from' commit itself (range from^..to, default: false)"),
};

export const RangeRequest = z.object(RangeRequestSchema);
export type RangeRequestInput = z.infer<typeof RangeRequest>;
