import { z } from "zod";
import { FILTER_LEVELS } from "../engine/source-filter.js";

export const runCommandSchema = z.object({
  command: z.string().min(1).describe("Shell command to run (e.g., 'cargo test', 'git status', 'npx eslint -f json src')"),
  tool: z.string().optional().describe("Profile name to parse with instead of the one resolved from the command (see list_profiles)"),
  cwd: z.string().optional().describe("Working directory (default: server --cwd)"),
  timeout: z.number().positive().optional().describe("Timeout in seconds (default: server --timeout)"),
});
export type RunCommandArgs = z.infer<typeof runCommandSchema>;

export const condenseOutputSchema = z.object({
  tool: z.string().describe("Profile name describing the output's format (see list_profiles)"),
  stdout: z.string().describe("Captured standard output"),
  stderr: z.string().optional().default("").describe("Captured standard error"),
  exit_code: z.number().int().optional().default(0).describe("Exit status of the process that produced the output"),
});
export type CondenseOutputArgs = z.input<typeof condenseOutputSchema>;

export const readSourceSchema = z.object({
  path: z.string().min(1).describe("Path of the source file to read"),
  level: z.enum(FILTER_LEVELS).optional().describe(
    "'none' (verbatim), 'minimal' (comments and blank runs removed), 'aggressive' (also elides function bodies). Default: server --level"
  ),
  language: z.string().optional().describe("Language name; inferred from the file extension when omitted"),
  max_lines: z.number().int().positive().optional().describe("Keep at most this many lines of the filtered text"),
  line_numbers: z.boolean().optional().default(false).describe("Prefix each line with its number in the filtered text"),
});
export type ReadSourceArgs = z.input<typeof readSourceSchema>;

export const listProfilesSchema = z.object({
  tag: z.string().optional().describe("Only profiles with this tag (e.g., 'test', 'lint', 'git')"),
});
export type ListProfilesArgs = z.infer<typeof listProfilesSchema>;

export const usageStatsSchema = z.object({});
export type UsageStatsArgs = z.infer<typeof usageStatsSchema>;
