/**
 * Shared path from captured output to a tool result: profile lookup, the
 * engine run, usage accounting and the verbose log line.
 */

import type { HandlerDeps } from "./types.js";
import type { RawOutput, ToolProfile } from "../engine/types.js";
import { joinStreams, parse } from "../engine/controller.js";
import { ProxyError } from "../errors/proxy-error.js";
import type { ToolResult } from "../response.js";
import { formatText } from "../response.js";
import { savingsPercent } from "../state/usage.js";

export function profileByName(deps: HandlerDeps, name: string): ToolProfile {
  const profile = deps.registry.get(name);
  if (!profile) {
    throw new ProxyError(
      `Unknown tool profile: ${name}`,
      "PROFILE_NOT_FOUND",
      "validation",
      "Use list_profiles to see available profile names",
    );
  }
  return profile;
}

export function logUsage(deps: HandlerDeps, label: string, detail: string, input: number, output: number): void {
  if (!deps.config.verbose) return;
  console.error(`[tokenslim] ${label} ${detail} ${input}→${output} chars (${savingsPercent(input, output)}% saved)`);
}

/**
 * Parse, reply and account. Usage counts the characters actually sent,
 * envelope included.
 */
export function condense(
  deps: HandlerDeps,
  reply: { tool: string; startTime: number },
  profile: ToolProfile,
  raw: RawOutput,
  command: string,
): ToolResult {
  const result = parse(raw, profile, { maxOutputChars: deps.config.maxOutputChars });
  const inputChars = joinStreams(raw.stdout, raw.stderr).length;

  const { result: toolResult, sentChars } = formatText(reply.tool, result.rendered, (sent) => ({
    ...(command ? { command } : {}),
    tool: profile.name,
    strategy: profile.strategy.kind,
    tier: result.tier,
    exit_code: result.exitCode,
    warnings: result.warnings,
    records: result.records.length,
    input_chars: inputChars,
    output_chars: sent,
  }), reply.startTime);

  deps.usage.record({
    toolId: profile.name,
    command,
    inputChars,
    outputChars: sentChars,
    exitCode: result.exitCode,
    strategy: profile.strategy.kind,
    tier: result.tier,
  });
  logUsage(deps, profile.name, result.tier, inputChars, sentChars);

  return toolResult;
}
