/**
 * Process-lifetime record of how much output the proxy saved.
 *
 * Handlers call record() after every engine run; usage_stats reads
 * summary(). Nothing is persisted.
 */

import type { StrategyKind, Tier } from "../engine/types.js";

/** Rough chars-per-token ratio used for the savings estimate. */
export const CHARS_PER_TOKEN = 4;

export interface UsageEvent {
  toolId: string;
  command: string;
  inputChars: number;
  outputChars: number;
  exitCode: number;
  /** Engine strategy, or "source" for filtered file reads */
  strategy: StrategyKind | "source";
  tier: Tier;
}

export interface ToolUsage {
  tool: string;
  commands: number;
  input_chars: number;
  output_chars: number;
  saved_chars: number;
}

export interface UsageSummary {
  commands: number;
  input_chars: number;
  output_chars: number;
  saved_chars: number;
  savings_pct: number;
  estimated_tokens_saved: number;
  tiers: Record<Tier, number>;
  by_tool: ToolUsage[];
}

/** Percentage of input removed, one decimal; 0 for empty input. */
export function savingsPercent(inputChars: number, outputChars: number): number {
  if (inputChars <= 0) return 0;
  return Math.round(((inputChars - outputChars) / inputChars) * 1000) / 10;
}

export class UsageTracker {
  private readonly events: UsageEvent[] = [];

  record(event: UsageEvent): void {
    this.events.push(event);
  }

  get count(): number {
    return this.events.length;
  }

  summary(): UsageSummary {
    const tiers: Record<Tier, number> = { full: 0, degraded: 0, passthrough: 0 };
    const byTool = new Map<string, ToolUsage>();
    let input = 0;
    let output = 0;

    for (const e of this.events) {
      input += e.inputChars;
      output += e.outputChars;
      tiers[e.tier]++;

      let tool = byTool.get(e.toolId);
      if (!tool) {
        tool = { tool: e.toolId, commands: 0, input_chars: 0, output_chars: 0, saved_chars: 0 };
        byTool.set(e.toolId, tool);
      }
      tool.commands++;
      tool.input_chars += e.inputChars;
      tool.output_chars += e.outputChars;
      tool.saved_chars = Math.max(0, tool.input_chars - tool.output_chars);
    }

    const saved = Math.max(0, input - output);
    return {
      commands: this.events.length,
      input_chars: input,
      output_chars: output,
      saved_chars: saved,
      savings_pct: savingsPercent(input, output),
      estimated_tokens_saved: Math.floor(saved / CHARS_PER_TOKEN),
      tiers,
      by_tool: [...byTool.values()],
    };
  }
}
