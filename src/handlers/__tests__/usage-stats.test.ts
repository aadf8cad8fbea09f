import { describe, it, expect } from "vitest";
import { handleUsageStats } from "../usage-stats.js";
import { createMockDeps, parseEnvelope } from "./helpers.js";

describe("handleUsageStats", () => {
  it("reports zeros before anything ran", async () => {
    const env = parseEnvelope(await handleUsageStats(createMockDeps()));
    expect(env.data).toEqual({
      commands: 0,
      input_chars: 0,
      output_chars: 0,
      saved_chars: 0,
      savings_pct: 0,
      estimated_tokens_saved: 0,
      tiers: { full: 0, degraded: 0, passthrough: 0 },
      by_tool: [],
    });
  });

  it("reflects recorded runs", async () => {
    const deps = createMockDeps();
    deps.usage.record({
      toolId: "tsc",
      command: "tsc --noEmit",
      inputChars: 400,
      outputChars: 100,
      exitCode: 2,
      strategy: "pattern",
      tier: "full",
    });

    const env = parseEnvelope(await handleUsageStats(deps));
    expect(env.data.saved_chars).toBe(300);
    expect(env.data.estimated_tokens_saved).toBe(75);
    expect(env.data.savings_pct).toBe(75);
  });
});
