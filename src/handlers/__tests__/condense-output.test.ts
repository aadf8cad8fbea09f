import { describe, it, expect } from "vitest";
import { handleCondenseOutput } from "../condense-output.js";
import { createMockDeps, parseEnvelope, sentChars, textOf } from "./helpers.js";

describe("handleCondenseOutput", () => {
  it("condenses captured output with the named profile", async () => {
    const deps = createMockDeps();

    const result = await handleCondenseOutput(deps, {
      tool: "tsc",
      stdout: "src/a.ts(1,1): error TS1005: ';' expected.\n",
      exit_code: 2,
    });
    const env = parseEnvelope(result);

    expect(env.success).toBe(true);
    expect(env.data.tool).toBe("tsc");
    expect(env.data.tier).toBe("full");
    expect(env.data.exit_code).toBe(2);
    expect(textOf(result)).toBe("src/a.ts (1)\n  1:1 error[TS1005]: ';' expected.\n1 error in 1 file");
    expect(env.data).not.toHaveProperty("command");
  });

  it("defaults stderr to empty and the exit code to 0", async () => {
    const deps = createMockDeps();

    const result = await handleCondenseOutput(deps, { tool: "plain", stdout: "ready\n" });
    const env = parseEnvelope(result);

    expect(env.data.exit_code).toBe(0);
    expect(textOf(result)).toBe("ready");
    expect(env.data.input_chars).toBe(6);
  });

  it("returns unparseable output verbatim", async () => {
    const deps = createMockDeps();

    const result = await handleCondenseOutput(deps, { tool: "jest-json", stdout: "not json at all", exit_code: 1 });
    const env = parseEnvelope(result);

    expect(env.data.tier).toBe("passthrough");
    expect(textOf(result)).toBe("not json at all");
    expect(env.data.records).toBe(0);
  });

  it("counts the envelope in the characters sent", async () => {
    const deps = createMockDeps();
    const stdout = "2024-01-01T00:00:00Z worker ready\n".repeat(500);

    const result = await handleCondenseOutput(deps, { tool: "plain", stdout });
    const env = parseEnvelope(result);

    expect(textOf(result)).toBe("worker ready (x500)");
    expect(env.data.output_chars).toBe(sentChars(result));
    expect(deps.usage.summary().by_tool).toEqual([
      {
        tool: "plain",
        commands: 1,
        input_chars: stdout.length,
        output_chars: sentChars(result),
        saved_chars: stdout.length - sentChars(result),
      },
    ]);
  });

  it("rejects an unknown profile", async () => {
    const deps = createMockDeps();

    const result = await handleCondenseOutput(deps, { tool: "nope", stdout: "x" });
    const env = parseEnvelope(result);

    expect(result.isError).toBe(true);
    expect(env.error_code).toBe("PROFILE_NOT_FOUND");
    expect(env.remediation).toBe("Use list_profiles to see available profile names");
    expect(deps.usage.count).toBe(0);
  });
});
