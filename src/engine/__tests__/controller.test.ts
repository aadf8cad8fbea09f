import { describe, it, expect } from "vitest";
import { parse, joinStreams, NO_OUTPUT } from "../controller.js";
import { extractorFor } from "../extractors/index.js";
import type { RawOutput, ToolProfile } from "../types.js";

function raw(stdout: string, exitCode = 0, stderr = ""): RawOutput {
  return { stdout, stderr, exitCode, toolId: "test" };
}

const events: ToolProfile = {
  name: "events",
  description: "ndjson results",
  commands: [],
  strategy: {
    kind: "streaming",
    layout: {
      typeField: "type",
      events: {
        result: [
          { kind: "error", where: { field: "status", equals: "fail" }, fields: { message: "{name}" } },
          { kind: "info", fields: { message: "{name}" } },
        ],
      },
    },
  },
};

const report: ToolProfile = {
  name: "report",
  description: "json report",
  commands: [],
  strategy: {
    kind: "structured",
    layout: { entries: "", fields: { message: "message" }, defaultKind: "error" },
  },
};

const diagnostics: ToolProfile = {
  name: "diagnostics",
  description: "tsc-style lines",
  commands: [],
  strategy: {
    kind: "pattern",
    templates: [
      {
        kind: "error",
        regex: /^(?<file>.+?)\((?<line>\d+),(?<column>\d+)\): error (?<code>TS\d+): (?<message>.+)$/,
      },
    ],
  },
};

const logs: ToolProfile = { name: "logs", description: "plain", commands: [], strategy: { kind: "plain" } };

describe("joinStreams", () => {
  it("puts stderr after stdout on its own line", () => {
    expect(joinStreams("out", "err")).toBe("out\nerr");
    expect(joinStreams("out\n", "err")).toBe("out\nerr");
  });

  it("returns the non-empty stream alone", () => {
    expect(joinStreams("", "err")).toBe("err");
    expect(joinStreams("out", "")).toBe("out");
  });
});

describe("parse", () => {
  it("degrades when one streaming line is malformed", () => {
    const stdout = [
      '{"type":"result","name":"a","status":"pass"}',
      '{"type":"result","name":"b","status":"fail"}',
      "not json",
      '{"type":"result","name":"c","status":"pass"}',
      "",
    ].join("\n");

    const result = parse(raw(stdout), events);
    expect(result.tier).toBe("degraded");
    expect(result.records).toHaveLength(3);
    expect(result.warnings).toEqual([
      "strict parse failed (malformed streaming line: line 3: not valid JSON)",
      "1 line skipped",
    ]);
    expect(result.rendered).toBe(
      "[degraded: strict parse failed (malformed streaming line: line 3: not valid JSON); 1 line skipped]\n" +
        "FAIL b\n" +
        "2 passed, 1 failed",
    );
  });

  it("passes garbage through verbatim when nothing can be extracted", () => {
    const stdout = "Segmentation fault (core dumped)\n";
    const result = parse(raw(stdout, 139), report);

    expect(result.tier).toBe("passthrough");
    expect(result.rendered).toBe(stdout);
    expect(result.records).toEqual([]);
    expect(result.exitCode).toBe(139);
    expect(result.warnings[0]).toMatch(/^parse failed, showing raw output \(malformed structured: /);
    expect(result.warnings[0]).toMatch(/; no pattern match: no line matched any record template\)$/);
  });

  it("truncates passthrough output at the ceiling", () => {
    const result = parse(raw("abcdefghijklmnop"), report, { maxOutputChars: 10 });
    expect(result.rendered).toBe("abcdefghij\n[output truncated: 10 of 16 chars shown]");
    expect(result.warnings[1]).toBe("output too large: truncated to 10 chars");
  });

  it("reports empty output", () => {
    expect(parse(raw("", 0, "  \n"), logs).rendered).toBe(NO_OUTPUT);
    const failed = parse(raw("", 2), logs);
    expect(failed.tier).toBe("full");
    expect(failed.rendered).toBe("(no output)\nexit code: 2");
  });

  it("adds the exit code when no error record explains a failure", () => {
    expect(parse(raw("build ok\n", 1), logs).rendered).toBe("build ok\nexit code: 1");
    expect(parse(raw("error: boom\n", 1), logs).rendered).toBe("error: boom\n1 error");
  });

  it("copies the exit code through unchanged", () => {
    expect(parse(raw("x\n", 42), logs).exitCode).toBe(42);
  });

  it("degrades a strict result that saw fewer records than lenient", () => {
    const stdout = "src/a.ts(1,2): error TS2322: Type mismatch\nerror: something else\n";
    const result = parse(raw(stdout, 2), diagnostics);

    expect(result.tier).toBe("degraded");
    expect(result.warnings).toEqual(["strict parse missed 1 of 2 records"]);
    expect(result.rendered).toBe(
      [
        "[degraded: strict parse missed 1 of 2 records]",
        "src/a.ts (1)",
        "  1:2 error[TS2322]: Type mismatch",
        "(no file) (1)",
        "  error: something else",
        "2 errors in 1 file",
      ].join("\n"),
    );
  });

  it("never reports full with fewer records than a lenient pass finds", () => {
    const inputs: Array<[ToolProfile, string]> = [
      [diagnostics, "src/a.ts(1,2): error TS1: x\n"],
      [diagnostics, "src/a.ts(1,2): error TS1: x\nwarning: y\n"],
      [events, '{"type":"result","name":"a"}\n'],
      [logs, "one\ntwo\n"],
    ];
    for (const [profile, stdout] of inputs) {
      const result = parse(raw(stdout), profile);
      const lenient = extractorFor(profile.strategy).extract(stdout, "lenient");
      if (result.tier === "full" && lenient.ok) {
        expect(result.records.length).toBeGreaterThanOrEqual(lenient.records.length);
      }
    }
  });

  it("returns frozen results", () => {
    const result = parse(raw("line\n"), logs);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.records)).toBe(true);
  });
});
