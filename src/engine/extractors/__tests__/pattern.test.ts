import { describe, it, expect } from "vitest";
import { PatternExtractor } from "../pattern.js";
import type { ExtractOutcome, PatternTemplate } from "../../types.js";

function records(outcome: ExtractOutcome) {
  if (!outcome.ok) throw new Error(`extraction failed: ${outcome.error.message}`);
  return outcome.records;
}

describe("PatternExtractor", () => {
  const templates: PatternTemplate[] = [
    { kind: "warning", regex: /^(?<file>[^:]+):(?<line>\d+): (?<message>x.*)$/ },
    { kind: "error", regex: /^(?<file>[^:]+):(?<line>\d+): (?<message>xy.*)$/ },
  ];

  it("takes the first template in declaration order", () => {
    const [record] = records(new PatternExtractor(templates).extract("a.c:4: xyz\n", "strict"));
    expect(record).toEqual({
      kind: "warning",
      location: { file: "a.c", line: 4 },
      message: "xyz",
      rawLine: "a.c:4: xyz",
    });
  });

  it("ignores lines that match nothing when something matched", () => {
    const out = records(new PatternExtractor(templates).extract("noise\na.c:1: x1\n\nmore noise\n", "strict"));
    expect(out.map((r) => r.message)).toEqual(["x1"]);
  });

  it("fails strict mode when no line matches", () => {
    const outcome = new PatternExtractor(templates).extract("nothing useful\n", "strict");
    expect(outcome).toEqual({
      ok: false,
      error: { kind: "no_pattern_match", message: "no line matched any record template" },
    });
  });

  it("succeeds with no records on blank input", () => {
    expect(records(new PatternExtractor(templates).extract("\n\n", "strict"))).toEqual([]);
  });

  it("adds the generic diagnostic templates in lenient mode", () => {
    const out = records(new PatternExtractor(templates).extract("lib.rs:3:1: warning: unused import\n", "lenient"));
    expect(out).toEqual([
      {
        kind: "warning",
        location: { file: "lib.rs", line: 3, column: 1 },
        message: "unused import",
        rawLine: "lib.rs:3:1: warning: unused import",
      },
    ]);
  });

  it("skips lines matching a skip pattern", () => {
    const extractor = new PatternExtractor(templates, [/^a\.c:1:/]);
    const out = records(extractor.extract("a.c:1: x-skipped\na.c:2: x-kept\n", "strict"));
    expect(out.map((r) => r.message)).toEqual(["x-kept"]);
  });

  it("matches through ANSI colors but keeps the raw line", () => {
    const out = records(new PatternExtractor(templates).extract("\x1b[31ma.c:9: xred\x1b[0m\n", "strict"));
    expect(out[0].message).toBe("xred");
    expect(out[0].rawLine).toBe("\x1b[31ma.c:9: xred\x1b[0m");
  });

  it("treats a template whose message cannot be filled as a miss", () => {
    const partial: PatternTemplate[] = [
      { kind: "error", regex: /^E (?<name>\w*)$/, fields: { message: "{name}" } },
      { kind: "info", regex: /^E(?<rest>.*)$/, fields: { message: "fallback{rest}" } },
    ];
    const out = records(new PatternExtractor(partial).extract("E \n", "strict"));
    expect(out).toEqual([{ kind: "info", message: "fallback", rawLine: "E " }]);
  });
});
