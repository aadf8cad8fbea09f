import { describe, it, expect } from "vitest";
import {
  formatLocation,
  rendererName,
  renderDeduped,
  renderDiff,
  renderEntities,
  renderGrouped,
  renderTestFailures,
  selectRenderer,
} from "../renderers.js";
import type { OutputRecord } from "../types.js";

describe("formatLocation", () => {
  it("joins file, line and column", () => {
    expect(formatLocation({ kind: "error", message: "x", location: { file: "a.rs", line: 3, column: 4 } })).toBe("a.rs:3:4");
    expect(formatLocation({ kind: "error", message: "x", location: { file: "a.rs" } })).toBe("a.rs");
    expect(formatLocation({ kind: "error", message: "x" })).toBeUndefined();
  });
});

describe("renderTestFailures", () => {
  it("shows failures with capped context, then the summary", () => {
    const records: OutputRecord[] = [
      { kind: "info", message: "ok_one" },
      {
        kind: "error",
        message: "parse::fails",
        location: { file: "src/lib.rs", line: 10, column: 5 },
        context: ["a", "b", "c", "d", "e", "f", "g"],
      },
      { kind: "summary", message: "3 passed, 1 failed" },
    ];
    expect(renderTestFailures(records)).toBe(
      "FAIL parse::fails (src/lib.rs:10:5)\n  a\n  b\n  c\n  d\n  e\n  ... +2 more lines\n3 passed, 1 failed",
    );
  });

  it("counts passes and failures when there is no summary", () => {
    const records: OutputRecord[] = [
      { kind: "error", message: "x" },
      { kind: "warning", message: "slow" },
      { kind: "info", message: "y" },
    ];
    expect(renderTestFailures(records)).toBe("FAIL x\nWARN slow\n1 passed, 1 failed");
  });
});

describe("renderGrouped", () => {
  it("groups by file, collapses repeats and totals", () => {
    const records: OutputRecord[] = [
      { kind: "error", location: { file: "a.ts", line: 3, column: 1 }, code: "TS1", message: "bad" },
      { kind: "warning", location: { file: "b.ts", line: 2 }, message: "meh" },
      { kind: "error", location: { file: "a.ts", line: 7, column: 1 }, code: "TS1", message: "bad" },
      { kind: "summary", message: "Found 3 errors" },
    ];
    expect(renderGrouped(records)).toBe(
      ["a.ts (2)", "  3:1 error[TS1]: bad (x2)", "b.ts (1)", "  2 warning: meh", "Found 3 errors", "2 errors, 1 warning in 2 files"].join("\n"),
    );
  });

  it("caps the entries shown per file", () => {
    const records: OutputRecord[] = Array.from({ length: 12 }, (_, i) => ({
      kind: "warning" as const,
      location: { file: "big.py", line: i + 1 },
      message: `issue ${i}`,
    }));
    const lines = renderGrouped(records).split("\n");
    expect(lines[0]).toBe("big.py (12)");
    expect(lines[11]).toBe("  ... +2 more");
    expect(lines[12]).toBe("12 warnings in 1 file");
  });
});

describe("renderEntities", () => {
  it("puts summaries first, then one line per entity", () => {
    const records: OutputRecord[] = [
      { kind: "info", code: "M", message: "src/a.rs" },
      { kind: "summary", message: "on branch main" },
      { kind: "info", message: "plain entity" },
    ];
    expect(renderEntities(records)).toBe("on branch main\nM src/a.rs\nplain entity");
  });

  it("caps the entity list", () => {
    const records: OutputRecord[] = Array.from({ length: 53 }, (_, i) => ({ kind: "info" as const, message: `c${i}` }));
    const lines = renderEntities(records).split("\n");
    expect(lines).toHaveLength(51);
    expect(lines[50]).toBe("... +3 more");
  });
});

describe("renderDeduped", () => {
  it("collapses repeats and totals issues", () => {
    const records: OutputRecord[] = [
      { kind: "info", message: "a" },
      { kind: "info", message: "a" },
      { kind: "error", message: "boom" },
      { kind: "warning", message: "careful" },
    ];
    expect(renderDeduped(records)).toBe("a (x2)\nboom\ncareful\n1 error, 1 warning");
  });
});

describe("renderDiff", () => {
  it("numbers lines when it can and totals every file", () => {
    const records: OutputRecord[] = [
      { kind: "info", location: { file: "a.ts" }, code: "@@", message: "@@ -1 +1 @@" },
      { kind: "info", location: { file: "a.ts", line: 1 }, code: "-", message: "x" },
      { kind: "info", location: { file: "a.ts", line: 1 }, code: "+", message: "x" },
      { kind: "info", code: "+", message: "loose" },
    ];
    expect(renderDiff(records)).toBe(
      "a.ts +1 -1\n  @@ -1 +1 @@\n  -1: x\n  +1: x\n(no file) +1 -0\n  + loose\n2 files changed, +2 -1",
    );
  });
});

describe("rendererName", () => {
  it("uses the strategy default unless a renderer is declared", () => {
    expect(rendererName("phased")).toBe("test-failures");
    expect(rendererName("streaming")).toBe("test-failures");
    expect(rendererName("pattern")).toBe("grouped");
    expect(rendererName("structured")).toBe("grouped");
    expect(rendererName("plain")).toBe("deduped");
    expect(rendererName("phased", "entities")).toBe("entities");
  });

  it("selects the matching function", () => {
    expect(selectRenderer("plain")).toBe(renderDeduped);
    expect(selectRenderer("pattern", "entities")).toBe(renderEntities);
    expect(selectRenderer("phased", "diff")).toBe(renderDiff);
  });
});
