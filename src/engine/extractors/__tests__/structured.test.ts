import { describe, it, expect } from "vitest";
import { StructuredExtractor } from "../structured.js";
import type { StructuredLayout } from "../../types.js";

const layout: StructuredLayout = {
  entries: "items",
  fields: { file: "path", line: "line", message: "message", severity: "level" },
  severities: { "2": "error", "1": "warning" },
  defaultKind: "info",
  summary: "{total} checked",
};

const doc = JSON.stringify({
  total: 3,
  items: [{ path: "a.py", line: 4, message: "bad", level: 2 }, { path: "b.py" }, { message: "note", level: 0 }],
});

describe("StructuredExtractor", () => {
  it("fails strict mode on the first invalid entry", () => {
    expect(new StructuredExtractor(layout).extract(doc, "strict")).toEqual({
      ok: false,
      error: { kind: "malformed_structured", message: 'entry 1: missing field "message"' },
    });
  });

  it("skips invalid entries in lenient mode and reports them", () => {
    expect(new StructuredExtractor(layout).extract(doc, "lenient")).toEqual({
      ok: true,
      records: [
        { kind: "error", message: "bad", location: { file: "a.py", line: 4 } },
        { kind: "info", message: "note" },
        { kind: "summary", message: "3 checked" },
      ],
      warnings: ["1 invalid entry skipped"],
    });
  });

  it("digs the document out of surrounding noise in lenient mode only", () => {
    const rootLayout: StructuredLayout = { entries: "", fields: { message: "message" }, defaultKind: "warning" };
    const noisy = 'npm WARN config\n[{"message":"x"}]\ndone\n';
    const extractor = new StructuredExtractor(rootLayout);

    expect(extractor.extract(noisy, "strict").ok).toBe(false);
    expect(extractor.extract(noisy, "lenient")).toEqual({
      ok: true,
      records: [{ kind: "warning", message: "x" }],
      warnings: [],
    });
  });

  it("requires an array at the entries path", () => {
    const extractor = new StructuredExtractor({ entries: "", fields: { message: "m" }, defaultKind: "info" });
    expect(extractor.extract('{"a":1}', "strict")).toEqual({
      ok: false,
      error: { kind: "malformed_structured", message: 'expected an array at "<root>"' },
    });
  });

  it("reads child fields first and falls back to the parent entry", () => {
    const nested: StructuredLayout = {
      entries: "",
      children: "messages",
      fields: { file: "filePath", line: "line", code: "ruleId", message: "message", severity: "severity" },
      severities: { "2": "error" },
      defaultKind: "warning",
    };
    const input = JSON.stringify([
      { filePath: "src/a.ts", messages: [{ ruleId: "semi", severity: 1, message: "Missing semicolon.", line: 3 }] },
      { filePath: "src/b.ts", messages: [] },
    ]);
    expect(new StructuredExtractor(nested).extract(input, "strict")).toEqual({
      ok: true,
      records: [{ kind: "warning", message: "Missing semicolon.", location: { file: "src/a.ts", line: 3 }, code: "semi" }],
      warnings: [],
    });
  });

  it("attaches string context split into lines", () => {
    const withContext: StructuredLayout = {
      entries: "",
      fields: { message: "title", context: "details" },
      defaultKind: "error",
    };
    const input = JSON.stringify([{ title: "t", details: ["first\n\nsecond  ", 7] }]);
    expect(new StructuredExtractor(withContext).extract(input, "strict")).toEqual({
      ok: true,
      records: [{ kind: "error", message: "t", context: ["first", "second"] }],
      warnings: [],
    });
  });
});
