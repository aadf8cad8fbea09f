import { describe, it, expect } from "vitest";
import { StreamingExtractor } from "../streaming.js";
import type { StreamingLayout } from "../../types.js";

const layout: StreamingLayout = {
  typeField: "type",
  events: {
    case: [
      { kind: "error", where: { field: "status", equals: "fail" }, fields: { message: "{name}" } },
      { kind: "info", requires: ["name"], fields: { code: "{suite}", message: "{name}" } },
    ],
  },
  summary: "{info} ok, {error} failed",
};

describe("StreamingExtractor", () => {
  it("maps events through the first applicable rule and adds a summary", () => {
    const text = [
      '{"type":"start"}',
      '{"type":"case","name":"adds","suite":"math"}',
      '{"type":"case","name":"divides","status":"fail"}',
      '{"type":"case","suite":"math"}',
    ].join("\n");

    expect(new StreamingExtractor(layout).extract(text, "strict")).toEqual({
      ok: true,
      records: [
        { kind: "info", message: "adds", code: "math" },
        { kind: "error", message: "divides" },
        { kind: "summary", message: "1 ok, 1 failed" },
      ],
      warnings: [],
    });
  });

  it("fails strict mode on a line that is not an object", () => {
    const text = '{"type":"case","name":"a"}\n[1,2]\n';
    expect(new StreamingExtractor(layout).extract(text, "strict")).toEqual({
      ok: false,
      error: { kind: "malformed_streaming_line", message: "line 2: not a JSON object", line: 2 },
    });
  });

  it("fails strict mode on a missing type field", () => {
    const outcome = new StreamingExtractor(layout).extract('{"name":"a"}', "strict");
    expect(outcome.ok ? "" : outcome.error.message).toBe('line 1: missing "type"');
  });

  it("skips malformed lines in lenient mode and counts them", () => {
    const text = 'oops\n{"type":"case","name":"a"}\n{broken\n';
    const outcome = new StreamingExtractor(layout).extract(text, "lenient");
    expect(outcome).toEqual({
      ok: true,
      records: [
        { kind: "info", message: "a" },
        { kind: "summary", message: "1 ok, 0 failed" },
      ],
      warnings: ["2 lines skipped"],
    });
  });

  it("adds no summary when there are no records", () => {
    expect(new StreamingExtractor(layout).extract('{"type":"start"}\n', "strict")).toEqual({
      ok: true,
      records: [],
      warnings: [],
    });
  });
});
