import { describe, it, expect } from "vitest";
import { PlainExtractor, classifyLine } from "../plain.js";

describe("classifyLine", () => {
  it("reads the level keyword", () => {
    expect(classifyLine("ERROR db down")).toBe("error");
    expect(classifyLine("thread panic at start")).toBe("error");
    expect(classifyLine("warn: disk at 91%")).toBe("warning");
    expect(classifyLine("listening on :8080")).toBe("info");
  });
});

describe("PlainExtractor", () => {
  it("makes one record per non-blank line without leading timestamps", () => {
    const text = "2024-05-01 12:00:00.123 ERROR db down\n\n[12:00:01] warn: disk\nready\n";
    const outcome = new PlainExtractor().extract(text);
    expect(outcome).toEqual({
      ok: true,
      records: [
        { kind: "error", message: "ERROR db down", rawLine: "2024-05-01 12:00:00.123 ERROR db down" },
        { kind: "warning", message: "warn: disk", rawLine: "[12:00:01] warn: disk" },
        { kind: "info", message: "ready", rawLine: "ready" },
      ],
      warnings: [],
    });
  });

  it("keeps a line that is only a timestamp", () => {
    const outcome = new PlainExtractor().extract("2024-05-01T10:00:00Z\n");
    expect(outcome.ok && outcome.records[0].message).toBe("2024-05-01T10:00:00Z");
  });
});
