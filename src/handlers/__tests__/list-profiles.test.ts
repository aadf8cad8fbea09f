import { describe, it, expect } from "vitest";
import { describeProfile, handleListProfiles } from "../list-profiles.js";
import { createMockDeps, parseEnvelope } from "./helpers.js";

describe("handleListProfiles", () => {
  it("lists every profile", async () => {
    const env = parseEnvelope(await handleListProfiles(createMockDeps(), {}));
    expect(env.data.count).toBe(23);
  });

  it("filters by tag", async () => {
    const env = parseEnvelope(await handleListProfiles(createMockDeps(), { tag: "git" }));
    expect(env.data.count).toBe(4);
    expect(env.data.profiles).toEqual([
      expect.objectContaining({ name: "git-status", renderer: "entities" }),
      expect.objectContaining({ name: "git-log", renderer: "entities" }),
      expect.objectContaining({ name: "git-diff", renderer: "diff" }),
      expect.objectContaining({ name: "git-write", renderer: "entities" }),
    ]);
  });
});

describe("describeProfile", () => {
  it("fills in the strategy's default renderer", () => {
    const deps = createMockDeps();
    const eslint = deps.registry.get("eslint-json");
    if (!eslint) throw new Error("missing eslint-json");
    expect(describeProfile(eslint)).toEqual({
      name: "eslint-json",
      description: "ESLint JSON report grouped by file and rule",
      strategy: "structured",
      renderer: "grouped",
      commands: ["eslint --format json", "eslint --format=json", "eslint -f json"],
      tags: ["javascript", "typescript", "lint"],
    });
  });
});
