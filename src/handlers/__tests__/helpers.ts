import { expect, vi } from "vitest";
import type { HandlerDeps } from "../types.js";
import type { ToolResponse } from "../../response.js";
import { UsageTracker } from "../../state/usage.js";
import { ToolRegistry } from "../../tools/registry.js";

export function createMockDeps(overrides?: Partial<HandlerDeps["config"]>): HandlerDeps {
  return {
    connector: {
      execute: vi.fn(),
      executeShell: vi.fn(),
      disconnect: vi.fn(),
    },
    config: {
      mode: "local" as const,
      timeout: 300,
      maxOutputChars: 65536,
      level: "minimal" as const,
      verbose: false,
      ...overrides,
    },
    registry: new ToolRegistry(),
    usage: new UsageTracker(),
  };
}

export function ok(stdout: string, exitCode = 0) {
  return { stdout, stderr: "", exitCode };
}

export function fail(stderr: string, exitCode = 1) {
  return { stdout: "", stderr, exitCode };
}

type Content = { content: Array<{ type: string; text: string }> };

/** The envelope is always the last content block. */
export function parseEnvelope(result: Content): ToolResponse {
  return JSON.parse(result.content[result.content.length - 1].text);
}

/** Text payload of a condensed or filtered reply. */
export function textOf(result: Content): string {
  expect(result.content).toHaveLength(2);
  return result.content[0].text;
}

export function sentChars(result: Content): number {
  return result.content.reduce((sum, block) => sum + block.text.length, 0);
}
