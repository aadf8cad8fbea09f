/**
 * Tool Registry: profile lookup by name and by invoked command.
 *
 * Built once at server start from the static profiles and handed to the
 * handlers; tests build their own.
 */

import type { ToolProfile } from "../engine/types.js";
import { PLAIN_PROFILE_NAME, TOOL_PROFILES } from "./definitions.js";

export type { ToolProfile };

const ENV_ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

/** Split a shell command into words, honoring simple quoting. */
export function commandWords(command: string): string[] {
  const words: string[] = [];
  const re = /"([^"]*)"|'([^']*)'|(\S+)/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(command)) !== null) {
    words.push(m[1] ?? m[2] ?? m[3] ?? "");
  }
  return words;
}

function binaryName(word: string): string {
  const base = word.slice(Math.max(word.lastIndexOf("/"), word.lastIndexOf("\\")) + 1);
  return base.replace(/\.exe$/i, "");
}

/**
 * Words of the command the runner actually starts: env assignments dropped,
 * the binary reduced to its name, and package runners looked through.
 */
export function effectiveWords(command: string): string[] {
  let words = commandWords(command);
  while (words.length > 0 && ENV_ASSIGNMENT.test(words[0] ?? "")) words = words.slice(1);

  for (;;) {
    if (words.length === 0) return words;
    words = [binaryName(words[0] ?? ""), ...words.slice(1)];
    const [first, second] = words;
    if (first === "npx" || first === "bunx") {
      words = words.slice(1);
      while (words[0]?.startsWith("-")) words = words.slice(1);
    } else if ((first === "pnpm" || first === "yarn") && (second === "exec" || second === "dlx")) {
      words = words.slice(2);
    } else if ((first === "uv" || first === "poetry") && second === "run") {
      words = words.slice(2);
    } else if (/^python(?:\d(?:\.\d+)?)?$/.test(first ?? "") && second === "-m") {
      words = words.slice(2);
    } else {
      return words;
    }
  }
}

function indexOfRun(haystack: readonly string[], needle: readonly string[]): number {
  outer: for (let i = 0; i + needle.length <= haystack.length; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) continue outer;
    }
    return i;
  }
  return -1;
}

/**
 * Number of pattern words matched, or 0 when the pattern does not apply.
 * Leading words are a prefix; the flag part may sit anywhere after it.
 */
export function matchCommand(pattern: string, words: readonly string[]): number {
  const parts = pattern.split(/\s+/).filter(Boolean);
  const flagAt = parts.findIndex((p) => p.startsWith("-"));
  const lead = flagAt === -1 ? parts : parts.slice(0, flagAt);
  const flags = flagAt === -1 ? [] : parts.slice(flagAt);

  if (lead.length === 0 || lead.length > words.length) return 0;
  if (lead.some((p, i) => words[i] !== p)) return 0;
  if (flags.length > 0 && indexOfRun(words.slice(lead.length), flags) === -1) return 0;
  return parts.length;
}

/**
 * In-memory profile registry built from static definitions.
 */
export class ToolRegistry {
  private readonly profiles = new Map<string, ToolProfile>();
  private readonly fallback: ToolProfile;

  constructor(definitions: readonly ToolProfile[] = TOOL_PROFILES) {
    for (const def of definitions) {
      if (this.profiles.has(def.name)) {
        throw new Error(`Duplicate tool profile: ${def.name}`);
      }
      this.profiles.set(def.name, def);
    }
    this.fallback = this.profiles.get(PLAIN_PROFILE_NAME) ?? {
      name: PLAIN_PROFILE_NAME,
      description: "any other command",
      commands: [],
      strategy: { kind: "plain" },
    };
  }

  /** Get a profile by name. */
  get(name: string): ToolProfile | undefined {
    return this.profiles.get(name);
  }

  /** All profiles, in definition order. */
  all(): ToolProfile[] {
    return [...this.profiles.values()];
  }

  /** Filter profiles by tag. */
  byTag(tag: string): ToolProfile[] {
    return this.all().filter((p) => p.tags?.includes(tag));
  }

  has(name: string): boolean {
    return this.profiles.has(name);
  }

  get size(): number {
    return this.profiles.size;
  }

  /** Profile for a command line; the most specific command pattern wins, else plain. */
  resolve(command: string): ToolProfile {
    const words = effectiveWords(command);
    let best: ToolProfile | undefined;
    let bestScore = 0;
    for (const profile of this.profiles.values()) {
      for (const pattern of profile.commands) {
        const score = matchCommand(pattern, words);
        if (score > bestScore) {
          best = profile;
          bestScore = score;
        }
      }
    }
    return best ?? this.fallback;
  }
}
