/**
 * Small text helpers shared across the engine.
 */

import type { FieldTemplates, OutputRecord, RecordKind, SourceLocation } from "./types.js";

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;?]*[A-Za-z]|\x1b\][^\x07]*\x07/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

/** ANSI-stripped, whitespace-collapsed, trimmed. */
export function normalizeMessage(text: string): string {
  return stripAnsi(text).replace(/\s+/g, " ").trim();
}

/** Split into lines, dropping a trailing empty line and carriage returns. */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split("\n").map((l) => (l.endsWith("\r") ? l.slice(0, -1) : l));
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

const PLACEHOLDER = /\{([A-Za-z_][\w.]*)\}/g;

/**
 * Fill `{name}` placeholders from a lookup.
 * Returns undefined when any placeholder has no value.
 */
export function fillTemplate(
  template: string,
  lookup: (name: string) => string | undefined,
): string | undefined {
  let missing = false;
  const out = template.replace(PLACEHOLDER, (_, name: string) => {
    const value = lookup(name);
    if (value === undefined) {
      missing = true;
      return "";
    }
    return value;
  });
  return missing ? undefined : out;
}

function toPositiveInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) && n >= 0 ? n : undefined;
}

/**
 * Build a record from field templates. Returns undefined when the message
 * cannot be filled; optional fields that cannot be filled are left out.
 */
export function buildRecord(
  kind: RecordKind,
  fields: FieldTemplates,
  lookup: (name: string) => string | undefined,
  rawLine?: string,
): OutputRecord | undefined {
  const message = fillTemplate(fields.message, lookup);
  if (message === undefined) return undefined;

  const file = fields.file ? fillTemplate(fields.file, lookup) : undefined;
  const code = fields.code ? fillTemplate(fields.code, lookup) : undefined;
  let location: SourceLocation | undefined;
  if (file) {
    const line = toPositiveInt(fields.line ? fillTemplate(fields.line, lookup) : undefined);
    const column = toPositiveInt(fields.column ? fillTemplate(fields.column, lookup) : undefined);
    location = {
      file,
      ...(line !== undefined && { line }),
      ...(column !== undefined && { column }),
    };
  }

  return {
    kind,
    message: message.trim(),
    ...(location && { location }),
    ...(code && { code }),
    ...(rawLine !== undefined && { rawLine }),
  };
}

/** Lookup over regex named groups; empty groups count as missing. */
export function groupLookup(groups: Record<string, string | undefined> | undefined) {
  return (name: string): string | undefined => {
    const v = groups?.[name];
    return v === undefined || v === "" ? undefined : v;
  };
}

/** Read a dot path (`a.b.0.c`) from an unknown JSON value. */
export function readPath(value: unknown, path: string): unknown {
  if (path === "") return value;
  let current: unknown = value;
  for (const segment of path.split(".")) {
    if (current === null || typeof current !== "object") return undefined;
    const next: unknown = Reflect.get(current, segment);
    current = next;
  }
  return current;
}

/** Stringify scalar JSON values; objects, arrays, null and "" are missing. */
export function scalarToString(value: unknown): string | undefined {
  if (typeof value === "string") return value === "" ? undefined : value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "boolean") return String(value);
  return undefined;
}
