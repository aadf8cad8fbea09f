/**
 * Structured extractor: the whole output is one JSON document.
 *
 * A StructuredLayout says where the entries live and which fields carry
 * file, line, code, message and severity. Strict mode requires the text to
 * parse as a whole and every entry to carry a message; lenient mode digs the
 * first JSON value out of surrounding noise and skips broken entries.
 */

import { z } from "zod";
import type { ExtractMode, ExtractOutcome, Extractor, OutputRecord, RecordKind, SourceLocation, StructuredLayout } from "../types.js";
import { fillTemplate, pluralize, readPath, scalarToString } from "../text.js";

const entriesSchema = z.array(z.unknown());
const entrySchema = z.record(z.string(), z.unknown());

type JsonObject = z.infer<typeof entrySchema>;

type ParsedJson = { ok: true; value: unknown } | { ok: false; message: string };

function parseJson(text: string): ParsedJson {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
}

/** End index (exclusive) of the balanced JSON value starting at `start`, if any. */
function balancedEnd(text: string, start: number): number | undefined {
  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === "\\") i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{" || ch === "[") depth++;
    else if (ch === "}" || ch === "]") {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return undefined;
}

const MAX_SALVAGE_ATTEMPTS = 20;

/** Find the first embedded JSON object or array that parses. */
function salvageJson(text: string): ParsedJson {
  let attempts = 0;
  for (let i = 0; i < text.length && attempts < MAX_SALVAGE_ATTEMPTS; i++) {
    const ch = text[i];
    if (ch !== "{" && ch !== "[") continue;
    attempts++;
    const end = balancedEnd(text, i);
    if (end === undefined) continue;
    const parsed = parseJson(text.slice(i, end));
    if (parsed.ok) return parsed;
  }
  return { ok: false, message: "no JSON document found in output" };
}

function contextLines(value: unknown): string[] | undefined {
  const items = Array.isArray(value) ? value : [value];
  const lines = items
    .filter((v): v is string => typeof v === "string")
    .flatMap((v) => v.split("\n"))
    .map((l) => l.trimEnd())
    .filter((l) => l.trim() !== "");
  return lines.length > 0 ? lines : undefined;
}

export class StructuredExtractor implements Extractor {
  constructor(private readonly layout: StructuredLayout) {}

  extract(text: string, mode: ExtractMode): ExtractOutcome {
    const doc = mode === "strict" ? parseJson(text.trim()) : salvageJson(text);
    if (!doc.ok) {
      return { ok: false, error: { kind: "malformed_structured", message: doc.message } };
    }

    const entries = entriesSchema.safeParse(readPath(doc.value, this.layout.entries));
    if (!entries.success) {
      return {
        ok: false,
        error: {
          kind: "malformed_structured",
          message: `expected an array at "${this.layout.entries || "<root>"}"`,
        },
      };
    }

    const records: OutputRecord[] = [];
    let invalid = 0;
    let firstProblem = "";

    entries.data.forEach((raw, index) => {
      const problem = this.collect(raw, records);
      if (problem) {
        invalid++;
        if (!firstProblem) firstProblem = `entry ${index}: ${problem}`;
      }
    });

    if (invalid > 0 && mode === "strict") {
      return { ok: false, error: { kind: "malformed_structured", message: firstProblem } };
    }

    const summary = this.summaryRecord(doc.value);
    if (summary) records.push(summary);

    const warnings = invalid > 0 ? [`${pluralize(invalid, "invalid entry", "invalid entries")} skipped`] : [];
    return { ok: true, records, warnings };
  }

  /** Append the records for one entry; returns a problem description when invalid. */
  private collect(raw: unknown, out: OutputRecord[]): string | undefined {
    const entry = entrySchema.safeParse(raw);
    if (!entry.success) return "not an object";

    const childPath = this.layout.children;
    if (childPath === undefined) {
      const record = this.toRecord(entry.data, undefined);
      if (!record) return `missing field "${this.layout.fields.message}"`;
      out.push(record);
      return undefined;
    }

    const children = entriesSchema.safeParse(readPath(entry.data, childPath));
    if (!children.success) return `missing array "${childPath}"`;

    const pending: OutputRecord[] = [];
    for (const rawChild of children.data) {
      const child = entrySchema.safeParse(rawChild);
      if (!child.success) return `"${childPath}" item is not an object`;
      const record = this.toRecord(child.data, entry.data);
      if (!record) return `missing field "${this.layout.fields.message}"`;
      pending.push(record);
    }
    out.push(...pending);
    return undefined;
  }

  private toRecord(item: JsonObject, parent: JsonObject | undefined): OutputRecord | undefined {
    const field = (path: string | undefined): unknown => {
      if (path === undefined) return undefined;
      const own = readPath(item, path);
      return own !== undefined || !parent ? own : readPath(parent, path);
    };
    const text = (path: string | undefined) => scalarToString(field(path));

    const { fields } = this.layout;
    const message = text(fields.message);
    if (message === undefined) return undefined;

    const severity = text(fields.severity);
    const kind: RecordKind =
      (severity !== undefined ? this.layout.severities?.[severity] : undefined) ?? this.layout.defaultKind;

    const file = text(fields.file);
    let location: SourceLocation | undefined;
    if (file) {
      const line = field(fields.line);
      const column = field(fields.column);
      location = {
        file,
        ...(typeof line === "number" && { line }),
        ...(typeof column === "number" && { column }),
      };
    }
    const code = text(fields.code);
    const context = fields.context ? contextLines(field(fields.context)) : undefined;

    return {
      kind,
      message: message.trim(),
      ...(location && { location }),
      ...(code && { code }),
      ...(context && { context }),
    };
  }

  private summaryRecord(doc: unknown): OutputRecord | undefined {
    if (!this.layout.summary) return undefined;
    const message = fillTemplate(this.layout.summary, (name) => scalarToString(readPath(doc, name)));
    return message === undefined ? undefined : { kind: "summary", message };
  }
}
