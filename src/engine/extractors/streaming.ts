/**
 * Streaming extractor: newline-delimited JSON events.
 *
 * Every non-blank line must be a JSON object carrying the layout's type
 * field. The event type selects the rules that turn it into records; event
 * types without rules are ignored. One malformed line fails strict mode;
 * lenient mode skips it and reports how many were skipped.
 */

import type { ExtractMode, ExtractOutcome, Extractor, OutputRecord, RecordKind, StreamingEventRule, StreamingLayout } from "../types.js";
import { buildRecord, fillTemplate, pluralize, readPath, scalarToString, splitLines } from "../text.js";

type LineEvent = { ok: true; type: string; event: object } | { ok: false; reason: string };

function parseLine(line: string, typeField: string): LineEvent {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return { ok: false, reason: "not valid JSON" };
  }
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return { ok: false, reason: "not a JSON object" };
  }
  const type = scalarToString(readPath(value, typeField));
  if (type === undefined) {
    return { ok: false, reason: `missing "${typeField}"` };
  }
  return { ok: true, type, event: value };
}

function applies(rule: StreamingEventRule, event: object): boolean {
  if (rule.requires?.some((path) => scalarToString(readPath(event, path)) === undefined)) {
    return false;
  }
  if (rule.where && scalarToString(readPath(event, rule.where.field)) !== rule.where.equals) {
    return false;
  }
  return true;
}

export class StreamingExtractor implements Extractor {
  constructor(private readonly layout: StreamingLayout) {}

  extract(text: string, mode: ExtractMode): ExtractOutcome {
    const records: OutputRecord[] = [];
    let skipped = 0;

    const lines = splitLines(text);
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (line === "") continue;

      const parsed = parseLine(line, this.layout.typeField);
      if (!parsed.ok) {
        if (mode === "strict") {
          return {
            ok: false,
            error: {
              kind: "malformed_streaming_line",
              message: `line ${i + 1}: ${parsed.reason}`,
              line: i + 1,
            },
          };
        }
        skipped++;
        continue;
      }

      // First applicable rule for the event type wins
      const rule = this.layout.events[parsed.type]?.find((r) => applies(r, parsed.event));
      if (!rule) continue;
      const lookup = (name: string) => scalarToString(readPath(parsed.event, name));
      const record = buildRecord(rule.kind, rule.fields, lookup);
      if (record) records.push(record);
    }

    const summary = this.summaryRecord(records);
    if (summary) records.push(summary);

    const warnings = skipped > 0 ? [`${pluralize(skipped, "line")} skipped`] : [];
    return { ok: true, records, warnings };
  }

  private summaryRecord(records: readonly OutputRecord[]): OutputRecord | undefined {
    if (!this.layout.summary || records.length === 0) return undefined;
    const counts: Record<RecordKind, number> = { info: 0, warning: 0, error: 0, summary: 0 };
    for (const r of records) counts[r.kind]++;
    const message = fillTemplate(this.layout.summary, (name) =>
      name === "info" || name === "warning" || name === "error" ? String(counts[name]) : undefined,
    );
    return message === undefined ? undefined : { kind: "summary", message };
  }
}
