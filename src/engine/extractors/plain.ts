/**
 * Plain extractor: one record per non-blank line, for logs and anything
 * without a known shape. The level keyword decides the kind; a leading
 * timestamp is dropped from the message so repeats collapse when deduped.
 */

import type { ExtractOutcome, Extractor, OutputRecord, RecordKind } from "../types.js";
import { splitLines, stripAnsi } from "../text.js";

const LEADING_TIMESTAMP =
  /^\[?\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:[.,]\d+)?(?:Z|[+-]\d{2}:?\d{2})?\]?\s*|^\[?\d{2}:\d{2}:\d{2}(?:[.,]\d+)?\]?\s+/;

const ERROR_LEVEL = /\b(?:error|err|fatal|panic|critical|exception)\b/i;
const WARNING_LEVEL = /\bwarn(?:ing)?\b/i;

export function classifyLine(message: string): RecordKind {
  if (ERROR_LEVEL.test(message)) return "error";
  if (WARNING_LEVEL.test(message)) return "warning";
  return "info";
}

export class PlainExtractor implements Extractor {
  extract(text: string): ExtractOutcome {
    const records: OutputRecord[] = [];
    for (const rawLine of splitLines(text)) {
      const clean = stripAnsi(rawLine).trimEnd();
      if (clean.trim() === "") continue;
      const message = clean.replace(LEADING_TIMESTAMP, "").trim() || clean.trim();
      records.push({ kind: classifyLine(message), message, rawLine });
    }
    return { ok: true, records, warnings: [] };
  }
}
