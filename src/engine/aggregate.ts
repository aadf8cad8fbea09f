/**
 * Deduplication and grouping of extracted records.
 *
 * Both keep first-occurrence order; nothing here sorts by count.
 */

import type { OutputRecord } from "./types.js";
import { normalizeMessage } from "./text.js";

export interface DedupedRecord {
  /** First-seen record of the run, location included */
  record: OutputRecord;
  count: number;
}

/** Equality key: kind plus normalized message. Location is not part of it. */
export function dedupeKey(record: OutputRecord): string {
  return `${record.kind}\u0000${normalizeMessage(record.message)}`;
}

export function dedupe(records: readonly OutputRecord[]): DedupedRecord[] {
  const byKey = new Map<string, DedupedRecord>();
  for (const record of records) {
    const key = dedupeKey(record);
    const existing = byKey.get(key);
    if (existing) {
      existing.count++;
    } else {
      byKey.set(key, { record, count: 1 });
    }
  }
  return [...byKey.values()];
}

/** Inverse view of dedupe: each entry repeated `count` times. */
export function expandDeduped(entries: readonly DedupedRecord[]): OutputRecord[] {
  const out: OutputRecord[] = [];
  for (const { record, count } of entries) {
    for (let i = 0; i < count; i++) out.push(record);
  }
  return out;
}

export function groupBy<K>(
  records: readonly OutputRecord[],
  keyFn: (record: OutputRecord) => K,
): Map<K, OutputRecord[]> {
  const groups = new Map<K, OutputRecord[]>();
  for (const record of records) {
    const key = keyFn(record);
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }
  return groups;
}

/** Records without a location share the empty-string key. */
export const byFile = (record: OutputRecord): string => record.location?.file ?? "";

export const byFileAndCode = (record: OutputRecord): string =>
  `${record.location?.file ?? ""}\u0000${record.code ?? ""}`;
