/**
 * Renderers turn an ordered record sequence into the compact text handed
 * back to the caller. Which one runs is decided once per invocation from
 * the strategy kind and the tool profile.
 */

import type { OutputRecord, RendererName, StrategyKind } from "./types.js";
import { byFile, dedupe, groupBy } from "./aggregate.js";
import { pluralize } from "./text.js";

export interface RenderOptions {
  /** Overrides the renderer's own cap on listed entries */
  limit?: number;
}

export type Renderer = (records: readonly OutputRecord[], options?: RenderOptions) => string;

const MAX_CONTEXT_SHOWN = 5;
const MAX_FILES_SHOWN = 20;
const MAX_PER_FILE_SHOWN = 10;
const MAX_ENTITIES_SHOWN = 50;
const MAX_DEDUPED_SHOWN = 200;
const MAX_DIFF_LINES_SHOWN = 40;
const MAX_NAMES_PER_DIR_SHOWN = 10;

export function formatLocation(record: OutputRecord): string | undefined {
  const loc = record.location;
  if (!loc) return undefined;
  let out = loc.file;
  if (loc.line !== undefined) {
    out += `:${loc.line}`;
    if (loc.column !== undefined) out += `:${loc.column}`;
  }
  return out;
}

function countKinds(records: readonly OutputRecord[]) {
  let errors = 0;
  let warnings = 0;
  let infos = 0;
  for (const r of records) {
    if (r.kind === "error") errors++;
    else if (r.kind === "warning") warnings++;
    else if (r.kind === "info") infos++;
  }
  return { errors, warnings, infos };
}

function issueTotals(errors: number, warnings: number): string[] {
  const parts: string[] = [];
  if (errors > 0) parts.push(pluralize(errors, "error"));
  if (warnings > 0) parts.push(pluralize(warnings, "warning"));
  return parts;
}

/** Failures only, with their context, then the run summary. */
export function renderTestFailures(records: readonly OutputRecord[]): string {
  const lines: string[] = [];
  const { errors, infos } = countKinds(records);

  for (const r of records) {
    if (r.kind !== "error" && r.kind !== "warning") continue;
    const loc = formatLocation(r);
    const label = r.kind === "error" ? "FAIL" : "WARN";
    lines.push(`${label} ${r.message}${loc ? ` (${loc})` : ""}`);
    const context = r.context ?? [];
    for (const c of context.slice(0, MAX_CONTEXT_SHOWN)) lines.push(`  ${c}`);
    if (context.length > MAX_CONTEXT_SHOWN) {
      lines.push(`  ... +${pluralize(context.length - MAX_CONTEXT_SHOWN, "more line")}`);
    }
  }

  const summaries = records.filter((r) => r.kind === "summary");
  if (summaries.length > 0) {
    for (const s of summaries) lines.push(s.message);
  } else {
    lines.push(`${infos} passed, ${errors} failed`);
  }
  return lines.join("\n");
}

function formatDiagnostic(record: OutputRecord, count: number): string {
  const loc = record.location;
  let position = "";
  if (loc?.line !== undefined) {
    position = loc.column !== undefined ? `${loc.line}:${loc.column} ` : `${loc.line} `;
  }
  const code = record.code ? `[${record.code}]` : "";
  const repeat = count > 1 ? ` (x${count})` : "";
  return `  ${position}${record.kind}${code}: ${record.message}${repeat}`;
}

/** Diagnostics grouped by file in first-appearance order. */
export function renderGrouped(records: readonly OutputRecord[]): string {
  const lines: string[] = [];
  const body = records.filter((r) => r.kind !== "summary");
  const groups = groupBy(body, byFile);

  let shownFiles = 0;
  for (const [file, group] of groups) {
    if (shownFiles === MAX_FILES_SHOWN) break;
    shownFiles++;
    lines.push(`${file === "" ? "(no file)" : file} (${group.length})`);
    const entries = dedupe(group);
    for (const { record, count } of entries.slice(0, MAX_PER_FILE_SHOWN)) {
      lines.push(formatDiagnostic(record, count));
    }
    if (entries.length > MAX_PER_FILE_SHOWN) {
      lines.push(`  ... +${entries.length - MAX_PER_FILE_SHOWN} more`);
    }
  }
  if (groups.size > MAX_FILES_SHOWN) {
    lines.push(`... +${pluralize(groups.size - MAX_FILES_SHOWN, "more file")}`);
  }

  for (const s of records) {
    if (s.kind === "summary") lines.push(s.message);
  }

  const { errors, warnings } = countKinds(body);
  const totals = issueTotals(errors, warnings);
  if (totals.length > 0) {
    const files = [...groups.keys()].filter((f) => f !== "").length;
    lines.push(`${totals.join(", ")} in ${pluralize(files, "file")}`);
  }
  return lines.join("\n");
}

/** One line per entity (commit, changed file, pod). */
export function renderEntities(records: readonly OutputRecord[], options: RenderOptions = {}): string {
  const max = options.limit ?? MAX_ENTITIES_SHOWN;
  const lines: string[] = [];
  for (const s of records) {
    if (s.kind === "summary") lines.push(s.message);
  }
  const body = records.filter((r) => r.kind !== "summary");
  for (const r of body.slice(0, max)) {
    lines.push(r.code ? `${r.code} ${r.message}` : r.message);
  }
  if (body.length > max) {
    lines.push(`... +${body.length - max} more`);
  }
  return lines.join("\n");
}

/** Repeated lines collapsed with counts. */
export function renderDeduped(records: readonly OutputRecord[], options: RenderOptions = {}): string {
  const max = options.limit ?? MAX_DEDUPED_SHOWN;
  const entries = dedupe(records);
  const lines = entries
    .slice(0, max)
    .map(({ record, count }) => (count > 1 ? `${record.message} (x${count})` : record.message));
  if (entries.length > max) {
    lines.push(`... +${entries.length - max} more unique lines`);
  }
  const { errors, warnings } = countKinds(records);
  const totals = issueTotals(errors, warnings);
  if (totals.length > 0) lines.push(totals.join(", "));
  return lines.join("\n");
}

function formatDiffLine(record: OutputRecord): string {
  if (record.code !== "+" && record.code !== "-") return `  ${record.message}`;
  const line = record.location?.line;
  return line === undefined ? `  ${record.code} ${record.message}` : `  ${record.code}${line}: ${record.message}`;
}

/**
 * Changed lines per file under their hunk headers, each numbered in the
 * file it belongs to. Nothing is collapsed: identical lines at different
 * places are different changes.
 */
export function renderDiff(records: readonly OutputRecord[]): string {
  const lines: string[] = [];
  const groups = groupBy(records, byFile);
  let added = 0;
  let removed = 0;

  let shownFiles = 0;
  for (const [file, group] of groups) {
    const plus = group.filter((r) => r.code === "+").length;
    const minus = group.filter((r) => r.code === "-").length;
    added += plus;
    removed += minus;
    if (shownFiles === MAX_FILES_SHOWN) continue;
    shownFiles++;
    lines.push(`${file === "" ? "(no file)" : file} +${plus} -${minus}`);
    for (const r of group.slice(0, MAX_DIFF_LINES_SHOWN)) lines.push(formatDiffLine(r));
    if (group.length > MAX_DIFF_LINES_SHOWN) {
      lines.push(`  ... +${pluralize(group.length - MAX_DIFF_LINES_SHOWN, "more line")}`);
    }
  }
  if (groups.size > MAX_FILES_SHOWN) {
    lines.push(`... +${pluralize(groups.size - MAX_FILES_SHOWN, "more file")}`);
  }
  lines.push(`${pluralize(groups.size, "file")} changed, +${added} -${removed}`);
  return lines.join("\n");
}

/** Names grouped under their directory, one line per directory. */
export function renderPaths(records: readonly OutputRecord[]): string {
  const lines: string[] = [];
  const names = records.filter((r) => r.kind === "info");
  const groups = groupBy(names, byFile);

  let shownDirs = 0;
  for (const [dir, group] of groups) {
    if (shownDirs === MAX_FILES_SHOWN) break;
    shownDirs++;
    const listed = group.slice(0, MAX_NAMES_PER_DIR_SHOWN).map((r) => r.message);
    if (group.length > MAX_NAMES_PER_DIR_SHOWN) listed.push(`+${group.length - MAX_NAMES_PER_DIR_SHOWN}`);
    lines.push(`${dir === "" ? "." : dir}/ ${listed.join(" ")}`);
  }
  if (groups.size > MAX_FILES_SHOWN) {
    lines.push(`... +${pluralize(groups.size - MAX_FILES_SHOWN, "more directory", "more directories")}`);
  }
  for (const r of records) {
    if (r.kind === "error" || r.kind === "warning") lines.push(`${r.kind}: ${r.message}`);
  }
  lines.push(`${pluralize(names.length, "path")} in ${pluralize(groups.size, "directory", "directories")}`);
  return lines.join("\n");
}

const RENDERERS: Record<RendererName, Renderer> = {
  "test-failures": renderTestFailures,
  grouped: renderGrouped,
  entities: renderEntities,
  deduped: renderDeduped,
  diff: renderDiff,
  paths: renderPaths,
};

const DEFAULT_RENDERER: Record<StrategyKind, RendererName> = {
  structured: "grouped",
  streaming: "test-failures",
  pattern: "grouped",
  phased: "test-failures",
  plain: "deduped",
};

/** The profile's declared renderer, else the strategy default. */
export function rendererName(strategy: StrategyKind, declared?: RendererName): RendererName {
  return declared ?? DEFAULT_RENDERER[strategy];
}

export function selectRenderer(strategy: StrategyKind, declared?: RendererName): Renderer {
  return RENDERERS[rendererName(strategy, declared)];
}
