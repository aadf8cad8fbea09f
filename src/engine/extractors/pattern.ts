/**
 * Pattern extractor: ordered regex templates, first match wins.
 *
 * Templates are tried in declaration order for every line. Lines that match
 * no template are not records. Lenient mode appends the generic diagnostic
 * templates after the tool's own.
 */

import type { ExtractMode, ExtractOutcome, Extractor, FieldTemplates, OutputRecord, PatternTemplate } from "../types.js";
import { buildRecord, groupLookup, splitLines, stripAnsi } from "../text.js";

const DEFAULT_FIELDS: FieldTemplates = {
  file: "{file}",
  line: "{line}",
  column: "{column}",
  code: "{code}",
  message: "{message}",
};

/**
 * Catch-all templates for compiler/linter-looking lines.
 * Used only in lenient mode.
 */
export const GENERIC_TEMPLATES: readonly PatternTemplate[] = [
  {
    kind: "warning",
    regex: /^(?<file>[^\s:][^:]*?):(?<line>\d+):(?:(?<column>\d+):)?\s*warning(?:\[(?<code>[^\]]+)\])?:?\s+(?<message>.+)$/i,
  },
  {
    kind: "error",
    regex: /^(?<file>[^\s:][^:]*?):(?<line>\d+):(?:(?<column>\d+):)?\s*(?:error|fatal)(?:\[(?<code>[^\]]+)\])?:?\s+(?<message>.+)$/i,
  },
  {
    kind: "error",
    regex: /^\s*(?:error|fatal)(?:\[(?<code>[^\]]+)\])?:\s*(?<message>.+)$/i,
  },
  {
    kind: "warning",
    regex: /^\s*warn(?:ing)?(?:\[(?<code>[^\]]+)\])?:\s*(?<message>.+)$/i,
  },
];

function matchLine(line: string, templates: readonly PatternTemplate[]): OutputRecord | undefined {
  const clean = stripAnsi(line);
  for (const template of templates) {
    const match = template.regex.exec(clean);
    if (!match) continue;
    const record = buildRecord(
      template.kind,
      template.fields ?? DEFAULT_FIELDS,
      groupLookup(match.groups),
      line,
    );
    // A template whose message cannot be filled is a miss, not a record
    if (record) return record;
  }
  return undefined;
}

export class PatternExtractor implements Extractor {
  constructor(
    private readonly templates: readonly PatternTemplate[],
    private readonly skip: readonly RegExp[] = [],
  ) {}

  extract(text: string, mode: ExtractMode): ExtractOutcome {
    const templates = mode === "lenient" ? [...this.templates, ...GENERIC_TEMPLATES] : this.templates;
    const records: OutputRecord[] = [];
    let sawContent = false;

    for (const line of splitLines(text)) {
      if (line.trim() === "") continue;
      sawContent = true;
      const clean = stripAnsi(line);
      if (this.skip.some((re) => re.test(clean))) continue;
      const record = matchLine(line, templates);
      if (record) records.push(record);
    }

    if (sawContent && records.length === 0) {
      return {
        ok: false,
        error: { kind: "no_pattern_match", message: "no line matched any record template" },
      };
    }
    return { ok: true, records, warnings: [] };
  }
}
