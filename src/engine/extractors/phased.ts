/**
 * Phased extractor: an explicit state machine over output lines.
 *
 * Each state lists rules keyed on line predicates. The first matching rule
 * (global rules first) may capture variables, emit a record, amend the last
 * record and move to another state. A line that fits no rule is free
 * context: the machine stays where it is and, when the state asks for it,
 * the line is attached to the most recent record. Noisy tool output never
 * makes this extractor fail; only output with no records at all does.
 */

import type { ExtractMode, ExtractOutcome, Extractor, FieldTemplates, OutputRecord, PhaseRule, PhaseTable, SourceLocation } from "../types.js";
import { buildRecord, fillTemplate, splitLines, stripAnsi } from "../text.js";

const MAX_CONTEXT_LINES = 20;

interface RuleMatch {
  rule: PhaseRule;
  groups: Record<string, string | undefined>;
}

function matchRule(rules: readonly PhaseRule[], line: string): RuleMatch | undefined {
  for (const rule of rules) {
    if (rule.prefix !== undefined && !line.startsWith(rule.prefix)) continue;
    if (rule.pattern) {
      const m = rule.pattern.exec(line);
      if (!m) continue;
      return { rule, groups: m.groups ?? {} };
    }
    return { rule, groups: {} };
  }
  return undefined;
}

function amendRecord(
  record: OutputRecord,
  amend: Partial<FieldTemplates>,
  lookup: (name: string) => string | undefined,
): OutputRecord {
  const fill = (template: string | undefined) => (template ? fillTemplate(template, lookup) : undefined);
  let { location, code, message } = record;

  const file = fill(amend.file);
  if (file && !location) {
    const line = Number.parseInt(fill(amend.line) ?? "", 10);
    const column = Number.parseInt(fill(amend.column) ?? "", 10);
    const amended: SourceLocation = {
      file,
      ...(Number.isFinite(line) && { line }),
      ...(Number.isFinite(column) && { column }),
    };
    location = amended;
  }
  code = code ?? fill(amend.code);
  const extra = fill(amend.message);
  if (extra) message = `${message}: ${extra.trim()}`;

  return {
    ...record,
    message,
    ...(location && { location }),
    ...(code && { code }),
  };
}

export class PhasedExtractor implements Extractor {
  constructor(private readonly table: PhaseTable) {}

  /**
   * Unexpected lines are tolerated in both modes. A rule pointing at a state
   * the table does not define fails strict mode; lenient mode stays put.
   */
  extract(text: string, mode: ExtractMode): ExtractOutcome {
    const { table } = this;
    const vars = new Map<string, string>();
    const records: OutputRecord[] = [];
    let state = table.initial;
    let sawContent = false;

    const lines = splitLines(text);
    for (let index = 0; index < lines.length; index++) {
      const line = stripAnsi(lines[index] ?? "").trimEnd();
      const phase = table.states[state];
      if (line === "" && !phase?.matchBlank) continue;
      if (line !== "") sawContent = true;

      const rules = [...(table.global ?? []), ...(phase?.rules ?? [])];
      const hit = matchRule(rules, line);

      if (!hit) {
        if (line === "") continue;
        const last = records[records.length - 1];
        const wanted = phase?.attachContext && (!phase.contextFilter || phase.contextFilter.test(line));
        if (wanted && last && (last.context?.length ?? 0) < MAX_CONTEXT_LINES) {
          records[records.length - 1] = { ...last, context: [...(last.context ?? []), line.trim()] };
        }
        continue;
      }

      const { rule, groups } = hit;
      if (rule.capture) {
        for (const [name, value] of Object.entries(groups)) {
          if (value !== undefined && value !== "") vars.set(name, value);
        }
      }
      const lookup = (name: string): string | undefined => {
        const g = groups[name];
        return g !== undefined && g !== "" ? g : vars.get(name);
      };

      if (rule.emit) {
        const record = buildRecord(rule.emit.kind, rule.emit.fields, lookup, line);
        if (record) records.push(record);
      }
      if (rule.amend) {
        const last = records[records.length - 1];
        if (last) records[records.length - 1] = amendRecord(last, rule.amend, lookup);
      }
      for (const name of rule.advance ?? []) {
        const n = Number.parseInt(vars.get(name) ?? "", 10);
        if (Number.isFinite(n)) vars.set(name, String(n + 1));
      }
      if (rule.next !== undefined) {
        if (table.states[rule.next]) {
          state = rule.next;
        } else if (mode === "strict") {
          return {
            ok: false,
            error: {
              kind: "unexpected_phase_transition",
              message: `line ${index + 1}: no state "${rule.next}" after "${state}"`,
              line: index + 1,
            },
          };
        }
      }
    }

    if (sawContent && records.length === 0) {
      return {
        ok: false,
        error: { kind: "no_pattern_match", message: "no phase rule produced a record" },
      };
    }
    return { ok: true, records, warnings: [] };
  }
}
