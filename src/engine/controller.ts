/**
 * Parsing tier controller: the engine's single entry point.
 *
 * parse() never throws. A strict extraction gives a `full` result; a strict
 * failure retries leniently for a `degraded` result that says so in its
 * first line; when nothing can be extracted the raw output comes back
 * verbatim as `passthrough`. The exit code is copied through untouched.
 */

import type { OutputRecord, ParseError, ParseOptions, ParseResult, RawOutput, Tier, ToolProfile } from "./types.js";
import { extractorFor, textFallbackFor } from "./extractors/index.js";
import { selectRenderer } from "./renderers.js";

export const NO_OUTPUT = "(no output)";
export const NOTHING_TO_REPORT = "(nothing to report)";
export const DEFAULT_MAX_OUTPUT_CHARS = 64 * 1024;

/** stdout then stderr, newline-separated when both are present. */
export function joinStreams(stdout: string, stderr: string): string {
  if (stdout === "") return stderr;
  if (stderr === "") return stdout;
  return stdout.endsWith("\n") ? stdout + stderr : `${stdout}\n${stderr}`;
}

function inputText(raw: RawOutput, profile: ToolProfile): string {
  const kind = profile.strategy.kind;
  const source = profile.source ?? (kind === "structured" || kind === "streaming" ? "stdout" : "both");
  switch (source) {
    case "stdout":
      return raw.stdout;
    case "stderr":
      return raw.stderr;
    case "both":
      return joinStreams(raw.stdout, raw.stderr);
  }
}

function describe(error: ParseError): string {
  return `${error.kind.replace(/_/g, " ")}: ${error.message}`;
}

function exitCodeLine(records: readonly OutputRecord[], exitCode: number): string | undefined {
  if (exitCode === 0 || records.some((r) => r.kind === "error")) return undefined;
  return `exit code: ${exitCode}`;
}

function result(
  tier: Tier,
  records: readonly OutputRecord[],
  rendered: string,
  exitCode: number,
  warnings: readonly string[],
): ParseResult {
  return Object.freeze({
    tier,
    records: Object.freeze([...records]),
    rendered,
    exitCode,
    warnings: Object.freeze([...warnings]),
  });
}

function passthrough(raw: RawOutput, reason: string, maxChars: number): ParseResult {
  const full = joinStreams(raw.stdout, raw.stderr);
  const warnings = [`parse failed, showing raw output (${reason})`];
  let rendered = full;
  if (full.length > maxChars) {
    rendered = `${full.slice(0, maxChars)}\n[output truncated: ${maxChars} of ${full.length} chars shown]`;
    warnings.push(`output too large: truncated to ${maxChars} chars`);
  }
  return result("passthrough", [], rendered, raw.exitCode, warnings);
}

export function parse(raw: RawOutput, profile: ToolProfile, options: ParseOptions = {}): ParseResult {
  const maxChars = options.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;
  const { strategy } = profile;
  const render = selectRenderer(strategy.kind, profile.renderer);

  const build = (tier: Tier, records: readonly OutputRecord[], warnings: readonly string[]) => {
    const lines: string[] = [];
    if (tier === "degraded") lines.push(`[degraded: ${warnings.join("; ")}]`);
    lines.push(render(records, { limit: profile.limit }) || NOTHING_TO_REPORT);
    const exitLine = exitCodeLine(records, raw.exitCode);
    if (exitLine) lines.push(exitLine);
    return result(tier, records, lines.join("\n"), raw.exitCode, warnings);
  };

  if (raw.stdout.trim() === "" && raw.stderr.trim() === "") {
    const exitLine = exitCodeLine([], raw.exitCode);
    return result("full", [], exitLine ? `${NO_OUTPUT}\n${exitLine}` : NO_OUTPUT, raw.exitCode, []);
  }

  const text = inputText(raw, profile);
  const extractor = extractorFor(strategy);
  const strict = extractor.extract(text, "strict");

  if (strict.ok) {
    // Strict must not be luckier than lenient; if lenient sees more, say so
    const lenient = extractor.extract(text, "lenient");
    if (lenient.ok && lenient.records.length > strict.records.length) {
      const missed = lenient.records.length - strict.records.length;
      return build("degraded", lenient.records, [
        `strict parse missed ${missed} of ${lenient.records.length} records`,
        ...lenient.warnings,
      ]);
    }
    return build("full", strict.records, strict.warnings);
  }

  const reason = describe(strict.error);
  let lenient = extractor.extract(text, "lenient");
  if (!lenient.ok || lenient.records.length === 0) {
    const fallback = textFallbackFor(strategy);
    if (fallback) lenient = fallback.extract(text, "lenient");
  }
  if (lenient.ok && lenient.records.length > 0) {
    return build("degraded", lenient.records, [`strict parse failed (${reason})`, ...lenient.warnings]);
  }

  const finalReason = lenient.ok ? reason : `${reason}; ${describe(lenient.error)}`;
  return passthrough(raw, finalReason, maxChars);
}
