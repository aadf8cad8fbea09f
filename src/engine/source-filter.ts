/**
 * Language-aware source reduction for code reading.
 *
 *   none        text unchanged
 *   minimal     comments removed, whitespace tidied, literals untouched
 *   aggressive  minimal, plus function bodies replaced by an elision marker
 *
 * Both reducing levels are idempotent. An unknown language always gets
 * the text back unchanged.
 */

import type { LanguageSyntax } from "./tokenizer/languages.js";
import type { Token } from "./tokenizer/scanner.js";
import { findLanguage } from "./tokenizer/languages.js";
import { tokenize } from "./tokenizer/scanner.js";

export const FILTER_LEVELS = ["none", "minimal", "aggressive"] as const;
export type FilterLevel = (typeof FILTER_LEVELS)[number];

export function filterSource(text: string, language: string | undefined, level: FilterLevel): string {
  if (level === "none" || language === undefined) return text;
  const syntax = findLanguage(language);
  if (!syntax) return text;

  const minimal = stripComments(text.replace(/\r\n/g, "\n"), syntax);
  if (level === "minimal" || syntax.family === "none") return minimal;
  return syntax.family === "brace" ? elideBraceBodies(minimal, syntax) : elideIndentBodies(minimal, syntax);
}

interface Segment {
  literal: boolean;
  text: string;
}

function isBlockComment(token: Token, syntax: LanguageSyntax): boolean {
  return syntax.blockComment !== undefined && token.text.startsWith(syntax.blockComment.open);
}

function stripComments(text: string, syntax: LanguageSyntax): string {
  const tokens = tokenize(text, syntax);
  const segments: Segment[] = [];
  let dropNewline = false;

  const lastChar = (): string => {
    const last = segments[segments.length - 1];
    return last ? last.text.charAt(last.text.length - 1) : "";
  };
  const pushCode = (piece: string) => {
    const last = segments[segments.length - 1];
    if (last && !last.literal) last.text += piece;
    else segments.push({ literal: false, text: piece });
  };

  tokens.forEach((token, index) => {
    if (token.kind === "comment") {
      const next = tokens[index + 1]?.text ?? "";
      const last = segments[segments.length - 1];
      const lineSoFar = last && !last.literal ? last.text.slice(last.text.lastIndexOf("\n") + 1) : undefined;
      const ownLine = (segments.length === 0 || (lineSoFar !== undefined && lineSoFar.trim() === "")) &&
        (next === "" || next.startsWith("\n"));
      if (ownLine) {
        // Comment alone on its line: the whole line goes
        if (last && !last.literal) last.text = last.text.replace(/[ \t]+$/, "");
        dropNewline = true;
      } else if (isBlockComment(token, syntax) && /\S/.test(lastChar()) && /^\S/.test(next)) {
        pushCode(" ");
      }
      return;
    }
    let piece = token.text;
    if (dropNewline && piece.startsWith("\n")) piece = piece.slice(1);
    dropNewline = false;
    if (token.kind === "string") segments.push({ literal: true, text: piece });
    else if (piece !== "") pushCode(piece);
  });

  segments.forEach((segment, index) => {
    if (segment.literal) return;
    let t = segment.text.replace(/[ \t]+(?=\n)/g, "").replace(/\n{3,}/g, "\n\n");
    if (index === 0) t = t.replace(/^\n+/, "");
    if (index === segments.length - 1) t = t.replace(/\s+$/, "");
    segment.text = t;
  });

  const joined = segments.map((s) => s.text).join("");
  if (joined === "") return "";
  const last = segments[segments.length - 1];
  return last && last.literal ? joined : `${joined}\n`;
}

function codeMask(tokens: readonly Token[]): boolean[] {
  const mask: boolean[] = [];
  for (const token of tokens) {
    for (let k = 0; k < token.text.length; k++) mask.push(token.kind === "code");
  }
  return mask;
}

function indentUnit(indent: string, syntax: LanguageSyntax): string {
  return indent.includes("\t") ? "\t" : syntax.indentUnit ?? "    ";
}

function isFunctionHeader(header: string, syntax: LanguageSyntax): boolean {
  const h = header.trim();
  if (h === "" || !syntax.functionHeader) return false;
  if (syntax.notFunction?.test(h)) return false;
  return syntax.functionHeader.test(h);
}

function matchingBrace(text: string, mask: readonly boolean[], open: number): number {
  let depth = 0;
  for (let j = open; j < text.length; j++) {
    if (!mask[j]) continue;
    const c = text.charAt(j);
    if (c === "{") depth++;
    else if (c === "}") {
      depth--;
      if (depth === 0) return j;
    }
  }
  return -1;
}

/**
 * Header text after which `{` opens a type rather than a block: a return
 * type annotation (or a generic or union inside one), or Go's
 * `interface{...}` and `struct{...}`.
 */
const TYPE_BRACE = /\)\s*:(?:[^{};=]*[<,|&])?\s*$|\b(?:interface|struct)\s*$/;
const CALLABLE_END = /(?:=>|\))\s*$/;

/**
 * Inside parentheses or brackets a `{` is a destructuring pattern, an
 * object type or a literal, unless it follows an arrow or a parameter list.
 */
function opensTypeOrPattern(header: string, depth: number): boolean {
  if (depth > 0 && !CALLABLE_END.test(header)) return true;
  return TYPE_BRACE.test(header);
}

function elideBraceBodies(text: string, syntax: LanguageSyntax): string {
  const mask = codeMask(tokenize(text, syntax));
  const marker = syntax.elisionMarker ?? "...";
  let out = "";
  let header = "";
  let depth = 0;
  let headerIndent = "";
  let lineIndent = "";
  let atLineStart = true;

  const emit = (c: string) => {
    out += c;
    if (c === "\n") {
      lineIndent = "";
      atLineStart = true;
    } else if (atLineStart && (c === " " || c === "\t")) {
      lineIndent += c;
    } else {
      atLineStart = false;
    }
  };

  let i = 0;
  while (i < text.length) {
    const c = text.charAt(i);
    const code = mask[i] ?? false;

    if (code && c === "{") {
      const close = matchingBrace(text, mask, i);
      if (close !== -1 && opensTypeOrPattern(header, depth)) {
        // Copied whole; counts as one token of the header around it
        for (let k = i; k <= close; k++) emit(text.charAt(k));
        header += "_";
        i = close + 1;
        continue;
      }
      if (close !== -1 && isFunctionHeader(header, syntax)) {
        out += `{\n${headerIndent}${indentUnit(headerIndent, syntax)}${marker}\n${headerIndent}}`;
        header = "";
        depth = 0;
        atLineStart = false;
        i = close + 1;
        continue;
      }
    }

    emit(c);
    if (code && (c === "{" || c === "}" || c === ";")) {
      header = "";
      depth = 0;
    } else {
      if (header.trim() === "" && /\S/.test(c)) headerIndent = lineIndent;
      // Literal text must not look like a keyword to the header test
      header += code ? c : "_";
      if (code && (c === "(" || c === "[")) depth++;
      else if (code && (c === ")" || c === "]")) depth = Math.max(0, depth - 1);
    }
    i++;
  }
  return out;
}

/** Index of the `:` closing a `def` header, or -1. */
function signatureEnd(text: string, mask: readonly boolean[], from: number): number {
  let depth = 0;
  for (let j = from; j < text.length; j++) {
    if (!mask[j]) continue;
    const c = text.charAt(j);
    if (c === "(" || c === "[" || c === "{") depth++;
    else if (c === ")" || c === "]" || c === "}") depth = Math.max(0, depth - 1);
    else if (c === ":" && depth === 0) return j;
    else if (c === "\n" && depth === 0 && text.charAt(j - 1) !== "\\") return -1;
  }
  return -1;
}

function indentWidth(line: string): number {
  return line.length - line.trimStart().length;
}

function elideIndentBodies(text: string, syntax: LanguageSyntax): string {
  const mask = codeMask(tokenize(text, syntax));
  const marker = syntax.elisionMarker ?? "...";
  const lines = text.split("\n");
  const starts: number[] = [];
  let offset = 0;
  for (const line of lines) {
    starts.push(offset);
    offset += line.length + 1;
  }
  const startOf = (n: number) => starts[n] ?? text.length;
  // A line that opens inside a multi-line literal
  const inLiteral = (n: number) => startOf(n) > 0 && mask[startOf(n) - 1] === false;
  const lineAt = (pos: number) => {
    let n = 0;
    while (n + 1 < starts.length && startOf(n + 1) <= pos) n++;
    return n;
  };

  const out: string[] = [];
  let n = 0;
  while (n < lines.length) {
    const line = lines[n] ?? "";
    const def = inLiteral(n) ? null : /^([ \t]*)(?:async[ \t]+)?def[ \t]/.exec(line);
    const colon = def ? signatureEnd(text, mask, startOf(n)) : -1;
    if (!def || colon === -1) {
      out.push(line);
      n++;
      continue;
    }

    const indent = def[1] ?? "";
    const sigLast = lineAt(colon);
    const sigLine = lines[sigLast] ?? "";
    const cut = colon + 1 - startOf(sigLast);
    out.push(...lines.slice(n, sigLast));

    if (sigLine.slice(cut).trim() !== "") {
      out.push(`${sigLine.slice(0, cut)} ${marker}`);
      n = sigLast + 1;
      continue;
    }

    out.push(sigLine);
    let last = sigLast;
    for (let k = sigLast + 1; k < lines.length; k++) {
      const body = lines[k] ?? "";
      if (inLiteral(k) || (body.trim() !== "" && indentWidth(body) > indent.length)) {
        last = k;
        continue;
      }
      if (body.trim() === "") continue;
      break;
    }
    out.push(`${indent}${indentUnit(indent, syntax)}${marker}`);
    n = last + 1;
  }
  return out.join("\n");
}
