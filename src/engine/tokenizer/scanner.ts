/**
 * Splits source text into code, string and comment tokens.
 *
 * The scan is lexical only: it knows enough about each language's quoting
 * and comment rules that comment markers inside literals are never taken
 * for comments, and quotes inside comments never open literals.
 * Concatenating the token texts always gives back the input.
 */

import type { LanguageSyntax } from "./languages.js";

export type TokenKind = "code" | "string" | "comment";

export interface Token {
  kind: TokenKind;
  text: string;
}

const IDENT = /[A-Za-z0-9_$]/;
const RUST_CHAR = /'(?:\\(?:x[0-9a-fA-F]{2}|u\{[0-9a-fA-F]{1,6}\}|.)|[^\\'\n])'/uy;
const RUST_RAW = /b?r(#*)"/y;
const CPP_RAW = /(?:u8|u|U|L)?R"([^()\\\s]{0,16})\(/y;
const VERBATIM = /(?:\$@|@\$|@)"/y;
const REGEX_KEYWORDS = new Set([
  "return", "typeof", "case", "do", "else", "in", "of", "new",
  "delete", "void", "throw", "yield", "await", "instanceof",
]);

export function tokenize(text: string, syntax: LanguageSyntax): Token[] {
  return new Scanner(text, syntax).run();
}

class Scanner {
  private readonly tokens: Token[] = [];
  private pos = 0;
  private codeStart = 0;
  private lastSignificant = "";
  private word = "";
  private prevIdent = false;

  constructor(
    private readonly text: string,
    private readonly syntax: LanguageSyntax,
  ) {}

  run(): Token[] {
    const { text, syntax } = this;
    if (syntax.shebang && text.startsWith("#!")) {
      const nl = text.indexOf("\n");
      this.pos = nl === -1 ? text.length : nl;
    }
    while (this.pos < text.length) {
      const commentEnd = this.commentEnd();
      if (commentEnd !== undefined) {
        this.emit("comment", commentEnd);
        continue;
      }
      const stringEnd = this.stringEnd();
      if (stringEnd !== undefined) {
        this.emit("string", stringEnd);
        continue;
      }
      this.consumeCode();
    }
    this.flushCode(text.length);
    return this.tokens;
  }

  private emit(kind: TokenKind, end: number): void {
    this.flushCode(this.pos);
    this.tokens.push({ kind, text: this.text.slice(this.pos, end) });
    this.pos = end;
    this.codeStart = end;
    if (kind === "string") {
      this.lastSignificant = '"';
      this.word = "";
    }
    this.prevIdent = false;
  }

  private flushCode(until: number): void {
    if (until > this.codeStart) {
      this.tokens.push({ kind: "code", text: this.text.slice(this.codeStart, until) });
    }
    this.codeStart = until;
  }

  private consumeCode(): void {
    const c = this.text.charAt(this.pos);
    const ident = IDENT.test(c);
    if (!/\s/.test(c)) {
      this.word = ident ? (this.prevIdent ? this.word + c : c) : "";
      this.lastSignificant = c;
    }
    this.prevIdent = ident;
    this.pos++;
  }

  private commentEnd(): number | undefined {
    const { text, syntax, pos } = this;
    const block = syntax.blockComment;
    if (block && text.startsWith(block.open, pos)) {
      return this.blockEnd(block.open, block.close, block.nested ?? false);
    }
    for (const marker of syntax.lineComments) {
      if (!text.startsWith(marker, pos)) continue;
      if (syntax.commentAtWordStart && pos > 0 && !/[\s;|&()]/.test(text.charAt(pos - 1))) continue;
      const nl = text.indexOf("\n", pos);
      return nl === -1 ? text.length : nl;
    }
    return undefined;
  }

  private blockEnd(open: string, close: string, nested: boolean): number {
    const { text } = this;
    let depth = 0;
    let i = this.pos;
    while (i < text.length) {
      if ((nested || depth === 0) && text.startsWith(open, i)) {
        depth++;
        i += open.length;
        continue;
      }
      if (text.startsWith(close, i)) {
        depth--;
        i += close.length;
        if (depth === 0) return i;
        continue;
      }
      i++;
    }
    return text.length;
  }

  private stringEnd(): number | undefined {
    const { text, syntax, pos } = this;
    const ch = text.charAt(pos);
    const afterIdent = pos > 0 && IDENT.test(text.charAt(pos - 1));

    if (!afterIdent) {
      const special = this.prefixedStringEnd();
      if (special !== undefined) return special;
    }

    if (syntax.templateLiterals && ch === "`") return this.templateEnd(pos);
    if (syntax.backtickRaw && ch === "`") return this.closeAfter("`", pos + 1);

    if (syntax.quotes.includes(ch)) {
      if (ch === "'" && syntax.strictCharLiterals) {
        RUST_CHAR.lastIndex = pos;
        const m = RUST_CHAR.exec(text);
        return m ? pos + m[0].length : undefined;
      }
      if (
        ch === "'" &&
        syntax.digitSeparators &&
        /[0-9]/.test(text.charAt(pos - 1)) &&
        /[0-9A-Fa-f]/.test(text.charAt(pos + 1))
      ) {
        return undefined;
      }
      if (ch === "'" && syntax.rawSingleQuotes) return this.closeAfter("'", pos + 1);
      if (syntax.tripleQuotes && text.startsWith(ch.repeat(3), pos)) {
        return this.scanUntil(pos + 3, ch.repeat(3));
      }
      return this.scanQuoted(pos, ch);
    }

    if (syntax.regexLiterals && ch === "/" && this.regexAllowed()) return this.regexEnd();
    return undefined;
  }

  /** Raw, verbatim and prefixed strings; each starts with a non-quote char. */
  private prefixedStringEnd(): number | undefined {
    const { text, syntax, pos } = this;

    if (syntax.rustRawStrings) {
      RUST_RAW.lastIndex = pos;
      const m = RUST_RAW.exec(text);
      if (m) return this.closeAfter(`"${m[1] ?? ""}`, pos + m[0].length);
    }
    if (syntax.cppRawStrings) {
      CPP_RAW.lastIndex = pos;
      const m = CPP_RAW.exec(text);
      if (m) return this.closeAfter(`)${m[1] ?? ""}"`, pos + m[0].length);
    }
    if (syntax.verbatimStrings) {
      VERBATIM.lastIndex = pos;
      const m = VERBATIM.exec(text);
      if (m) return this.verbatimEnd(pos + m[0].length);
    }
    if (syntax.stringPrefix) {
      const m = syntax.stringPrefix.exec(text.slice(pos, pos + 3));
      if (m) {
        const quoteAt = pos + m[0].length;
        const q = text.charAt(quoteAt);
        if (syntax.tripleQuotes && text.startsWith(q.repeat(3), quoteAt)) {
          return this.scanUntil(quoteAt + 3, q.repeat(3));
        }
        return this.scanQuoted(quoteAt, q);
      }
    }
    return undefined;
  }

  private closeAfter(closer: string, from: number): number {
    const at = this.text.indexOf(closer, from);
    return at === -1 ? this.text.length : at + closer.length;
  }

  private scanQuoted(openAt: number, quote: string): number {
    const { text } = this;
    let i = openAt + 1;
    while (i < text.length) {
      const c = text.charAt(i);
      if (c === "\\") {
        i += 2;
        continue;
      }
      if (c === quote) return i + 1;
      // An unterminated literal ends at the line break, which stays code
      if (c === "\n" && !this.syntax.multilineStrings) return i;
      i++;
    }
    return text.length;
  }

  private scanUntil(from: number, closer: string): number {
    const { text } = this;
    let i = from;
    while (i < text.length) {
      if (text.charAt(i) === "\\") {
        i += 2;
        continue;
      }
      if (text.startsWith(closer, i)) return i + closer.length;
      i++;
    }
    return text.length;
  }

  /** C# verbatim body: `""` is an escaped quote. */
  private verbatimEnd(from: number): number {
    const { text } = this;
    let i = from;
    while (i < text.length) {
      if (text.charAt(i) === '"') {
        if (text.charAt(i + 1) !== '"') return i + 1;
        i += 2;
        continue;
      }
      i++;
    }
    return text.length;
  }

  private templateEnd(openAt: number): number {
    const { text } = this;
    let i = openAt + 1;
    while (i < text.length) {
      const c = text.charAt(i);
      if (c === "\\") {
        i += 2;
        continue;
      }
      if (c === "`") return i + 1;
      if (c === "$" && text.charAt(i + 1) === "{") {
        i = this.interpolationEnd(i + 2);
        continue;
      }
      i++;
    }
    return text.length;
  }

  private interpolationEnd(from: number): number {
    const { text } = this;
    let depth = 1;
    let i = from;
    while (i < text.length) {
      const c = text.charAt(i);
      if (c === "`") {
        i = this.templateEnd(i);
        continue;
      }
      if (c === '"' || c === "'") {
        i = this.scanQuoted(i, c);
        continue;
      }
      if (c === "{") depth++;
      else if (c === "}") {
        depth--;
        if (depth === 0) return i + 1;
      }
      i++;
    }
    return text.length;
  }

  private regexAllowed(): boolean {
    const next = this.text.charAt(this.pos + 1);
    if (next === "/" || next === "*") return false;
    const last = this.lastSignificant;
    if (last === "") return true;
    if (IDENT.test(last)) return REGEX_KEYWORDS.has(this.word);
    return !")]}\"".includes(last);
  }

  private regexEnd(): number | undefined {
    const { text } = this;
    let i = this.pos + 1;
    let inClass = false;
    while (i < text.length) {
      const c = text.charAt(i);
      if (c === "\n") return undefined;
      if (c === "\\") {
        i += 2;
        continue;
      }
      if (inClass) {
        if (c === "]") inClass = false;
      } else if (c === "[") {
        inClass = true;
      } else if (c === "/") {
        i++;
        while (i < text.length && /[a-z]/i.test(text.charAt(i))) i++;
        return i;
      }
      i++;
    }
    return undefined;
  }
}
