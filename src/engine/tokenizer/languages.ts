/**
 * Lexical descriptions of the languages the source filter understands.
 */

export type LanguageFamily = "brace" | "indent" | "none";

export interface LanguageSyntax {
  name: string;
  aliases: string[];
  extensions: string[];
  family: LanguageFamily;
  lineComments: string[];
  blockComment?: { open: string; close: string; nested?: boolean };
  /** Quote characters that open ordinary escapable strings */
  quotes: string[];
  /** `'` only opens a literal when it forms a complete char literal (Rust lifetimes) */
  strictCharLiterals?: boolean;
  /** `'` after an alphanumeric is a digit separator (C++14) */
  digitSeparators?: boolean;
  /** `"""` / `'''` strings spanning lines */
  tripleQuotes?: boolean;
  /** String prefixes such as r, b, f, rb (Python) */
  stringPrefix?: RegExp;
  /** JS/TS backtick templates with `${}` interpolation */
  templateLiterals?: boolean;
  /** Go backtick raw strings */
  backtickRaw?: boolean;
  /** Rust r"..." / r#"..."# raw strings */
  rustRawStrings?: boolean;
  /** C++ R"delim(...)delim" raw strings */
  cppRawStrings?: boolean;
  /** C# @"..." verbatim strings */
  verbatimStrings?: boolean;
  /** JS/TS regular expression literals */
  regexLiterals?: boolean;
  /** Comment markers only count at the start of a word (shell) */
  commentAtWordStart?: boolean;
  /** Single-quoted strings take no escapes (shell) */
  rawSingleQuotes?: boolean;
  /** Strings may span lines (shell) */
  multilineStrings?: boolean;
  /** A `#!` first line is kept */
  shebang?: boolean;
  /** Trimmed text before `{` that marks a function body (brace family) */
  functionHeader?: RegExp;
  /** Trimmed headers that are never function bodies (control flow, types) */
  notFunction?: RegExp;
  /** Line replacing an elided body */
  elisionMarker?: string;
  /** One level of indentation for the marker line when the header has none to copy */
  indentUnit?: string;
}

const C_LIKE_CONTROL = /^(?:if|for|foreach|while|switch|catch|with|else|do|try|finally|return|synchronized|using|lock|fixed|unsafe|checked|unchecked)\b/;

const C_LIKE_FUNCTION =
  /\)\s*(?:const|noexcept|override|final|mutable|throws\s+[\w.,\s]+|->\s*[^{};]+)*\s*$/;

const JS_FUNCTION = /\bfunction\b[^{};]*$|=>\s*$|\)\s*(?::\s*[^{};=]+)?\s*$/;

const JS_SYNTAX: Omit<LanguageSyntax, "name" | "aliases" | "extensions"> = {
  family: "brace",
  lineComments: ["//"],
  blockComment: { open: "/*", close: "*/" },
  quotes: ['"', "'"],
  templateLiterals: true,
  regexLiterals: true,
  shebang: true,
  functionHeader: JS_FUNCTION,
  notFunction: C_LIKE_CONTROL,
  elisionMarker: "// ...",
};

export const LANGUAGES: readonly LanguageSyntax[] = [
  {
    name: "rust",
    aliases: ["rs"],
    extensions: [".rs"],
    family: "brace",
    lineComments: ["//"],
    blockComment: { open: "/*", close: "*/", nested: true },
    quotes: ['"', "'"],
    strictCharLiterals: true,
    rustRawStrings: true,
    functionHeader: /(?:^|\s)fn\s+[A-Za-z_]\w*/,
    elisionMarker: "// ...",
  },
  {
    name: "typescript",
    aliases: ["ts", "tsx"],
    extensions: [".ts", ".tsx", ".mts", ".cts"],
    ...JS_SYNTAX,
  },
  {
    name: "javascript",
    aliases: ["js", "jsx", "node"],
    extensions: [".js", ".jsx", ".mjs", ".cjs"],
    ...JS_SYNTAX,
  },
  {
    name: "python",
    aliases: ["py", "python3"],
    extensions: [".py", ".pyi"],
    family: "indent",
    lineComments: ["#"],
    quotes: ['"', "'"],
    tripleQuotes: true,
    stringPrefix: /^(?:[rRbBuUfF]|[rR][bBfF]|[bBfF][rR])(?=["'])/,
    shebang: true,
    elisionMarker: "...",
  },
  {
    name: "go",
    aliases: ["golang"],
    extensions: [".go"],
    family: "brace",
    lineComments: ["//"],
    blockComment: { open: "/*", close: "*/" },
    quotes: ['"', "'"],
    backtickRaw: true,
    functionHeader: /(?:^|\n)[ \t]*func\b/,
    elisionMarker: "// ...",
    indentUnit: "\t",
  },
  {
    name: "c",
    aliases: ["h"],
    extensions: [".c", ".h"],
    family: "brace",
    lineComments: ["//"],
    blockComment: { open: "/*", close: "*/" },
    quotes: ['"', "'"],
    functionHeader: C_LIKE_FUNCTION,
    notFunction: C_LIKE_CONTROL,
    elisionMarker: "// ...",
  },
  {
    name: "cpp",
    aliases: ["c++", "cxx", "hpp"],
    extensions: [".cpp", ".cc", ".cxx", ".hpp", ".hh", ".hxx"],
    family: "brace",
    lineComments: ["//"],
    blockComment: { open: "/*", close: "*/" },
    quotes: ['"', "'"],
    digitSeparators: true,
    cppRawStrings: true,
    functionHeader: C_LIKE_FUNCTION,
    notFunction: C_LIKE_CONTROL,
    elisionMarker: "// ...",
  },
  {
    name: "java",
    aliases: [],
    extensions: [".java"],
    family: "brace",
    lineComments: ["//"],
    blockComment: { open: "/*", close: "*/" },
    quotes: ['"', "'"],
    tripleQuotes: true,
    functionHeader: C_LIKE_FUNCTION,
    notFunction: C_LIKE_CONTROL,
    elisionMarker: "// ...",
  },
  {
    name: "csharp",
    aliases: ["cs", "c#"],
    extensions: [".cs"],
    family: "brace",
    lineComments: ["//"],
    blockComment: { open: "/*", close: "*/" },
    quotes: ['"', "'"],
    verbatimStrings: true,
    functionHeader: C_LIKE_FUNCTION,
    notFunction: C_LIKE_CONTROL,
    elisionMarker: "// ...",
  },
  {
    name: "shell",
    aliases: ["sh", "bash", "zsh"],
    extensions: [".sh", ".bash", ".zsh"],
    family: "none",
    lineComments: ["#"],
    quotes: ['"', "'"],
    commentAtWordStart: true,
    rawSingleQuotes: true,
    multilineStrings: true,
    shebang: true,
  },
];

/** Look up a language by name, alias or file extension (".rs"). */
export function findLanguage(name: string): LanguageSyntax | undefined {
  const key = name.trim().toLowerCase();
  if (key === "") return undefined;
  return LANGUAGES.find(
    (l) => l.name === key || l.aliases.includes(key) || l.extensions.includes(key),
  );
}

/** Language for a file path, from its extension. */
export function languageForPath(path: string): LanguageSyntax | undefined {
  const dot = path.lastIndexOf(".");
  const slash = Math.max(path.lastIndexOf("/"), path.lastIndexOf("\\"));
  if (dot <= slash + 1) return undefined;
  return findLanguage(path.slice(dot));
}
