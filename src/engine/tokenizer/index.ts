export { LANGUAGES, findLanguage, languageForPath } from "./languages.js";
export type { LanguageFamily, LanguageSyntax } from "./languages.js";
export { tokenize } from "./scanner.js";
export type { Token, TokenKind } from "./scanner.js";
