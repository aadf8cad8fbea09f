/**
 * Output transformation engine. `parse` and `filterSource` are the entry
 * points; both are pure functions of their arguments.
 */

export { parse, joinStreams, DEFAULT_MAX_OUTPUT_CHARS, NO_OUTPUT, NOTHING_TO_REPORT } from "./controller.js";
export { filterSource, FILTER_LEVELS } from "./source-filter.js";
export type { FilterLevel } from "./source-filter.js";
export { dedupe, expandDeduped, groupBy, byFile, byFileAndCode } from "./aggregate.js";
export type { DedupedRecord } from "./aggregate.js";
export { rendererName, selectRenderer } from "./renderers.js";
export type { RenderOptions, Renderer } from "./renderers.js";
export { findLanguage, languageForPath } from "./tokenizer/index.js";
export type * from "./types.js";
