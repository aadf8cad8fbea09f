/**
 * Extractor selection: one implementation per strategy kind.
 */

import type { Extractor, Strategy } from "../types.js";
import { PatternExtractor } from "./pattern.js";
import { PhasedExtractor } from "./phased.js";
import { PlainExtractor } from "./plain.js";
import { StreamingExtractor } from "./streaming.js";
import { StructuredExtractor } from "./structured.js";

export function extractorFor(strategy: Strategy): Extractor {
  switch (strategy.kind) {
    case "structured":
      return new StructuredExtractor(strategy.layout);
    case "streaming":
      return new StreamingExtractor(strategy.layout);
    case "pattern":
      return new PatternExtractor(strategy.templates, strategy.skip);
    case "phased":
      return new PhasedExtractor(strategy.table);
    case "plain":
      return new PlainExtractor();
  }
}

/**
 * Pattern extractor used when a JSON-based strategy yields nothing.
 * Returns undefined for strategies that already work on text.
 */
export function textFallbackFor(strategy: Strategy): Extractor | undefined {
  if (strategy.kind !== "structured" && strategy.kind !== "streaming") return undefined;
  return new PatternExtractor(strategy.fallback ?? []);
}

export { PatternExtractor, PhasedExtractor, PlainExtractor, StreamingExtractor, StructuredExtractor };
