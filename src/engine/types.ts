/**
 * Core types for the output transformation engine.
 *
 * A tool's captured output (RawOutput) goes in, a ParseResult comes out.
 * Everything in between is a pure function of those values plus the
 * tool's profile from the registry.
 */

/** Captured output of one finished process. */
export interface RawOutput {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  /** Registry name of the tool that produced this output */
  readonly toolId: string;
}

export type RecordKind = "info" | "warning" | "error" | "summary";

export interface SourceLocation {
  readonly file: string;
  readonly line?: number;
  readonly column?: number;
}

/** One normalized unit of extracted information. */
export interface OutputRecord {
  readonly kind: RecordKind;
  readonly location?: SourceLocation;
  /** Rule id, error code, status letter, commit hash... */
  readonly code?: string;
  readonly message: string;
  /** Line the record came from, when it came from exactly one line */
  readonly rawLine?: string;
  /** Free lines attached by a phased extractor (assertion text, panic message) */
  readonly context?: readonly string[];
}

export type Tier = "full" | "degraded" | "passthrough";

export interface ParseResult {
  readonly tier: Tier;
  readonly records: readonly OutputRecord[];
  readonly rendered: string;
  readonly exitCode: number;
  readonly warnings: readonly string[];
}

export type ExtractMode = "strict" | "lenient";

export type ParseErrorKind =
  | "malformed_structured"
  | "malformed_streaming_line"
  | "no_pattern_match"
  | "unexpected_phase_transition"
  | "output_too_large";

export interface ParseError {
  readonly kind: ParseErrorKind;
  readonly message: string;
  /** 1-based input line, when the failure is tied to one */
  readonly line?: number;
}

export type ExtractOutcome =
  | { readonly ok: true; readonly records: OutputRecord[]; readonly warnings: string[] }
  | { readonly ok: false; readonly error: ParseError };

/** Common capability of every extraction strategy. */
export interface Extractor {
  extract(text: string, mode: ExtractMode): ExtractOutcome;
}

// ============================================================================
// Strategy data
// ============================================================================

/**
 * Field templates shared by several strategies.
 * `{name}` placeholders are filled from regex groups, JSON fields or
 * phase variables; a template with an unresolved placeholder yields nothing.
 */
export interface FieldTemplates {
  file?: string;
  line?: string;
  column?: string;
  code?: string;
  message: string;
}

/** Regex record template for the pattern strategy. */
export interface PatternTemplate {
  kind: RecordKind;
  /** Named groups: file, line, column, code, message (or any name used by `fields`) */
  regex: RegExp;
  /** Overrides the default group-to-field mapping */
  fields?: FieldTemplates;
}

export interface StructuredLayout {
  /** Dot path to the entries array; empty string means the document root */
  entries: string;
  /** Dot path (relative to an entry) of a nested array whose items become records */
  children?: string;
  /** Dot paths, resolved on the child first and then on the parent entry */
  fields: {
    file?: string;
    line?: string;
    column?: string;
    code?: string;
    message: string;
    severity?: string;
    /** String or string array attached as record context */
    context?: string;
  };
  /** Severity value (stringified) to record kind */
  severities?: Record<string, RecordKind>;
  defaultKind: RecordKind;
  /** Summary line built from root-level fields */
  summary?: string;
}

export interface StreamingEventRule {
  kind: RecordKind;
  fields: FieldTemplates;
  /** Dot paths that must be present for the event to produce a record */
  requires?: string[];
  /** Events whose value at `where.field` differs from `where.equals` are ignored */
  where?: { field: string; equals: string };
}

export interface StreamingLayout {
  /** Dot path of the event discriminator on every line */
  typeField: string;
  events: Record<string, StreamingEventRule[]>;
  /** Summary template over per-kind counts: {info}, {warning}, {error} */
  summary?: string;
}

export interface LinePredicate {
  prefix?: string;
  pattern?: RegExp;
}

export interface PhaseRule extends LinePredicate {
  /** State to move to after this rule fires */
  next?: string;
  /** Store the pattern's named groups as machine variables */
  capture?: boolean;
  /** Start a new record */
  emit?: { kind: RecordKind; fields: FieldTemplates };
  /** Fill in fields of the most recent record */
  amend?: Partial<FieldTemplates>;
  /** Numeric variables incremented by one after the rule fires */
  advance?: string[];
}

export interface PhaseState {
  rules: PhaseRule[];
  /** Unmatched lines become context of the last record */
  attachContext?: boolean;
  /** Only unmatched lines passing this test are attached */
  contextFilter?: RegExp;
  /** Blank lines are matched as "" against the rules instead of skipped */
  matchBlank?: boolean;
}

export interface PhaseTable {
  initial: string;
  states: Record<string, PhaseState>;
  /** Rules checked in every state before the state's own */
  global?: PhaseRule[];
}

/** Extraction dialect bound to a tool, carrying its per-tool data. */
export type Strategy =
  | { kind: "structured"; layout: StructuredLayout; fallback?: PatternTemplate[] }
  | { kind: "streaming"; layout: StreamingLayout; fallback?: PatternTemplate[] }
  | { kind: "pattern"; templates: PatternTemplate[]; skip?: RegExp[] }
  | { kind: "phased"; table: PhaseTable }
  | { kind: "plain" };

export type StrategyKind = Strategy["kind"];

export type RendererName = "test-failures" | "grouped" | "entities" | "deduped" | "diff" | "paths";

export type OutputSource = "stdout" | "stderr" | "both";

/** Everything the engine needs to know about one tool. */
export interface ToolProfile {
  /** Unique profile name (e.g., "cargo-test", "eslint-json") */
  name: string;
  /** One-line description */
  description: string;
  /** Command prefixes this profile handles (e.g., ["cargo test"]) */
  commands: string[];
  strategy: Strategy;
  renderer?: RendererName;
  /** Which captured stream(s) the extractor reads */
  source?: OutputSource;
  /** Most entries the entities and deduped renderers list */
  limit?: number;
  tags?: string[];
}

export interface ParseOptions {
  /** Passthrough ceiling in characters */
  maxOutputChars?: number;
}
