/**
 * Guard types
 */

// Mapping from placeholder to original content
export type MappingTable = Map<string, string>;

// Serialized form of a mapping table: { "<PER_1>": "Ann", ... }
export type MappingRecord = Record<string, string>;

/**
 * A detected region of interest. Offsets are half-open `[start, end)`
 * Unicode codepoint indices over the original text, and `content` is
 * always sliced from that text.
 */
export type Span = {
  start: number;
  end: number;
  label: string;
  content: string;
};

// Offset units a detector may report in before conversion to codepoints
export type OffsetUnit = "codepoint" | "utf16" | "utf8";

// A detection as reported by the underlying engine, before normalization
export type RawDetection = {
  start: number;
  end: number;
  label: string;
};

export type DetectorKind = "regex" | "model";

/**
 * Any source of spans (regex pattern set, NER model).
 * Outputs need not be ordered.
 */
export interface Detector {
  readonly name: string;
  readonly kind: DetectorKind;
  detect(
    text: string,
    language: string,
    report?: (diagnostic: Diagnostic) => void,
  ): Span[] | Promise<Span[]>;
}

// Non-fatal anomalies reported alongside a result
export type Diagnostic =
  | { kind: "unsupported_language"; detector: string; requested: string; fallback: string }
  | { kind: "malformed_span"; start: number; end: number; label: string; reason: string }
  | { kind: "unresolved_placeholder"; placeholder: string };

// Result of substitution with its restoration table
export type SubstituteResult = {
  sanitized: string;
  mappingTable: MappingTable; // placeholder -> original content
  redactionCount: number;
  redactionsByLabel: Record<string, number>;
};

export type AnonymizeResult = SubstituteResult & {
  diagnostics: Diagnostic[];
};

export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug?: (message: string) => void;
};
