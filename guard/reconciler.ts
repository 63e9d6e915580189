/**
 * Span reconciliation
 *
 * Merges the span streams of every active detector into one ordered,
 * non-overlapping sequence.
 *
 * Policy: leftmost start wins; on equal starts the span enumerated first
 * (earlier detector, then earlier within the detector) wins. A later span
 * is never preferred for being longer or more specific.
 */

import type { Diagnostic, Span } from "./types.js";
import { toIndex, type TextIndex } from "./offsets.js";

export type ReconcileResult = {
  accepted: Span[];
  diagnostics: Diagnostic[];
};

const INVALID_LABEL_PATTERN = /[<>]/;

function invalidReason(span: Span, length: number): string | null {
  if (!Number.isInteger(span.start) || !Number.isInteger(span.end)) return "non-integer offset";
  if (span.start < 0) return "start before text";
  if (span.end > length) return "end past text";
  if (span.start >= span.end) return "empty or inverted range";
  if (typeof span.label !== "string" || span.label.length === 0) return "missing label";
  if (INVALID_LABEL_PATTERN.test(span.label)) return "label contains angle brackets";
  return null;
}

/**
 * Reconcile detector outputs for one text.
 *
 * Malformed spans are dropped with a diagnostic; overlapping spans are
 * dropped silently. Accepted spans carry content re-sliced from the text.
 */
export function reconcile(
  source: string | TextIndex,
  streams: ReadonlyArray<ReadonlyArray<Span>>,
): ReconcileResult {
  const index = toIndex(source);
  const diagnostics: Diagnostic[] = [];

  const valid: Span[] = [];
  for (const stream of streams) {
    for (const span of stream) {
      const reason = invalidReason(span, index.length);
      if (reason) {
        diagnostics.push({
          kind: "malformed_span",
          start: span.start,
          end: span.end,
          label: span.label,
          reason,
        });
        continue;
      }
      valid.push({
        start: span.start,
        end: span.end,
        label: span.label,
        content: index.slice(span.start, span.end),
      });
    }
  }

  // Array.prototype.sort is stable, so equal starts keep enumeration order
  valid.sort((a, b) => a.start - b.start);

  const accepted: Span[] = [];
  let lastEnd = -1;
  for (const span of valid) {
    if (span.start >= lastEnd) {
      accepted.push(span);
      lastEnd = span.end;
    }
  }

  return { accepted, diagnostics };
}
