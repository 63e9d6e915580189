/**
 * Text sanitizer
 *
 * Replaces accepted spans with numbered placeholders in a single
 * left-to-right pass and returns the mapping table for restoration.
 */

import type { AnonymizeResult, MappingTable, Span, SubstituteResult } from "./types.js";
import { TextIndex, toIndex } from "./offsets.js";
import { PlaceholderAllocator, collectPlaceholderTokens } from "./placeholders.js";
import { reconcile } from "./reconciler.js";

/**
 * Substitute an accepted span set (ordered, non-overlapping) into the text.
 *
 * Gaps are copied verbatim and each span is replaced by its placeholder;
 * the text is never searched for span content, so repeated substrings
 * are handled by position alone.
 */
export function substitute(source: string | TextIndex, accepted: readonly Span[]): SubstituteResult {
  const index = toIndex(source);
  const text = index.text;
  const mappingTable: MappingTable = new Map();
  const allocator = new PlaceholderAllocator(collectPlaceholderTokens(text));

  const parts: string[] = [];
  let cursor = 0;

  for (const span of accepted) {
    const start = index.utf16Offset(span.start);
    const end = index.utf16Offset(span.end);
    if (start < cursor) {
      throw new Error(`Spans overlap or are out of order at codepoint ${span.start}`);
    }

    parts.push(text.slice(cursor, start));
    const placeholder = allocator.next(span.label);
    mappingTable.set(placeholder, text.slice(start, end));
    parts.push(placeholder);
    cursor = end;
  }

  parts.push(text.slice(cursor));

  return {
    sanitized: parts.join(""),
    mappingTable,
    redactionCount: mappingTable.size,
    redactionsByLabel: allocator.issuedByLabel(),
  };
}

/**
 * Reconcile precomputed span streams and substitute the survivors.
 * Streams are listed in detector precedence order.
 */
export function anonymizeSpans(
  text: string,
  streams: ReadonlyArray<ReadonlyArray<Span>>,
): AnonymizeResult {
  const index = new TextIndex(text);
  const { accepted, diagnostics } = reconcile(index, streams);
  return { ...substitute(index, accepted), diagnostics };
}
