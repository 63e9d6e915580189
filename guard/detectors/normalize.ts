/**
 * Detector output normalization
 */

import type { OffsetUnit, RawDetection, Span } from "../types.js";
import type { TextIndex } from "../offsets.js";

/**
 * Convert raw detections into spans: offsets move to codepoints and content
 * is sliced from the source text, never taken from the detector.
 *
 * Offsets that cannot be converted are passed through out of range so the
 * reconciler rejects them with a diagnostic.
 */
export function toSpans(index: TextIndex, detections: readonly RawDetection[], unit: OffsetUnit): Span[] {
  return detections.map((detection) => {
    const start = index.toCodepoint(detection.start, unit);
    const end = index.toCodepoint(detection.end, unit);
    const inBounds = Number.isInteger(start) && Number.isInteger(end) && start >= 0 && end <= index.length && start < end;
    return {
      start,
      end,
      label: detection.label,
      content: inBounds ? index.slice(start, end) : "",
    };
  });
}
