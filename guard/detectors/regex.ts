/**
 * Regex-based detector
 */

import type { Detector, RawDetection, Span } from "../types.js";
import { TextIndex } from "../offsets.js";
import { toSpans } from "./normalize.js";

export type PatternEntry = {
  label: string;
  pattern: RegExp;
};

/**
 * Structured identifiers. Order matters only for equal start positions:
 * the earlier entry wins.
 */
export const DEFAULT_PATTERNS: PatternEntry[] = [
  // Email
  {
    label: "EMAIL",
    pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  },
  // Phone numbers (optional country code, parenthesized area codes, -/./space separators)
  // Lookbehind lets a match start at "+" after a space
  {
    label: "PHONE",
    pattern: /(?<!\w)(?:\+?\d{1,3}[-.\s]?)?\(?\d{2,4}\)?[-.\s]?\d{2,4}[-.\s]?\d{2,4}\b/g,
  },
  // IBAN
  {
    label: "IBAN",
    pattern: /\b[A-Z]{2}\d{2}[A-Z0-9]{4}\d{7}[A-Z0-9]{0,16}\b/g,
  },
];

export class RegexDetector implements Detector {
  readonly kind = "regex";
  readonly name: string;
  private readonly patterns: PatternEntry[];

  constructor(patterns: PatternEntry[] = DEFAULT_PATTERNS, name = "regex") {
    this.name = name;
    // Own copies, always global, so concurrent calls never share lastIndex
    this.patterns = patterns.map(({ label, pattern }) => ({
      label,
      pattern: new RegExp(pattern.source, pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`),
    }));
  }

  detect(text: string): Span[] {
    const detections: RawDetection[] = [];

    for (const { label, pattern } of this.patterns) {
      const re = new RegExp(pattern);
      let m: RegExpExecArray | null;
      while ((m = re.exec(text)) !== null) {
        if (m[0].length === 0) {
          re.lastIndex += 1;
          continue;
        }
        detections.push({ start: m.index, end: m.index + m[0].length, label });
      }
    }

    // RegExp offsets are UTF-16 code units
    return toSpans(new TextIndex(text), detections, "utf16");
  }
}
