/**
 * Offset conversion between Unicode codepoints, UTF-16 code units and
 * UTF-8 bytes.
 *
 * Spans are measured in codepoints everywhere inside the guard. JS RegExp
 * and most NLP libraries report UTF-16 offsets, and some native engines
 * report UTF-8 byte offsets; detectors convert through a TextIndex before
 * handing spans to the reconciler.
 */

import type { OffsetUnit } from "./types.js";

function utf8Width(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  // Lone surrogates are encoded as U+FFFD (3 bytes) by TextEncoder
  if (codePoint < 0x10000) return 3;
  return 4;
}

/**
 * Lookup tables over one text, built in a single pass.
 */
export class TextIndex {
  readonly text: string;
  /** Length in codepoints */
  readonly length: number;
  // codepoint index -> UTF-16 offset (length + 1 entries)
  private readonly utf16Offsets: number[];
  // codepoint index -> UTF-8 byte offset (length + 1 entries)
  private readonly utf8Offsets: number[];
  // UTF-16 offset -> codepoint index, -1 inside a surrogate pair
  private readonly fromUtf16Table: Int32Array;

  constructor(text: string) {
    this.text = text;
    this.utf16Offsets = [];
    this.utf8Offsets = [];
    this.fromUtf16Table = new Int32Array(text.length + 1).fill(-1);

    let bytes = 0;
    let i = 0;
    while (i < text.length) {
      const codePoint = text.codePointAt(i) ?? 0;
      this.fromUtf16Table[i] = this.utf16Offsets.length;
      this.utf16Offsets.push(i);
      this.utf8Offsets.push(bytes);
      bytes += utf8Width(codePoint);
      i += codePoint > 0xffff ? 2 : 1;
    }
    this.fromUtf16Table[text.length] = this.utf16Offsets.length;
    this.utf16Offsets.push(text.length);
    this.utf8Offsets.push(bytes);
    this.length = this.utf16Offsets.length - 1;
  }

  /** UTF-8 length of the text in bytes */
  get byteLength(): number {
    return this.utf8Offsets[this.length];
  }

  /**
   * Convert an offset in the given unit to a codepoint index.
   *
   * Offsets past either end are shifted into codepoint space so they stay
   * out of bounds; offsets that fall inside a multi-unit character map to
   * NaN. Both are rejected by the reconciler.
   */
  toCodepoint(offset: number, unit: OffsetUnit): number {
    if (!Number.isInteger(offset)) return Number.NaN;
    switch (unit) {
      case "codepoint":
        return offset;
      case "utf16":
        if (offset < 0) return offset;
        if (offset > this.text.length) return this.length + (offset - this.text.length);
        return this.fromUtf16(offset);
      case "utf8":
        if (offset < 0) return offset;
        if (offset > this.byteLength) return this.length + (offset - this.byteLength);
        return this.fromUtf8(offset);
    }
  }

  /** UTF-16 offset of a codepoint index (clamped to the text) */
  utf16Offset(codepoint: number): number {
    if (codepoint <= 0) return 0;
    if (codepoint >= this.length) return this.text.length;
    return this.utf16Offsets[codepoint];
  }

  /** Slice by codepoint indices */
  slice(start: number, end: number): string {
    return this.text.slice(this.utf16Offset(start), this.utf16Offset(end));
  }

  private fromUtf16(offset: number): number {
    const codepoint = this.fromUtf16Table[offset];
    return codepoint < 0 ? Number.NaN : codepoint;
  }

  private fromUtf8(offset: number): number {
    // Binary search: utf8Offsets is strictly increasing
    let lo = 0;
    let hi = this.length;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const value = this.utf8Offsets[mid];
      if (value === offset) return mid;
      if (value < offset) lo = mid + 1;
      else hi = mid - 1;
    }
    return Number.NaN;
  }
}

export function toIndex(source: string | TextIndex): TextIndex {
  return typeof source === "string" ? new TextIndex(source) : source;
}
