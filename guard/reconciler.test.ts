/**
 * Span reconciliation tests — greedy leftmost-first policy
 */

import { describe, it, expect } from "vitest";
import { reconcile } from "./reconciler.js";
import type { Span } from "./types.js";

const TEXT = "abcdefghijklmnop";

function span(start: number, end: number, label: string): Span {
  return { start, end, label, content: "" };
}

function ranges(spans: Span[]): Array<[number, number, string]> {
  return spans.map((s) => [s.start, s.end, s.label]);
}

// =============================================================================
// Conflict Resolution
// =============================================================================

describe("conflict resolution", () => {
  it("should reject a span starting inside the previous accepted span", () => {
    const { accepted } = reconcile(TEXT, [[span(0, 5, "A"), span(3, 8, "B")]]);

    expect(ranges(accepted)).toEqual([[0, 5, "A"]]);
  });

  it("should accept a span starting exactly at the previous end", () => {
    const { accepted } = reconcile(TEXT, [[span(0, 5, "A"), span(5, 8, "B")]]);

    expect(ranges(accepted)).toEqual([
      [0, 5, "A"],
      [5, 8, "B"],
    ]);
  });

  it("should prefer the earlier detector on equal starts, even when shorter", () => {
    const first = [span(0, 3, "X")];
    const second = [span(0, 6, "Y")];

    expect(ranges(reconcile(TEXT, [first, second]).accepted)).toEqual([[0, 3, "X"]]);
    expect(ranges(reconcile(TEXT, [second, first]).accepted)).toEqual([[0, 6, "Y"]]);
  });

  it("should keep enumeration order for equal starts within one detector", () => {
    const { accepted } = reconcile(TEXT, [[span(2, 4, "FIRST"), span(2, 9, "SECOND")]]);

    expect(ranges(accepted)).toEqual([[2, 4, "FIRST"]]);
  });

  it("should always reject fully nested spans", () => {
    const { accepted } = reconcile(TEXT, [[span(2, 4, "INNER")], [span(0, 10, "OUTER")]]);

    expect(ranges(accepted)).toEqual([[0, 10, "OUTER"]]);
  });

  it("should order spans from different detectors by start", () => {
    const { accepted } = reconcile(TEXT, [[span(5, 7, "LATE")], [span(0, 2, "EARLY")]]);

    expect(ranges(accepted)).toEqual([
      [0, 2, "EARLY"],
      [5, 7, "LATE"],
    ]);
  });

  it("should return an empty set for no spans", () => {
    expect(reconcile(TEXT, []).accepted).toEqual([]);
    expect(reconcile(TEXT, [[], []]).accepted).toEqual([]);
  });

  it("should drop overlaps without diagnostics", () => {
    const { diagnostics } = reconcile(TEXT, [[span(0, 5, "A"), span(1, 3, "B")]]);

    expect(diagnostics).toEqual([]);
  });
});

// =============================================================================
// Span Validation
// =============================================================================

describe("span validation", () => {
  it("should re-slice content from the text", () => {
    const { accepted } = reconcile(TEXT, [[{ start: 1, end: 4, label: "A", content: "WRONG" }]]);

    expect(accepted[0].content).toBe("bcd");
  });

  it("should re-slice by codepoint", () => {
    const { accepted } = reconcile("😀😀 Ann", [[span(3, 6, "PER")]]);

    expect(accepted[0].content).toBe("Ann");
  });

  it("should drop malformed spans with a diagnostic", () => {
    const { accepted, diagnostics } = reconcile(TEXT, [
      [
        span(-1, 2, "A"),
        span(10, 20, "B"),
        span(4, 4, "C"),
        span(6, 5, "D"),
        span(Number.NaN, 3, "E"),
        span(1, 2, "<F>"),
        span(1, 2, ""),
        span(12, 14, "OK"),
      ],
    ]);

    expect(ranges(accepted)).toEqual([[12, 14, "OK"]]);
    expect(diagnostics.map((d) => (d.kind === "malformed_span" ? d.reason : d.kind))).toEqual([
      "start before text",
      "end past text",
      "empty or inverted range",
      "empty or inverted range",
      "non-integer offset",
      "label contains angle brackets",
      "missing label",
    ]);
  });

  it("should not let a malformed span block a valid one", () => {
    const { accepted } = reconcile(TEXT, [[span(0, 99, "BAD"), span(1, 3, "GOOD")]]);

    expect(ranges(accepted)).toEqual([[1, 3, "GOOD"]]);
  });
});

// =============================================================================
// Properties
// =============================================================================

function createRandom(seed: number): (max: number) => number {
  let state = seed >>> 0 || 1;
  return (max: number) => {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state % max;
  };
}

describe("accepted set properties", () => {
  it("should never contain overlapping or unordered spans", () => {
    const random = createRandom(42);

    for (let round = 0; round < 200; round++) {
      const streams: Span[][] = [];
      for (let d = 0; d < 3; d++) {
        const stream: Span[] = [];
        const count = random(8);
        for (let i = 0; i < count; i++) {
          const start = random(TEXT.length);
          stream.push(span(start, start + 1 + random(6), `L${d}`));
        }
        streams.push(stream);
      }

      const { accepted } = reconcile(TEXT, streams);
      for (let i = 1; i < accepted.length; i++) {
        expect(accepted[i].start).toBeGreaterThan(accepted[i - 1].start);
        expect(accepted[i].start).toBeGreaterThanOrEqual(accepted[i - 1].end);
      }
      for (const s of accepted) {
        expect(s.end).toBeLessThanOrEqual(TEXT.length);
      }
    }
  });
});
