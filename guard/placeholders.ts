/**
 * Placeholder allocation
 *
 * Placeholders have the form `<LABEL_N>`, where N is a 1-based counter
 * per label assigned in text order. Counters live on one allocator, and
 * one allocator serves exactly one anonymize call.
 */

/**
 * Anything shaped like a placeholder: `<` + label + `_` + digits + `>`.
 * Labels may not contain angle brackets.
 */
export const PLACEHOLDER_SHAPE = /<[^<>]+_\d+>/g;

export function formatPlaceholder(label: string, n: number): string {
  return `<${label}_${n}>`;
}

/**
 * Collect placeholder-shaped tokens that already occur literally in a text.
 * The allocator never hands these out, so literal text survives restoration.
 */
export function collectPlaceholderTokens(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER_SHAPE)) {
    tokens.add(match[0]);
  }
  return tokens;
}

export class PlaceholderAllocator {
  private readonly counters = new Map<string, number>();
  private readonly issued = new Map<string, number>();
  private readonly reserved: ReadonlySet<string>;

  constructor(reserved: ReadonlySet<string> = new Set()) {
    this.reserved = reserved;
  }

  /**
   * Next placeholder for `label`. Skips counter values whose placeholder is
   * reserved, so suffixes still increase with text position.
   */
  next(label: string): string {
    let counter = this.counters.get(label) ?? 0;
    let placeholder: string;
    do {
      counter += 1;
      placeholder = formatPlaceholder(label, counter);
    } while (this.reserved.has(placeholder));

    this.counters.set(label, counter);
    this.issued.set(label, (this.issued.get(label) ?? 0) + 1);
    return placeholder;
  }

  /** Number of placeholders issued per label */
  issuedByLabel(): Record<string, number> {
    return Object.fromEntries(this.issued);
  }
}
