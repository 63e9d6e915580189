/**
 * Content restorer
 *
 * Restores placeholders to their original content using the mapping table.
 *
 * Restoration is one simultaneous scan: every key is folded into a single
 * alternation, longest first, so `<PER_10>` is matched before `<PER_1>`
 * could match inside it, and restored content is never scanned again.
 * Iterative find/replace per key would re-substitute inside content that
 * itself looks like a placeholder.
 */

import type { MappingRecord, MappingTable } from "./types.js";
import { PLACEHOLDER_SHAPE } from "./placeholders.js";
import { toMappingTable } from "./table.js";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildKeyPattern(mappingTable: MappingTable): RegExp | null {
  const keys = Array.from(mappingTable.keys())
    .filter((key) => key.length > 0)
    .sort((a, b) => b.length - a.length);
  if (keys.length === 0) return null;
  return new RegExp(keys.map(escapeRegExp).join("|"), "g");
}

/**
 * Restore placeholders in a string.
 *
 * Placeholders with no table entry are left as they are; table entries
 * with no placeholder in the text are ignored.
 */
export function restore(sanitized: string, table: MappingTable | MappingRecord): string {
  const mappingTable = toMappingTable(table);
  const pattern = buildKeyPattern(mappingTable);
  if (!pattern) return sanitized;

  return sanitized.replace(pattern, (placeholder) => mappingTable.get(placeholder) ?? placeholder);
}

/**
 * Placeholder-shaped tokens in the sanitized text that the table cannot
 * resolve, in order of first appearance.
 */
export function findUnresolvedPlaceholders(
  sanitized: string,
  table: MappingTable | MappingRecord,
): string[] {
  const mappingTable = toMappingTable(table);
  const unresolved = new Set<string>();
  for (const match of sanitized.matchAll(PLACEHOLDER_SHAPE)) {
    if (!mappingTable.has(match[0])) unresolved.add(match[0]);
  }
  return [...unresolved];
}
