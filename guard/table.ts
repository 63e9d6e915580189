/**
 * Mapping table serialization
 *
 * The persisted form is a flat JSON object of placeholder -> content.
 */

import type { MappingRecord, MappingTable } from "./types.js";

export function tableToJSON(mappingTable: MappingTable): MappingRecord {
  return Object.fromEntries(mappingTable);
}

/**
 * Build a mapping table from a parsed JSON value. Throws on anything that is
 * not an object of string values.
 */
export function tableFromJSON(value: unknown): MappingTable {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw new TypeError("Mapping table must be a JSON object");
  }
  const mappingTable: MappingTable = new Map();
  const entries: Array<[string, unknown]> = Object.entries(value);
  for (const [placeholder, content] of entries) {
    if (typeof content !== "string") {
      throw new TypeError(`Mapping table entry ${placeholder} is not a string`);
    }
    mappingTable.set(placeholder, content);
  }
  return mappingTable;
}

export function toMappingTable(table: MappingTable | MappingRecord): MappingTable {
  return table instanceof Map ? table : new Map(Object.entries(table));
}
