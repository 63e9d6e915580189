/**
 * English NER pipeline on wink-nlp
 *
 * NLP entities are mapped through a label table. The lite model finds few
 * person names, so a title-case heuristic anchored on known first names
 * backs it up.
 */

import { readFileSync } from "node:fs";
import winkNLP, { type ItemEntity } from "wink-nlp";
import model from "wink-eng-lite-web-model";
import type { RawDetection } from "../types.js";
import type { NerPipeline } from "./model.js";

// =============================================================================
// NLP Initialization (lazy singleton)
// =============================================================================

type WinkInstance = ReturnType<typeof winkNLP>;

let nlp: WinkInstance | null = null;

function getNlp(): WinkInstance {
  if (!nlp) {
    nlp = winkNLP(model);
  }
  return nlp;
}

// =============================================================================
// Label Mapping
// =============================================================================

/** wink entity type -> span label. Unlisted types are ignored. */
export const DEFAULT_ENTITY_LABELS: Record<string, string> = {
  PERSON: "PER",
  EMAIL: "EMAIL",
  URL: "URL",
  MENTION: "MENTION",
  DATE: "DATE",
  MONEY: "MONEY",
};

// =============================================================================
// Name Lists
// =============================================================================

type NameLists = {
  firstNames: Set<string>;
  exclusions: Set<string>;
};

const NAMES_PATH = new URL("./data/names.json", import.meta.url);

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

let nameLists: NameLists | null = null;

function getNameLists(): NameLists {
  if (nameLists) return nameLists;

  const parsed: unknown = JSON.parse(readFileSync(NAMES_PATH, "utf-8"));
  if (
    parsed === null ||
    typeof parsed !== "object" ||
    !("firstNames" in parsed) ||
    !("exclusions" in parsed)
  ) {
    throw new Error(`Invalid name lists in ${NAMES_PATH.pathname}`);
  }
  const { firstNames, exclusions } = parsed;
  if (!isStringArray(firstNames) || !isStringArray(exclusions)) {
    throw new Error(`Invalid name lists in ${NAMES_PATH.pathname}`);
  }

  nameLists = {
    firstNames: new Set(firstNames.map((name) => name.toLowerCase())),
    exclusions: new Set(exclusions),
  };
  return nameLists;
}

// =============================================================================
// NLP Entities
// =============================================================================

type Position = { start: number; end: number };

/**
 * Locate token values in the source text with a moving cursor. wink keeps
 * original token values, so each one is found at or after the previous.
 */
function locateTokens(text: string, values: readonly string[]): Array<Position | null> {
  let cursor = 0;
  return values.map((value) => {
    const at = text.indexOf(value, cursor);
    if (at < 0) return null;
    cursor = at + value.length;
    return { start: at, end: cursor };
  });
}

function collectEntities(text: string, labels: Record<string, string>): RawDetection[] {
  const instance = getNlp();
  const its = instance.its;
  const doc = instance.readDoc(text);

  const values: unknown = doc.tokens().out(its.value);
  if (!isStringArray(values)) return [];
  const positions = locateTokens(text, values);

  const detections: RawDetection[] = [];
  doc.entities().each((entity: ItemEntity) => {
    const type: unknown = entity.out(its.type);
    const span: unknown = entity.out(its.span);
    if (typeof type !== "string" || !Object.hasOwn(labels, type)) return;
    if (!Array.isArray(span)) return;

    // span is [firstToken, lastToken], inclusive
    const [first, last] = span;
    if (typeof first !== "number" || typeof last !== "number") return;
    const from = positions[first];
    const to = positions[last];
    if (!from || !to) return;

    detections.push({ start: from.start, end: to.end, label: labels[type] });
  });

  return detections;
}

// =============================================================================
// Name Heuristic
// =============================================================================

// Allows internal capitals for Mc/Mac/De-prefixed surnames ("McGarry", "DeLuca")
const TITLE_CASE_WORD = /\b[A-Z][a-z]+(?:[A-Z][a-z]+)*\b/g;
// Words in one run are separated by spaces or tabs, never a newline
const HORIZONTAL_GAP = /^[^\S\n]+$/;
const MAX_NAME_WORDS = 3;

type Word = Position & { value: string };

function titleCaseRuns(text: string): Word[][] {
  const runs: Word[][] = [];
  const re = new RegExp(TITLE_CASE_WORD);
  let current: Word[] = [];
  let m: RegExpExecArray | null;

  while ((m = re.exec(text)) !== null) {
    const word = { value: m[0], start: m.index, end: m.index + m[0].length };
    const previous = current[current.length - 1];
    if (previous && !HORIZONTAL_GAP.test(text.slice(previous.end, word.start))) {
      runs.push(current);
      current = [];
    }
    current.push(word);
  }
  if (current.length > 0) runs.push(current);

  return runs;
}

/**
 * A name starts at the first known first name in a run of title-case words
 * and takes up to two following words that are not excluded terms.
 * "Contact John Doe" yields "John Doe"; a lone first name yields nothing.
 */
function collectNames(text: string, label: string): RawDetection[] {
  const { firstNames, exclusions } = getNameLists();
  const detections: RawDetection[] = [];

  for (const run of titleCaseRuns(text)) {
    const first = run.findIndex((word) => firstNames.has(word.value.toLowerCase()));
    if (first < 0) continue;

    let last = first;
    while (
      last + 1 < run.length &&
      last + 1 - first < MAX_NAME_WORDS &&
      !exclusions.has(run[last + 1].value)
    ) {
      last += 1;
    }
    if (last === first) continue;

    detections.push({ start: run[first].start, end: run[last].end, label });
  }

  return detections;
}

// =============================================================================
// Pipeline
// =============================================================================

export type WinkPipelineOptions = {
  /** wink entity type -> span label */
  labels?: Record<string, string>;
  /** Label for heuristic names; null disables the heuristic */
  nameLabel?: string | null;
};

export function createWinkPipeline(options: WinkPipelineOptions = {}): NerPipeline {
  const labels = options.labels ?? DEFAULT_ENTITY_LABELS;
  const nameLabel = options.nameLabel === undefined ? "PER" : options.nameLabel;

  return {
    // wink token values are JS strings, located by UTF-16 offset
    unit: "utf16",
    run(text: string): RawDetection[] {
      const detections = collectEntities(text, labels);
      if (nameLabel) detections.push(...collectNames(text, nameLabel));
      return detections;
    },
  };
}
