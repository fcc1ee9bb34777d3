/**
 * PI dictionary: lowercase base words mapped to their phonetic spellings
 * per variation.
 *
 * A loaded dictionary is an immutable snapshot. Edits go through the JSON
 * store and only become visible after an explicit reload().
 */

import fs from "node:fs";
import { DictionaryError } from "../errors.js";
import { describeError, type Logger } from "../ui/logger.js";
import type {
  DictionaryEntry,
  PiMapping,
  PreliminaryReplacements,
  Variation,
} from "../types.js";

export interface DictionaryView {
  getEntry(word: string): DictionaryEntry | undefined;
  keys(): string[];
  variations(): Variation[];
}

export type DictionaryDocument = Record<string, DictionaryEntry>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseEntry(key: string, value: unknown, filePath: string): DictionaryEntry {
  if (!isRecord(value)) {
    throw new DictionaryError(filePath, `entry "${key}" must be an object`);
  }
  const { whole, PI } = value;
  if (whole !== undefined && typeof whole !== "string") {
    throw new DictionaryError(filePath, `entry "${key}" has a non-string "whole"`);
  }
  const wholeForm = typeof whole === "string" ? whole : key;
  if (!isRecord(PI)) {
    throw new DictionaryError(filePath, `entry "${key}" is missing its "PI" mapping`);
  }

  const mapping: PiMapping = {};
  for (const [variation, spelling] of Object.entries(PI)) {
    if (spelling !== null && typeof spelling !== "string") {
      throw new DictionaryError(
        filePath,
        `entry "${key}" has a non-string ${variation} spelling`
      );
    }
    mapping[variation] = typeof spelling === "string" ? spelling : null;
  }
  return { whole: wholeForm, PI: mapping };
}

/**
 * Validate a parsed JSON document. Keys are lowercased; a later key wins
 * over an earlier one that differs only in case.
 */
function parseDictionaryDocument(
  raw: unknown,
  filePath: string
): DictionaryDocument {
  if (!isRecord(raw)) {
    throw new DictionaryError(filePath, "top level must be an object of entries");
  }
  const document: DictionaryDocument = {};
  for (const [key, value] of Object.entries(raw)) {
    document[key.toLowerCase()] = parseEntry(key, value, filePath);
  }
  return document;
}

export function readDictionaryDocument(filePath: string): DictionaryDocument {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new DictionaryError(filePath, `cannot be read (${describeError(error)})`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DictionaryError(filePath, `is not valid JSON (${describeError(error)})`);
  }
  return parseDictionaryDocument(raw, filePath);
}

export function writeDictionaryDocument(
  filePath: string,
  document: DictionaryDocument
): void {
  const sorted: DictionaryDocument = {};
  for (const key of Object.keys(document).sort()) {
    const entry = document[key];
    if (entry) sorted[key] = entry;
  }
  fs.writeFileSync(filePath, `${JSON.stringify(sorted, null, 2)}\n`, "utf8");
}

/**
 * Read-only dictionary over a fixed set of entries.
 * Entries keyed by a preliminary word are left out so that dictionary
 * substitution never rewrites a preliminary form a second time.
 */
export class DictionarySnapshot implements DictionaryView {
  private readonly entries: ReadonlyMap<string, DictionaryEntry>;
  private readonly variationNames: readonly Variation[];

  constructor(
    document: DictionaryDocument,
    preliminaryReplacements: PreliminaryReplacements,
    log?: Logger
  ) {
    const entries = new Map<string, DictionaryEntry>();
    const variations = new Set<Variation>();

    for (const [key, entry] of Object.entries(document)) {
      const word = key.toLowerCase();
      if (Object.hasOwn(preliminaryReplacements, word)) {
        log?.(`[dictionary] Ignoring "${word}": fixed preliminary replacement`);
        continue;
      }
      entries.set(word, Object.freeze({ whole: entry.whole, PI: Object.freeze({ ...entry.PI }) }));
      for (const variation of Object.keys(entry.PI)) {
        variations.add(variation);
      }
    }

    this.entries = entries;
    this.variationNames = Object.freeze([...variations].sort());
  }

  getEntry(word: string): DictionaryEntry | undefined {
    return this.entries.get(word);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  variations(): Variation[] {
    return [...this.variationNames];
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Spelling of `word` for `variation`, or undefined when the entry
 * is missing or leaves that variation null or blank.
 */
export function lookupSpelling(
  dictionary: DictionaryView,
  word: string,
  variation: Variation
): string | undefined {
  const spelling = dictionary.getEntry(word)?.PI[variation];
  return typeof spelling === "string" && spelling.length > 0 ? spelling : undefined;
}

/** lowercase word → spelling, for every entry defining `variation`. */
export function buildVariationLookup(
  dictionary: DictionaryView,
  variation: Variation
): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const word of dictionary.keys()) {
    const spelling = lookupSpelling(dictionary, word, variation);
    if (spelling !== undefined) {
      lookup.set(word, spelling);
    }
  }
  return lookup;
}
