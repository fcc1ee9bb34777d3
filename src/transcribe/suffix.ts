import type { Variation } from "../types.js";
import { lookupSpelling, type DictionaryView } from "../dictionary/dictionary.js";
import { adaptCase } from "../text/case.js";
import { mapWordTokens } from "../text/words.js";

/** Stem of a word ending in exactly one lowercase "s", else undefined. */
export function pluralStem(word: string): string | undefined {
  if (!word.endsWith("s") || word.endsWith("ss")) return undefined;
  return word.slice(0, -1);
}

/**
 * Rewrite plurals whose stem is in the dictionary: "cats" becomes the
 * stem's spelling followed by "s". Words ending in "ss" are never touched.
 */
export function rewriteSuffixes(
  text: string,
  dictionary: DictionaryView,
  variation: Variation
): string {
  return mapWordTokens(text, (word) => {
    const stem = pluralStem(word);
    if (!stem) return word;

    const spelling = lookupSpelling(dictionary, stem.toLowerCase(), variation);
    return spelling === undefined ? word : `${adaptCase(stem, spelling)}s`;
  });
}
