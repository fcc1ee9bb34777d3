import type { Variation } from "../types.js";
import { buildVariationLookup, type DictionaryView } from "../dictionary/dictionary.js";
import { adaptCase } from "../text/case.js";
import { mapWordTokens } from "../text/words.js";

/**
 * Replace every word that has a spelling for `variation` with that spelling.
 * Punctuation and whitespace pass through untouched.
 */
export function substituteVariation(
  text: string,
  dictionary: DictionaryView,
  variation: Variation
): string {
  const lookup = buildVariationLookup(dictionary, variation);
  if (lookup.size === 0) return text;

  return mapWordTokens(text, (word) => {
    const spelling = lookup.get(word.toLowerCase());
    return spelling === undefined ? word : adaptCase(word, spelling);
  });
}
