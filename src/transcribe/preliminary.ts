import type { PreliminaryReplacements } from "../types.js";
import { replaceWholeWord } from "../text/words.js";

/**
 * Rewrite the fixed function words, in mapping order, keeping each
 * match's casing. "the" inside "theater" is left alone.
 */
export function applyPreliminaryReplacements(
  text: string,
  replacements: PreliminaryReplacements
): string {
  let result = text;
  for (const [word, replacement] of Object.entries(replacements)) {
    result = replaceWholeWord(result, word, replacement);
  }
  return result;
}
