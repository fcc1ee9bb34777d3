import { MAX_SUGGESTIONS, SUGGESTION_MAX_DISTANCE } from "../config/constants.js";
import { levenshteinDistance } from "../utils/strings.js";
import type { DictionaryView } from "./dictionary.js";

/**
 * Dictionary words closest to `word` by edit distance, nearest first,
 * ties in alphabetical order.
 */
export function suggestSimilarWords(
  dictionary: DictionaryView,
  word: string,
  limit = MAX_SUGGESTIONS,
  maxDistance = SUGGESTION_MAX_DISTANCE
): string[] {
  const target = word.toLowerCase();
  const matches: Array<{ key: string; distance: number }> = [];

  for (const key of dictionary.keys()) {
    if (key === target) continue;
    // Length difference is a lower bound on the distance
    if (Math.abs(key.length - target.length) > maxDistance) continue;

    const distance = levenshteinDistance(target, key);
    if (distance <= maxDistance) {
      matches.push({ key, distance });
    }
  }

  return matches
    .sort((a, b) => a.distance - b.distance || a.key.localeCompare(b.key))
    .slice(0, limit)
    .map((match) => match.key);
}
