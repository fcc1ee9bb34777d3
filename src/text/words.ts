import { adaptCase } from "./case.js";

// Letters, digits and underscore in any script
const WORD_CHAR = String.raw`[\p{L}\p{N}_]`;

const TOKEN_PATTERN = /[\p{L}\p{N}_]+|[^\p{L}\p{N}_\s]+|\s+/gu;
const WORD_TOKEN = /^[\p{L}\p{N}_]+$/u;

/**
 * Split text into word, punctuation and whitespace runs.
 * Joining the result gives back the input unchanged.
 */
export function tokenize(text: string): string[] {
  return text.match(TOKEN_PATTERN) ?? [];
}

export function isWordToken(token: string): boolean {
  return WORD_TOKEN.test(token);
}

/**
 * Rewrite every word token through `transform`, leaving
 * punctuation and whitespace exactly as they were.
 */
export function mapWordTokens(
  text: string,
  transform: (word: string) => string
): string {
  return tokenize(text)
    .map((token) => (isWordToken(token) ? transform(token) : token))
    .join("");
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function wholeWordPattern(word: string, flags: string): RegExp {
  return new RegExp(
    `(?<!${WORD_CHAR})${escapeRegExp(word)}(?!${WORD_CHAR})`,
    flags.includes("u") ? flags : `${flags}u`
  );
}

/**
 * Replace every whole-word, case-insensitive occurrence of `word`,
 * each one taking the casing of the text it replaces.
 */
export function replaceWholeWord(
  text: string,
  word: string,
  replacement: string
): string {
  if (!word) return text;
  return text.replace(wholeWordPattern(word, "gi"), (matched) =>
    adaptCase(matched, replacement)
  );
}

/**
 * Wrap the nth (0-based) whole-word occurrence of `word` as `>word<`.
 * Matching is case-sensitive; text is returned as-is when there is no such occurrence.
 */
export function highlightOccurrence(
  sentence: string,
  word: string,
  occurrence = 0
): string {
  if (!word) return sentence;
  let seen = 0;
  return sentence.replace(wholeWordPattern(word, "g"), (matched) =>
    seen++ === occurrence ? `>${matched}<` : matched
  );
}
