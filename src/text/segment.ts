// A whitespace character after ., ? ! or a newline ends a sentence,
// unless it follows initials ("e.g.") or a short title ("Mr.", "Dr.").
const SENTENCE_BREAK =
  /(?<![\p{L}\p{N}_]\.[\p{L}\p{N}_].)(?<![A-Z][a-z]\.)(?<=[.?!\n])\s/u;

const WORD_RUN = /[\p{L}\p{N}_]+/gu;

export function splitIntoSentences(text: string): string[] {
  return text
    .split(SENTENCE_BREAK)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export function splitSentenceIntoWords(sentence: string): string[] {
  return sentence.match(WORD_RUN) ?? [];
}
