import { splitSentenceIntoWords } from "../text/segment.js";
import { ReviewCommand, type ReviewState } from "./types.js";

const COMMANDS: ReadonlySet<string> = new Set<string>(Object.values(ReviewCommand));

function isReviewCommand(value: string): value is ReviewCommand {
  return COMMANDS.has(value);
}

/** Empty input means "next"; anything unknown is undefined. */
export function parseCommand(input: string): ReviewCommand | undefined {
  const normalized = input.trim().toLowerCase();
  if (normalized === "") return ReviewCommand.NEXT;
  return isReviewCommand(normalized) ? normalized : undefined;
}

function wordsAt(state: ReviewState, sentenceIndex: number): string[] {
  return splitSentenceIntoWords(state.sentences[sentenceIndex] ?? "");
}

/**
 * Move to word 0 of the first sentence at or after `sentenceIndex`
 * that has any words. Leaves the cursor exhausted when there is none.
 */
export function enterSentence(state: ReviewState, sentenceIndex: number): void {
  let index = Math.max(0, sentenceIndex);
  let words = wordsAt(state, index);
  while (index < state.sentences.length && words.length === 0) {
    index++;
    words = wordsAt(state, index);
  }
  state.sentenceIndex = index;
  state.words = words;
  state.wordIndex = 0;
}

export function createReviewState(
  sentences: string[],
  startSentenceIndex: number,
  startWordIndex = 0
): ReviewState {
  const state: ReviewState = { sentences, sentenceIndex: 0, wordIndex: 0, words: [] };
  enterSentence(state, startSentenceIndex);
  if (state.sentenceIndex === startSentenceIndex && startWordIndex < state.words.length) {
    state.wordIndex = Math.max(0, startWordIndex);
  }
  return state;
}

export function isExhausted(state: ReviewState): boolean {
  return state.sentenceIndex >= state.sentences.length;
}

export function currentWord(state: ReviewState): string | undefined {
  return state.words[state.wordIndex];
}

/** Re-read the current sentence after it was rewritten. */
export function resplitCurrent(state: ReviewState): void {
  state.words = wordsAt(state, state.sentenceIndex);
}

export function advanceWord(state: ReviewState): void {
  state.wordIndex++;
  if (state.wordIndex >= state.words.length) {
    enterSentence(state, state.sentenceIndex + 1);
  }
}

export function skipSentence(state: ReviewState): void {
  enterSentence(state, state.sentenceIndex + 1);
}

/**
 * Step back one word, or to the last word of the nearest earlier
 * sentence with words. No-op at the very first word.
 */
export function retreatWord(state: ReviewState): void {
  if (state.wordIndex > 0) {
    state.wordIndex--;
    return;
  }
  for (let index = state.sentenceIndex - 1; index >= 0; index--) {
    const words = wordsAt(state, index);
    if (words.length > 0) {
      state.sentenceIndex = index;
      state.words = words;
      state.wordIndex = words.length - 1;
      return;
    }
  }
}

/**
 * Re-read the current sentence and keep the cursor on a valid word,
 * entering the next sentence if this one no longer has any.
 */
export function resync(state: ReviewState): void {
  resplitCurrent(state);
  if (state.words.length === 0) {
    enterSentence(state, state.sentenceIndex + 1);
    return;
  }
  state.wordIndex = Math.min(state.wordIndex, state.words.length - 1);
}

/** Index among equal words before the cursor, for highlighting. */
export function occurrenceIndex(state: ReviewState): number {
  const word = currentWord(state);
  return state.words.slice(0, state.wordIndex).filter((w) => w === word).length;
}
