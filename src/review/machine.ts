/**
 * Interactive review loop.
 *
 * Shows one word at a time with its dictionary entry and applies the
 * reviewer's command. Accepted and customized spellings are written into
 * every sentence, not only the one under the cursor.
 *
 * States: REVIEW_WORD → (command) → REVIEW_WORD | done (quit / exhausted)
 */

import { REVIEW_OPTIONS_PROMPT } from "../config/constants.js";
import { lookupSpelling } from "../dictionary/dictionary.js";
import type { EditableDictionary } from "../dictionary/store.js";
import { suggestSimilarWords } from "../dictionary/suggest.js";
import { highlightOccurrence, replaceWholeWord } from "../text/words.js";
import { inputWithSpacing, type Prompter } from "../ui/input.js";
import type { Logger } from "../ui/logger.js";
import { printWithSpacing } from "../ui/output.js";
import type { Variation } from "../types.js";
import {
  advanceWord,
  createReviewState,
  currentWord,
  isExhausted,
  occurrenceIndex,
  parseCommand,
  resplitCurrent,
  resync,
  retreatWord,
  skipSentence,
} from "./cursor.js";
import { ReviewCommand, type ReviewOutcome, type ReviewState } from "./types.js";

// === Dependencies ===

export interface ReviewDeps {
  dictionary: EditableDictionary;
  prompter: Prompter;
  /** Reviewer-facing output */
  print: Logger;
  /** Debug trace */
  log: Logger;
}

export interface ReviewOptions {
  startWordIndex?: number;
}

/**
 * Replace `word` with `replacement` in every sentence, case-preserving
 * and whole-word only.
 */
export function replaceWordInAllSentences(
  sentences: string[],
  word: string,
  replacement: string
): void {
  for (let index = 0; index < sentences.length; index++) {
    sentences[index] = replaceWholeWord(sentences[index] ?? "", word, replacement);
  }
}

function outcome(state: ReviewState, reason: ReviewOutcome["reason"]): ReviewOutcome {
  return {
    reason,
    cursor: { sentenceIndex: state.sentenceIndex, wordIndex: state.wordIndex },
  };
}

function showWord(
  state: ReviewState,
  word: string,
  variation: Variation,
  deps: ReviewDeps
): void {
  const sentence = state.sentences[state.sentenceIndex] ?? "";
  printWithSpacing(deps.print, highlightOccurrence(sentence, word, occurrenceIndex(state)));

  const entry = deps.dictionary.getEntry(word.toLowerCase());
  if (entry) {
    printWithSpacing(deps.print, `PI Entry: ${entry.whole}`);
    deps.print(`${variation} word: ${entry.PI[variation] ?? "(none)"}`);
    return;
  }

  printWithSpacing(deps.print, "No PI entry found for this word.");
  const suggestions = suggestSimilarWords(deps.dictionary, word);
  if (suggestions.length > 0) {
    deps.print(`Similar entries: ${suggestions.join(", ")}`);
  }
}

// === Main Runner ===

/**
 * Review `sentences` word by word starting at `startSentenceIndex`.
 * The array is rewritten in place; resolves when the reviewer quits,
 * input closes, or the last word has been passed.
 */
export async function reviewInteractively(
  sentences: string[],
  startSentenceIndex: number,
  variation: Variation,
  deps: ReviewDeps,
  options: ReviewOptions = {}
): Promise<ReviewOutcome> {
  const state = createReviewState(sentences, startSentenceIndex, options.startWordIndex);
  const { dictionary, prompter, print, log } = deps;

  while (!isExhausted(state)) {
    const word = currentWord(state);
    if (word === undefined) {
      skipSentence(state);
      continue;
    }

    showWord(state, word, variation, deps);

    const answer = await inputWithSpacing(prompter, REVIEW_OPTIONS_PROMPT);
    if (answer === undefined) {
      printWithSpacing(print, "Input closed. Exiting interactive transcription.");
      return outcome(state, "quit");
    }

    const command = parseCommand(answer);
    log(`[review] (${state.sentenceIndex}, ${state.wordIndex}) "${word}" → ${command ?? "invalid"}`);

    switch (command) {
      case ReviewCommand.ACCEPT:
      case ReviewCommand.CUSTOMIZE: {
        const spelling = lookupSpelling(dictionary, word.toLowerCase(), variation);
        if (spelling === undefined) {
          printWithSpacing(print, `No PI entry found for '${word}'.`);
          break;
        }

        let replacement = spelling;
        if (command === ReviewCommand.CUSTOMIZE) {
          const custom = await prompter.ask(`Enter a customized version for '${spelling}': `);
          if (custom === undefined) {
            printWithSpacing(print, "Input closed. Exiting interactive transcription.");
            return outcome(state, "quit");
          }
          replacement = custom.trim() || spelling;
        }

        replaceWordInAllSentences(sentences, word, replacement);
        printWithSpacing(
          print,
          command === ReviewCommand.ACCEPT
            ? `All occurrences of '${word}' replaced with '${replacement}'`
            : `Word '${word}' replaced with customized version '${replacement}'`
        );

        resplitCurrent(state);
        advanceWord(state);
        break;
      }

      case ReviewCommand.NEXT:
        advanceWord(state);
        break;

      case ReviewCommand.PREVIOUS:
        retreatWord(state);
        break;

      case ReviewCommand.EDIT:
        await dictionary.editEntry(word.toLowerCase(), { prompter, print });
        dictionary.reload();
        resync(state);
        break;

      case ReviewCommand.SKIP:
        skipSentence(state);
        break;

      case ReviewCommand.QUIT:
        printWithSpacing(print, "Exiting interactive transcription.");
        return outcome(state, "quit");

      case undefined:
        printWithSpacing(
          print,
          "Invalid input. Please choose 'a', 'n', '', 'p', 'e', 'c', 's', or 'q'."
        );
        break;
    }
  }

  log("[review] All sentences reviewed");
  return outcome(state, "exhausted");
}
