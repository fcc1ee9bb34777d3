/**
 * Types for the interactive review state machine.
 *
 * The cursor walks words of the current sentence. Moving past the last
 * word enters the next sentence; moving past the last sentence ends the
 * review.
 */

export enum ReviewCommand {
  ACCEPT = "a",
  NEXT = "n",
  PREVIOUS = "p",
  EDIT = "e",
  CUSTOMIZE = "c",
  SKIP = "s",
  QUIT = "q",
}

export interface ReviewCursor {
  sentenceIndex: number;
  wordIndex: number;
}

export interface ReviewState extends ReviewCursor {
  /** Shared with the caller and rewritten in place */
  sentences: string[];
  /** Words of sentences[sentenceIndex] */
  words: string[];
}

export type ReviewEndReason = "quit" | "exhausted";

export interface ReviewOutcome {
  reason: ReviewEndReason;
  cursor: ReviewCursor;
}
