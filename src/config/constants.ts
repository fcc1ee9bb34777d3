import process from "node:process";
import type { PreliminaryReplacements } from "../types.js";

export const DEFAULT_VARIATION = "L1";

/**
 * Function words rewritten before any dictionary lookup.
 * Applied in insertion order.
 */
export const PRELIMINARY_REPLACEMENTS: PreliminaryReplacements = Object.freeze({
  the: "the̬",
  a: "a̬",
  an: "a̬n",
  of: "‹o̬v›",
  to: "to̬",
  you: "yöu",
  this: "thiṣ",
  and: "and",
  for: "for",
  from: "fro̬m",
});

export const REVIEW_OPTIONS_PROMPT =
  "Options: (a)ccept, (n)ext (or hit 'Enter'), (p)revious, (e)dit dictionary entry, (c)ustomize word, (s)kip sentence, (q)uit: ";

export const MAX_SUGGESTIONS = 3;
export const SUGGESTION_MAX_DISTANCE = 2;

/** ANSI colours per log level; the review transcript stays uncoloured. */
export const LOG_COLORS = {
  reset: "\u001B[0m",
  debug: "\u001B[2m",
  warn: "\u001B[33m",
  error: "\u001B[31m",
} as const;

export type LogColor = (typeof LOG_COLORS)[keyof typeof LOG_COLORS];

export const ENABLE_COLOR =
  Boolean(process.stdout.isTTY) && process.env["NO_COLOR"] === undefined;
