import { DEFAULT_VARIATION } from "../config/constants.js";
import type { DictionaryView } from "../dictionary/dictionary.js";
import type { Logger } from "../ui/logger.js";
import type { PreliminaryReplacements, Variation } from "../types.js";
import { applyPreliminaryReplacements } from "./preliminary.js";
import { rewriteSuffixes } from "./suffix.js";
import { substituteVariation } from "./variation.js";

export interface TranscriptionStep {
  name: string;
  run: (text: string, variation: Variation) => string;
}

/**
 * Standard English to PI: preliminary words, then dictionary spellings,
 * then plurals of dictionary words.
 */
export class Transcriber {
  private readonly steps: TranscriptionStep[];

  constructor(
    private readonly dictionary: DictionaryView,
    private readonly preliminaryReplacements: PreliminaryReplacements,
    private readonly log?: Logger
  ) {
    this.steps = [
      {
        name: "preliminary",
        run: (text) => applyPreliminaryReplacements(text, this.preliminaryReplacements),
      },
      {
        name: "variation",
        run: (text, variation) => substituteVariation(text, this.dictionary, variation),
      },
      {
        name: "suffix",
        run: (text, variation) => rewriteSuffixes(text, this.dictionary, variation),
      },
    ];
  }

  transcribe(text: string, variation: Variation = DEFAULT_VARIATION): string {
    return this.steps.reduce((current, step) => {
      const next = step.run(current, variation);
      this.log?.(`[transcribe] ${step.name}: ${next === current ? "no change" : "rewritten"}`);
      return next;
    }, text);
  }
}
