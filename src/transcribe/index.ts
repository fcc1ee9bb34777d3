/**
 * Transcription of Standard English into PI notation.
 */

export { Transcriber, type TranscriptionStep } from "./pipeline.js";
export { applyPreliminaryReplacements } from "./preliminary.js";
export { substituteVariation } from "./variation.js";
export { rewriteSuffixes, pluralStem } from "./suffix.js";
export {
  DictionarySnapshot,
  buildVariationLookup,
  lookupSpelling,
  type DictionaryView,
} from "../dictionary/dictionary.js";
export { PRELIMINARY_REPLACEMENTS, DEFAULT_VARIATION } from "../config/constants.js";
export type { DictionaryEntry, PiMapping, Variation } from "../types.js";
