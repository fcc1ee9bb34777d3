export type Variation = string;

/** Phonetic spellings of one word, keyed by variation name. */
export type PiMapping = Record<Variation, string | null>;

export interface DictionaryEntry {
  whole: string;
  PI: PiMapping;
}

export type PreliminaryReplacements = Readonly<Record<string, string>>;

export interface Config {
  dictionaryPath: string;
  variation: Variation;
  inputPath: string | undefined;
  outputPath: string | undefined;
  interactive: boolean;
  startSentence: number;
  debug: boolean;
}

export interface ParseResult {
  config: Config;
  text: string | undefined;
}
