/**
 * Interactive editing of a single dictionary entry.
 */

import type { Prompter } from "../ui/input.js";
import type { Logger } from "../ui/logger.js";
import { printWithSpacing } from "../ui/output.js";
import type { DictionaryEntry, PiMapping, Variation } from "../types.js";

export interface EditSession {
  prompter: Prompter;
  print: Logger;
}

const CLEAR_MARKER = "-";

export function formatEntry(entry: DictionaryEntry): string {
  const spellings = Object.entries(entry.PI)
    .map(([variation, spelling]) => `${variation}=${spelling ?? "(none)"}`)
    .join(", ");
  return spellings ? `${entry.whole} [${spellings}]` : entry.whole;
}

function orderedVariations(known: Variation[], entry: DictionaryEntry | undefined): Variation[] {
  const names = new Set(known);
  for (const variation of Object.keys(entry?.PI ?? {})) {
    names.add(variation);
  }
  return [...names];
}

/**
 * Walk the reviewer through the fields of `word`'s entry.
 * Blank answers keep the current value and "-" clears a spelling.
 * Resolves undefined when input closes part way through.
 */
export async function promptEntryEdit(
  word: string,
  current: DictionaryEntry | undefined,
  knownVariations: Variation[],
  session: EditSession
): Promise<DictionaryEntry | undefined> {
  const { prompter, print } = session;

  printWithSpacing(
    print,
    current ? `Editing "${word}": ${formatEntry(current)}` : `New entry for "${word}"`
  );

  const currentWhole = current?.whole ?? word;
  const wholeAnswer = await prompter.ask(`Whole form [${currentWhole}]: `);
  if (wholeAnswer === undefined) return undefined;
  const whole = wholeAnswer.trim() || currentWhole;

  const mapping: PiMapping = {};
  for (const variation of orderedVariations(knownVariations, current)) {
    const existing = current?.PI[variation] ?? null;
    const answer = await prompter.ask(
      `${variation} [${existing ?? "none"}] ('${CLEAR_MARKER}' clears): `
    );
    if (answer === undefined) return undefined;

    const trimmed = answer.trim();
    if (trimmed === CLEAR_MARKER) {
      mapping[variation] = null;
    } else {
      mapping[variation] = trimmed || existing;
    }
  }

  while (true) {
    const name = await prompter.ask("Add a variation (name, blank to finish): ");
    if (name === undefined) return undefined;
    const variation = name.trim();
    if (!variation) break;

    const spelling = await prompter.ask(`${variation} spelling: `);
    if (spelling === undefined) return undefined;
    mapping[variation] = spelling.trim() || null;
  }

  return { whole, PI: mapping };
}
