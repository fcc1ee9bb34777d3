import { PRELIMINARY_REPLACEMENTS } from "../config/constants.js";
import {
  DictionarySnapshot,
  type DictionaryDocument,
} from "../dictionary/dictionary.js";
import type { EditSession } from "../dictionary/edit.js";
import type { EditableDictionary } from "../dictionary/store.js";
import type { Prompter } from "../ui/input.js";
import type { Logger } from "../ui/logger.js";
import type { DictionaryEntry, Variation } from "../types.js";

export interface ScriptedPrompter extends Prompter {
  prompts: string[];
}

/** Answers questions from a fixed list, then reports closed input. */
export function scriptedPrompter(answers: string[]): ScriptedPrompter {
  const queue = [...answers];
  const prompts: string[] = [];
  return {
    prompts,
    async ask(prompt: string): Promise<string | undefined> {
      prompts.push(prompt);
      return queue.shift();
    },
  };
}

export function captureOutput(): { print: Logger; lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    print: (message: string) => {
      lines.push(message);
    },
  };
}

export const silent: Logger = () => {};

/**
 * In-memory stand-in for the JSON store. Edits run `onEdit` against the
 * backing document and only show after reload().
 */
export class MemoryDictionary implements EditableDictionary {
  private snapshot: DictionarySnapshot;
  reloadCount = 0;
  editedWords: string[] = [];

  constructor(
    readonly document: DictionaryDocument,
    private readonly onEdit: (word: string, document: DictionaryDocument) => void = () => {}
  ) {
    this.snapshot = new DictionarySnapshot(document, PRELIMINARY_REPLACEMENTS);
  }

  getEntry(word: string): DictionaryEntry | undefined {
    return this.snapshot.getEntry(word);
  }

  keys(): string[] {
    return this.snapshot.keys();
  }

  variations(): Variation[] {
    return this.snapshot.variations();
  }

  async editEntry(word: string, _session: EditSession): Promise<boolean> {
    this.editedWords.push(word);
    this.onEdit(word, this.document);
    return true;
  }

  reload(): void {
    this.reloadCount++;
    this.snapshot = new DictionarySnapshot(this.document, PRELIMINARY_REPLACEMENTS);
  }
}

export function snapshotOf(document: DictionaryDocument): DictionarySnapshot {
  return new DictionarySnapshot(document, PRELIMINARY_REPLACEMENTS);
}
