import type { Logger } from "../ui/logger.js";
import type { DictionaryEntry, PreliminaryReplacements, Variation } from "../types.js";
import {
  DictionarySnapshot,
  readDictionaryDocument,
  writeDictionaryDocument,
  type DictionaryView,
} from "./dictionary.js";
import { formatEntry, promptEntryEdit, type EditSession } from "./edit.js";

export interface EditableDictionary extends DictionaryView {
  /** Resolves true when the store was changed. */
  editEntry(word: string, session: EditSession): Promise<boolean>;
  reload(): void;
}

/**
 * Dictionary backed by a JSON file. Lookups are served from the snapshot
 * taken at the last load.
 */
export class JsonDictionary implements EditableDictionary {
  private snapshot: DictionarySnapshot;

  constructor(
    private readonly filePath: string,
    private readonly preliminaryReplacements: PreliminaryReplacements,
    private readonly log?: Logger
  ) {
    this.snapshot = this.load();
  }

  private load(): DictionarySnapshot {
    const document = readDictionaryDocument(this.filePath);
    const snapshot = new DictionarySnapshot(
      document,
      this.preliminaryReplacements,
      this.log
    );
    this.log?.(`[dictionary] Loaded ${snapshot.size} entries from ${this.filePath}`);
    return snapshot;
  }

  reload(): void {
    this.snapshot = this.load();
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

  async editEntry(word: string, session: EditSession): Promise<boolean> {
    if (Object.hasOwn(this.preliminaryReplacements, word)) {
      session.print(`"${word}" is a fixed preliminary replacement and cannot be edited.`);
      return false;
    }

    // Start from the file on disk, not the snapshot
    const document = readDictionaryDocument(this.filePath);
    const updated = await promptEntryEdit(
      word,
      document[word],
      this.variations(),
      session
    );
    if (!updated) {
      session.print("Edit cancelled.");
      return false;
    }

    document[word] = updated;
    writeDictionaryDocument(this.filePath, document);
    this.log?.(`[dictionary] Saved "${word}" to ${this.filePath}`);
    session.print(`Saved: ${formatEntry(updated)}`);
    return true;
  }
}
