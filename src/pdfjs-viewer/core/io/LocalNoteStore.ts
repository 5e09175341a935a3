import type { LinkKey, NoteDocument } from "../model/types";
import { normalizeLoadedNote, type NoteStore } from "./NoteStore";

/** The part of the Web Storage API the store needs (`localStorage` satisfies it). */
export type KeyValueStorage = Pick<Storage, "getItem" | "setItem">;

export const LOCAL_NOTES_PREFIX = "notes:";

export class LocalNoteStore implements NoteStore {
  constructor(
    private storage: KeyValueStorage,
    private prefix: string = LOCAL_NOTES_PREFIX
  ) {}

  private itemKey(key: LinkKey) {
    return `${this.prefix}${key}`;
  }

  async load(key: LinkKey): Promise<NoteDocument | null> {
    const raw = this.storage.getItem(this.itemKey(key));
    if (raw === null) return null;
    try {
      return normalizeLoadedNote(JSON.parse(raw));
    } catch (e) {
      console.warn("Ignoring unreadable notes record", key, e);
      return null;
    }
  }

  async save(key: LinkKey, doc: NoteDocument): Promise<void> {
    try {
      this.storage.setItem(this.itemKey(key), JSON.stringify(doc));
    } catch (e) {
      // QuotaExceededError is the usual cause (large embedded screenshots)
      throw new Error(`Save failed: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  async has(key: LinkKey): Promise<boolean> {
    return this.storage.getItem(this.itemKey(key)) !== null;
  }
}

/** In-memory `KeyValueStorage`, for environments without `localStorage`. */
export class MemoryStorage implements KeyValueStorage {
  private items = new Map<string, string>();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, String(value));
  }
}
