import type { LinkKey, NoteDocument } from "../model/types";
import type { NoteStore } from "./NoteStore";
import { TypedEmitter } from "../engine/emitter";
import { documentName, notesFileName, resolveLinkKey } from "../link/linkResolver";

export const DEFAULT_AUTOSAVE_MS = 30_000;

export type NotesSessionEvents = {
  loaded: NoteDocument | null;
  dirtyChanged: boolean;
  saved: NoteDocument;
  saveFailed: Error;
};

export type NotesSessionOptions = {
  store: NoteStore;
  autosaveMs?: number;
  now?: () => Date;
};

type OpenDocument = { path: string; name: string; key: LinkKey };

/**
 * Notes for the currently open document. Content changes mark the session dirty;
 * a dirty session is written on the autosave tick, on `flush` and before another
 * document is opened. A failed write keeps the session dirty so the next tick retries.
 */
export class NotesSession extends TypedEmitter<NotesSessionEvents> {
  private readonly store: NoteStore;
  private autosaveMs: number;
  private now: () => Date;

  private current: OpenDocument | null = null;
  private content = "";
  private dirty = false;
  private timer: ReturnType<typeof setInterval> | null = null;
  private pending: Promise<boolean> | null = null;

  constructor(opts: NotesSessionOptions) {
    super();
    this.store = opts.store;
    this.autosaveMs = opts.autosaveMs ?? DEFAULT_AUTOSAVE_MS;
    this.now = opts.now ?? (() => new Date());
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get linkKey(): LinkKey | null {
    return this.current?.key ?? null;
  }

  get sourcePath(): string | null {
    return this.current?.path ?? null;
  }

  get html(): string {
    return this.content;
  }

  async open(path: string): Promise<NoteDocument | null> {
    await this.close();
    const key = await resolveLinkKey(path);
    this.current = { path, name: documentName(path), key };

    let loaded: NoteDocument | null = null;
    try {
      loaded = await this.store.load(key);
    } catch (e) {
      console.error("Failed to load notes", e);
    }
    this.content = loaded?.content ?? "";
    this.setDirty(false);
    this.startAutosave();
    this.emit("loaded", loaded);
    return loaded;
  }

  setContent(html: string) {
    if (!this.current || html === this.content) return;
    this.content = html;
    this.setDirty(true);
  }

  /** Writes the current content. Concurrent calls queue behind the running write. */
  async save(): Promise<boolean> {
    while (this.pending) await this.pending;
    const doc = this.snapshot();
    if (!doc || !this.current) return false;

    const key = this.current.key;
    const run = this.write(key, doc);
    this.pending = run;
    try {
      return await run;
    } finally {
      this.pending = null;
    }
  }

  async flush(): Promise<boolean> {
    if (this.pending) await this.pending;
    if (!this.dirty) return true;
    return this.save();
  }

  /** Current notes as a JSON file named after the document (`paper_1a2b3c4d5e6f.notes.json`). */
  exportFile(): { fileName: string; json: string } | null {
    const doc = this.snapshot();
    if (!doc || !this.current) return null;
    return { fileName: notesFileName(this.current.path, this.current.key), json: JSON.stringify(doc, null, 2) };
  }

  async close(): Promise<void> {
    if (!this.current) return;
    await this.flush();
    this.stopAutosave();
    this.current = null;
    this.content = "";
    this.setDirty(false);
  }

  destroy() {
    this.stopAutosave();
    this.current = null;
    this.removeAllListeners();
  }

  private snapshot(): NoteDocument | null {
    if (!this.current) return null;
    return {
      sourcePath: this.current.path,
      sourceName: this.current.name,
      content: this.content,
      lastModified: this.now().toISOString(),
    };
  }

  private async write(key: LinkKey, doc: NoteDocument): Promise<boolean> {
    try {
      await this.store.save(key, doc);
    } catch (e) {
      const err = e instanceof Error ? e : new Error(String(e));
      console.error("Failed to save notes", err);
      this.emit("saveFailed", err);
      return false;
    }
    // edits made while the write was running stay dirty
    if (this.current?.key === key && this.content === doc.content) this.setDirty(false);
    this.emit("saved", doc);
    return true;
  }

  private setDirty(dirty: boolean) {
    if (this.dirty === dirty) return;
    this.dirty = dirty;
    this.emit("dirtyChanged", dirty);
  }

  private startAutosave() {
    this.stopAutosave();
    if (!(this.autosaveMs > 0)) return;
    this.timer = setInterval(() => {
      if (this.dirty && !this.pending) void this.save();
    }, this.autosaveMs);
  }

  private stopAutosave() {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
