import type { LinkKey, NoteDocument } from "../model/types";

export interface NoteStore {
  /** null when no notes exist for the key (or the stored record is unusable) */
  load(key: LinkKey): Promise<NoteDocument | null>;
  save(key: LinkKey, doc: NoteDocument): Promise<void>;
  has(key: LinkKey): Promise<boolean>;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

// Minimal runtime validation + best-effort normalization.
export function normalizeLoadedNote(raw: unknown): NoteDocument | null {
  if (!isRecord(raw)) return null;
  const { sourcePath, sourceName, content, lastModified } = raw;
  if (typeof sourcePath !== "string" || !sourcePath) return null;
  if (typeof content !== "string") return null;
  return {
    sourcePath,
    sourceName: typeof sourceName === "string" && sourceName ? sourceName : sourcePath,
    content,
    lastModified: typeof lastModified === "string" ? lastModified : new Date(0).toISOString(),
  };
}
