import type { KeyValueStorage } from "@/pdfjs-viewer/core/io/LocalNoteStore";
import { isRecord } from "@/pdfjs-viewer/core/io/NoteStore";

export const RECENT_DOCUMENTS_KEY = "recent_documents";
export const MAX_RECENT_DOCUMENTS = 10;

export interface RecentDocument {
  path: string;
  name: string;
  openedAt: string;
}

function parseRecent(raw: unknown): RecentDocument | null {
  if (!isRecord(raw)) return null;
  const { path, name, openedAt } = raw;
  if (typeof path !== "string" || !path) return null;
  return {
    path,
    name: typeof name === "string" && name ? name : path,
    openedAt: typeof openedAt === "string" ? openedAt : "",
  };
}

export function readRecentDocuments(storage: KeyValueStorage): RecentDocument[] {
  const raw = storage.getItem(RECENT_DOCUMENTS_KEY);
  if (!raw) return [];
  try {
    const data: unknown = JSON.parse(raw);
    if (!Array.isArray(data)) return [];
    return data.map(parseRecent).filter((d): d is RecentDocument => d !== null);
  } catch (e) {
    console.warn("Ignoring unreadable recent documents list", e);
    return [];
  }
}

/** Most recent first; re-opening a document moves it to the top. */
export function rememberDocument(storage: KeyValueStorage, doc: RecentDocument): RecentDocument[] {
  const next = [doc, ...readRecentDocuments(storage).filter((d) => d.path !== doc.path)].slice(
    0,
    MAX_RECENT_DOCUMENTS
  );
  storage.setItem(RECENT_DOCUMENTS_KEY, JSON.stringify(next));
  return next;
}

export function forgetDocument(storage: KeyValueStorage, path: string): RecentDocument[] {
  const next = readRecentDocuments(storage).filter((d) => d.path !== path);
  storage.setItem(RECENT_DOCUMENTS_KEY, JSON.stringify(next));
  return next;
}
