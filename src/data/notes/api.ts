import axios from "axios";
import { config, type AppConfig } from "@/config";
import type { NoteStore } from "@/pdfjs-viewer/core/io/NoteStore";
import { LocalNoteStore, MemoryStorage, type KeyValueStorage } from "@/pdfjs-viewer/core/io/LocalNoteStore";
import { ServerNoteStore } from "@/pdfjs-viewer/core/io/ServerNoteStore";

export const api = axios.create({
  baseURL: config.apiBaseUrl,
  withCredentials: true,
});

export function browserStorage(): KeyValueStorage {
  return typeof localStorage !== "undefined" ? localStorage : new MemoryStorage();
}

export function createNoteStore(cfg: Pick<AppConfig, "notesBackend"> = config): NoteStore {
  return cfg.notesBackend === "server" ? new ServerNoteStore(api) : new LocalNoteStore(browserStorage());
}

export const noteStore: NoteStore = createNoteStore();

/** http(s) documents load directly; local paths are streamed by the API server. */
export function documentUrl(path: string, baseUrl: string = config.apiBaseUrl): string {
  const trimmed = path.trim();
  if (/^https?:\/\//i.test(trimmed)) return trimmed;
  return `${baseUrl}/documents/file?path=${encodeURIComponent(trimmed)}`;
}
