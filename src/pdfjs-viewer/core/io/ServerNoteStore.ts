import axios, { type AxiosInstance } from "axios";
import type { LinkKey, NoteDocument } from "../model/types";
import { normalizeLoadedNote, type NoteStore } from "./NoteStore";

function isNotFound(e: unknown): boolean {
  return axios.isAxiosError(e) && e.response?.status === 404;
}

function errorMessage(e: unknown): string {
  if (axios.isAxiosError(e)) {
    const data: unknown = e.response?.data;
    if (typeof data === "string" && data) return data;
    if (e.response) return `Save failed (${e.response.status})`;
    return e.message;
  }
  return e instanceof Error ? e.message : String(e);
}

/** Notes kept by the API server: `GET/PUT/HEAD /notes/{key}`. */
export class ServerNoteStore implements NoteStore {
  constructor(private client: AxiosInstance) {}

  async load(key: LinkKey): Promise<NoteDocument | null> {
    try {
      const res = await this.client.get<unknown>(`/notes/${key}`);
      return normalizeLoadedNote(res.data);
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
  }

  async save(key: LinkKey, doc: NoteDocument): Promise<void> {
    try {
      await this.client.put(`/notes/${key}`, doc, {
        headers: { "Content-Type": "application/json" },
      });
    } catch (e) {
      throw new Error(errorMessage(e));
    }
  }

  async has(key: LinkKey): Promise<boolean> {
    try {
      await this.client.head(`/notes/${key}`);
      return true;
    } catch (e) {
      if (isNotFound(e)) return false;
      throw e;
    }
  }
}
