import { afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import type { LinkKey, NoteDocument } from "../model/types";
import { LocalNoteStore, MemoryStorage } from "../io/LocalNoteStore";
import { resolveLinkKey } from "../link/linkResolver";

const doc: NoteDocument = {
  sourcePath: "/home/reader/papers/paper.pdf",
  sourceName: "paper.pdf",
  content: "<p>Summary</p>",
  lastModified: "2026-01-02T03:04:05.000Z",
};

let key: LinkKey;

beforeAll(async () => {
  key = await resolveLinkKey(doc.sourcePath);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("LocalNoteStore", () => {
  it("saves, loads and reports existence under a prefixed key", async () => {
    const storage = new MemoryStorage();
    const store = new LocalNoteStore(storage);

    expect(await store.has(key)).toBe(false);
    expect(await store.load(key)).toBeNull();

    await store.save(key, doc);
    expect(await store.has(key)).toBe(true);
    expect(await store.load(key)).toEqual(doc);
    expect(storage.getItem(`notes:${key}`)).toBe(JSON.stringify(doc));
  });

  it("loads unreadable or malformed records as null", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const storage = new MemoryStorage();
    const store = new LocalNoteStore(storage, "n/");

    storage.setItem(`n/${key}`, "{not json");
    expect(await store.load(key)).toBeNull();

    storage.setItem(`n/${key}`, JSON.stringify({ sourcePath: "/a.pdf" }));
    expect(await store.load(key)).toBeNull();
  });

  it("fills in missing optional fields", async () => {
    const storage = new MemoryStorage();
    const store = new LocalNoteStore(storage);
    storage.setItem(`notes:${key}`, JSON.stringify({ sourcePath: "/a.pdf", content: "" }));
    expect(await store.load(key)).toEqual({
      sourcePath: "/a.pdf",
      sourceName: "/a.pdf",
      content: "",
      lastModified: "1970-01-01T00:00:00.000Z",
    });
  });

  it("turns a storage failure into a save error", async () => {
    const storage = new MemoryStorage();
    vi.spyOn(storage, "setItem").mockImplementation(() => {
      throw new Error("quota exceeded");
    });
    const store = new LocalNoteStore(storage);
    await expect(store.save(key, doc)).rejects.toThrow("Save failed: quota exceeded");
  });
});
