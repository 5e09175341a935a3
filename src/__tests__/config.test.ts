import { describe, expect, it } from "vitest";
import { DEFAULT_API_BASE_URL, readConfig } from "../config";

describe("readConfig", () => {
  it("falls back to defaults", () => {
    expect(readConfig({})).toEqual({
      apiBaseUrl: DEFAULT_API_BASE_URL,
      notesBackend: "local",
      autosaveMs: 30_000,
    });
  });

  it("reads the environment", () => {
    expect(
      readConfig({
        VITE_API_BASE_URL: "https://notes.example.test/api//",
        VITE_NOTES_BACKEND: "server",
        VITE_AUTOSAVE_MS: "5000",
      })
    ).toEqual({
      apiBaseUrl: "https://notes.example.test/api",
      notesBackend: "server",
      autosaveMs: 5000,
    });
  });

  it("ignores unusable autosave intervals and unknown backends", () => {
    expect(readConfig({ VITE_AUTOSAVE_MS: "soon", VITE_NOTES_BACKEND: "s3" })).toMatchObject({
      notesBackend: "local",
      autosaveMs: 30_000,
    });
    expect(readConfig({ VITE_AUTOSAVE_MS: "-1" }).autosaveMs).toBe(30_000);
  });
});
