import { describe, expect, it } from "vitest";
import { LocalNoteStore } from "@/pdfjs-viewer/core/io/LocalNoteStore";
import { ServerNoteStore } from "@/pdfjs-viewer/core/io/ServerNoteStore";
import { createNoteStore, documentUrl } from "../api";

describe("documentUrl", () => {
  it("passes http(s) URLs through", () => {
    expect(documentUrl("  https://example.test/paper.pdf ", "http://api.test")).toBe("https://example.test/paper.pdf");
  });

  it("streams local paths from the API server", () => {
    expect(documentUrl("/home/reader/my paper.pdf", "http://api.test")).toBe(
      "http://api.test/documents/file?path=%2Fhome%2Freader%2Fmy%20paper.pdf"
    );
  });
});

describe("createNoteStore", () => {
  it("picks the configured backend", () => {
    expect(createNoteStore({ notesBackend: "local" })).toBeInstanceOf(LocalNoteStore);
    expect(createNoteStore({ notesBackend: "server" })).toBeInstanceOf(ServerNoteStore);
  });
});
