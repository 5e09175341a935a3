import { describe, expect, it } from "vitest";
import {
  documentName,
  isLinkKey,
  normalizeDocumentPath,
  notesFileName,
  resolveLinkKey,
} from "../link/linkResolver";

describe("normalizeDocumentPath", () => {
  it("canonicalizes separators, dot segments and drive letters", () => {
    expect(normalizeDocumentPath("C:\\Docs\\Papers\\..\\a.pdf")).toBe("c:/Docs/a.pdf");
    expect(normalizeDocumentPath("  /home/u//notes/./paper.pdf/ ")).toBe("/home/u/notes/paper.pdf");
  });

  it("decodes file URLs", () => {
    expect(normalizeDocumentPath("file:///home/u/My%20Paper.pdf")).toBe("/home/u/My Paper.pdf");
    expect(normalizeDocumentPath("file:///C:/docs/a.pdf")).toBe("c:/docs/a.pdf");
  });

  it("keeps web URLs without their fragment", () => {
    expect(normalizeDocumentPath("https://example.com/a.pdf#page=2")).toBe("https://example.com/a.pdf");
  });

  it("rejects blank paths", () => {
    expect(() => normalizeDocumentPath("   ")).toThrow("Invalid document path");
  });
});

describe("documentName", () => {
  it("returns the last path segment", () => {
    expect(documentName("/home/u/paper.pdf")).toBe("paper.pdf");
    expect(documentName("https://example.com/files/report.pdf?x=1")).toBe("report.pdf");
  });
});

describe("resolveLinkKey", () => {
  it("is the SHA-256 hex digest of the normalized path", async () => {
    const key = await resolveLinkKey("/home/reader/papers/paper.pdf");
    expect(key).toBe("7efc0b33c72ec350fc9bef68972f4d49635034c13d10f31f47b97672b4fe212b");
    expect(isLinkKey(key)).toBe(true);
  });

  it("gives equivalent spellings of a path the same key", async () => {
    const a = await resolveLinkKey("/home/reader/papers/paper.pdf");
    const b = await resolveLinkKey("/home/reader/./notes/../papers//paper.pdf");
    expect(b).toBe(a);
  });

  it("does not collide across many distinct paths", async () => {
    const paths = Array.from({ length: 10_000 }, (_, i) => `/library/shelf-${i % 37}/paper-${i}.pdf`);
    const keys = await Promise.all(paths.map((p) => resolveLinkKey(p)));
    expect(new Set(keys).size).toBe(paths.length);
    expect(keys.every(isLinkKey)).toBe(true);
  });

  it("rejects an empty path", async () => {
    await expect(resolveLinkKey("")).rejects.toThrow("Invalid document path");
  });
});

describe("notesFileName", () => {
  it("combines the document stem with a key prefix", async () => {
    const key = await resolveLinkKey("/home/reader/papers/paper.pdf");
    expect(notesFileName("/home/reader/papers/paper.pdf", key)).toBe("paper_7efc0b33c72e.notes.json");
  });
});
