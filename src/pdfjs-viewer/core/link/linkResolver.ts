import type { LinkKey } from "../model/types";

const LINK_KEY_PATTERN = /^[0-9a-f]{64}$/;

function decodeFileUrl(raw: string): string {
  try {
    const url = new URL(raw);
    const path = decodeURIComponent(url.pathname);
    // file:///C:/docs/a.pdf → C:/docs/a.pdf
    return /^\/[A-Za-z]:\//.test(path) ? path.slice(1) : path;
  } catch {
    return raw.slice("file://".length);
  }
}

/**
 * Canonical form of an absolute document path, so the same file always maps to the same key.
 * Separators become `/`, `.`/`..` segments are resolved, duplicate and trailing slashes dropped,
 * and a Windows drive letter is lower-cased. http(s) URLs are kept as URLs minus the fragment.
 */
export function normalizeDocumentPath(path: string): string {
  const trimmed = String(path ?? "").trim();
  if (!trimmed) throw new Error("Invalid document path");

  if (/^https?:\/\//i.test(trimmed)) {
    try {
      const url = new URL(trimmed);
      url.hash = "";
      return url.toString();
    } catch {
      throw new Error("Invalid document path");
    }
  }

  let p = /^file:\/\//i.test(trimmed) ? decodeFileUrl(trimmed) : trimmed;
  p = p.replace(/\\/g, "/");

  let prefix = "";
  const drive = /^([A-Za-z]):(\/|$)/.exec(p);
  if (drive) {
    prefix = `${drive[1].toLowerCase()}:/`;
    p = p.slice(drive[0].length);
  } else if (p.startsWith("/")) {
    prefix = "/";
  }

  const out: string[] = [];
  for (const seg of p.split("/")) {
    if (!seg || seg === ".") continue;
    if (seg === "..") {
      if (out.length > 0 && out[out.length - 1] !== "..") out.pop();
      else if (!prefix) out.push("..");
      continue;
    }
    out.push(seg);
  }

  const joined = prefix + out.join("/");
  if (!joined) throw new Error("Invalid document path");
  return joined;
}

/** File name shown for a document ("paper.pdf"). */
export function documentName(path: string): string {
  const normalized = normalizeDocumentPath(path);
  const withoutQuery = normalized.replace(/[?#].*$/, "");
  const parts = withoutQuery.split("/").filter(Boolean);
  const last = parts[parts.length - 1] ?? normalized;
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

function toHex(buf: ArrayBuffer): string {
  return Array.from(new Uint8Array(buf), (b) => b.toString(16).padStart(2, "0")).join("");
}

/** SHA-256 of the normalized path. Same path → same key across runs. */
export async function resolveLinkKey(path: string): Promise<LinkKey> {
  const normalized = normalizeDocumentPath(path);
  const digest = await crypto.subtle.digest("SHA-256", new TextEncoder().encode(normalized));
  const hex = toHex(digest);
  if (!isLinkKey(hex)) throw new Error("Unexpected digest length");
  return hex;
}

export function isLinkKey(value: unknown): value is LinkKey {
  return typeof value === "string" && LINK_KEY_PATTERN.test(value);
}

/** `paper_1a2b3c4d5e6f.notes.json`: readable per-document notes file name. */
export function notesFileName(path: string, key: LinkKey): string {
  const stem = documentName(path).replace(/\.[^.]+$/, "") || "notes";
  return `${stem}_${key.slice(0, 12)}.notes.json`;
}
