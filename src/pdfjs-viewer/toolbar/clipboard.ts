import type { SystemClipboard } from "../core/model/types";

/** `navigator.clipboard` when the page may write to it (secure context), otherwise null. */
export function browserSystemClipboard(): SystemClipboard | null {
  if (typeof navigator === "undefined" || !navigator.clipboard) return null;
  const clipboard = navigator.clipboard;
  return { writeText: (text) => clipboard.writeText(text) };
}
