import type { InteractionMode } from "../core/engine/GestureCoordinator";

export type ShortcutAction =
  | "copyText"
  | "captureScreenshot"
  | "paste"
  | "save"
  | "confirmPlacement"
  | "cancelPlacement"
  | "clearSelection"
  | "previousPage"
  | "nextPage"
  | "zoomIn"
  | "zoomOut";

export type KeyLike = {
  key: string;
  ctrlKey?: boolean;
  metaKey?: boolean;
  altKey?: boolean;
};

/** Where keyboard focus is: the notes body, some other text field, or anywhere else. */
export type FocusArea = "page" | "notes" | "field";

export type ShortcutContext = {
  mode: InteractionMode;
  focus: FocusArea;
  /** something is on the capture clipboard */
  canPaste: boolean;
};

export const KEY_BINDINGS: ReadonlyArray<{ keys: string; description: string }> = [
  { keys: "Drag on page", description: "Select a region" },
  { keys: "C", description: "Copy text in the selected region" },
  { keys: "S", description: "Capture the selected region as an image" },
  { keys: "P", description: "Paste the captured text or image into the notes" },
  { keys: "Enter", description: "Place the image" },
  { keys: "Esc", description: "Cancel image placement, or clear the selection" },
  { keys: "← / PageUp", description: "Previous page" },
  { keys: "→ / PageDown", description: "Next page" },
  { keys: "Ctrl + wheel, + / −", description: "Zoom" },
  { keys: "Ctrl + S", description: "Save notes" },
];

/**
 * Maps a key press to a reader action. While an image is being placed only
 * Enter and Escape do anything. In the notes body a plain P pastes when there is
 * something to paste and types otherwise; other text fields only give up Ctrl+S.
 */
export function shortcutFor(e: KeyLike, ctx: ShortcutContext): ShortcutAction | null {
  if (ctx.mode === "placement") {
    if (e.key === "Enter") return "confirmPlacement";
    if (e.key === "Escape") return "cancelPlacement";
    return null;
  }
  if (e.altKey) return null;

  const isMod = Boolean(e.ctrlKey || e.metaKey);
  if (isMod && (e.key === "s" || e.key === "S")) return "save";
  if (ctx.focus === "notes") {
    return !isMod && ctx.canPaste && (e.key === "p" || e.key === "P") ? "paste" : null;
  }
  if (ctx.focus === "field") return null;
  if (isMod) {
    if (e.key === "+" || e.key === "=") return "zoomIn";
    if (e.key === "-") return "zoomOut";
    return null;
  }

  switch (e.key) {
    case "c":
    case "C":
      return "copyText";
    case "s":
    case "S":
      return "captureScreenshot";
    case "p":
    case "P":
      return "paste";
    case "ArrowLeft":
    case "PageUp":
      return "previousPage";
    case "ArrowRight":
    case "PageDown":
      return "nextPage";
    case "+":
    case "=":
      return "zoomIn";
    case "-":
      return "zoomOut";
    case "Escape":
      return "clearSelection";
    default:
      return null;
  }
}
