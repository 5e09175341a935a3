import type { ScreenPoint } from "../model/types";

export type PointerKind = "mouse" | "touch" | "pen" | "unknown";

type PointerLike = { pointerType?: string };

export function getPointerKind(evt: PointerLike | null | undefined): PointerKind {
  const pt = String(evt?.pointerType || "").toLowerCase();
  if (pt === "mouse") return "mouse";
  if (pt === "touch") return "touch";
  if (pt === "pen") return "pen";
  return "unknown";
}

export function isTouchPointer(evt: PointerLike | null | undefined): boolean {
  return getPointerKind(evt) === "touch";
}

/** Primary button only; touch is reserved for native scrolling. */
export function isSelectionPointer(evt: PointerLike & { button?: number }): boolean {
  if (isTouchPointer(evt)) return false;
  return (evt.button ?? 0) === 0;
}

/** Client coordinates → coordinates relative to an element's visible box. */
export function toLocalPoint(
  evt: { clientX: number; clientY: number },
  box: { left: number; top: number }
): ScreenPoint {
  return { x: evt.clientX - box.left, y: evt.clientY - box.top };
}
