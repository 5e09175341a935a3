import { useEffect, useMemo, useRef, useState } from "react";
import { GestureCoordinator } from "@/pdfjs-viewer/core/engine/GestureCoordinator";
import { INACTIVE_PLACEMENT } from "@/pdfjs-viewer/core/placement/placementOverlay";
import { IDLE_SELECTION } from "@/pdfjs-viewer/core/selection/selectionTracker";
import { browserSystemClipboard } from "@/pdfjs-viewer/toolbar/clipboard";
import type {
  ClipboardPayload,
  PlacementState,
  RichTextSurface,
  SelectionState,
  ViewState,
} from "@/pdfjs-viewer/core/model/types";

export type GestureSnapshot = {
  view: ViewState | null;
  selection: SelectionState;
  placement: PlacementState;
  clipboard: ClipboardPayload | null;
  status: string;
};

/**
 * One coordinator per reader. The notes editor mounts after the coordinator is
 * created, so the coordinator talks to it through a surface that forwards to the ref.
 */
export function useGestureCoordinator() {
  const surfaceRef = useRef<RichTextSurface | null>(null);

  const coordinator = useMemo(() => {
    const requireSurface = (): RichTextSurface => {
      const s = surfaceRef.current;
      if (!s) throw new Error("Notes editor is not ready");
      return s;
    };
    return new GestureCoordinator({
      surface: {
        insertTextAtCursor: (text) => requireSurface().insertTextAtCursor(text),
        insertImageAtCursor: (image, w, h) => requireSurface().insertImageAtCursor(image, w, h),
        placeCursorAt: (point) => surfaceRef.current?.placeCursorAt?.(point),
      },
      systemClipboard: browserSystemClipboard(),
    });
  }, []);

  const [snapshot, setSnapshot] = useState<GestureSnapshot>({
    view: null,
    selection: IDLE_SELECTION,
    placement: INACTIVE_PLACEMENT,
    clipboard: null,
    status: "",
  });

  useEffect(() => {
    const offs = [
      coordinator.on("viewChanged", (view) => setSnapshot((s) => ({ ...s, view }))),
      coordinator.on("selectionChanged", (selection) => setSnapshot((s) => ({ ...s, selection }))),
      coordinator.on("placementChanged", (placement) => setSnapshot((s) => ({ ...s, placement }))),
      coordinator.on("clipboardChanged", (clipboard) => setSnapshot((s) => ({ ...s, clipboard }))),
      coordinator.on("status", (status) => setSnapshot((s) => ({ ...s, status }))),
    ];
    return () => offs.forEach((off) => off());
  }, [coordinator]);

  useEffect(() => () => coordinator.destroy(), [coordinator]);

  return { coordinator, surfaceRef, ...snapshot };
}
