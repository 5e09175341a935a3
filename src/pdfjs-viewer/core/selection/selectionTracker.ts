import type { DocPoint, DocRect, SelectionState } from "../model/types";
import { normalizeRect, rectArea } from "../layout/viewportTransform";

/** Square document units; anything smaller on pointer-up is treated as a click. */
export const MIN_SELECTION_AREA = 9;

export type SelectionEvent =
  | { type: "pointerDown"; point: DocPoint }
  | { type: "pointerMove"; point: DocPoint }
  | { type: "pointerUp"; point: DocPoint }
  | { type: "pageChanged" }
  | { type: "zoomChanged" }
  | { type: "clear" };

export type SelectionOptions = {
  minArea?: number;
};

export const IDLE_SELECTION: SelectionState = { kind: "idle" };

export function reduceSelection(
  state: SelectionState,
  event: SelectionEvent,
  options: SelectionOptions = {}
): SelectionState {
  const minArea = options.minArea ?? MIN_SELECTION_AREA;

  switch (event.type) {
    case "pointerDown":
      // a new press always restarts; a committed rect is discarded
      return { kind: "dragging", anchor: event.point, current: event.point };

    case "pointerMove":
      if (state.kind !== "dragging") return state;
      return { kind: "dragging", anchor: state.anchor, current: event.point };

    case "pointerUp": {
      if (state.kind !== "dragging") return state;
      const rect = normalizeRect(state.anchor, event.point);
      if (rectArea(rect) < minArea) return IDLE_SELECTION;
      return { kind: "committed", rect };
    }

    case "pageChanged":
      return state.kind === "idle" ? state : IDLE_SELECTION;

    case "zoomChanged":
      // committed rects are in document space and survive zoom; a live drag does not
      return state.kind === "dragging" ? IDLE_SELECTION : state;

    case "clear":
      return state.kind === "idle" ? state : IDLE_SELECTION;
  }
}

/** Rectangle to highlight: the live drag box, or the committed selection. */
export function liveSelectionRect(state: SelectionState): DocRect | null {
  if (state.kind === "dragging") return normalizeRect(state.anchor, state.current);
  if (state.kind === "committed") return state.rect;
  return null;
}

export function committedRect(state: SelectionState): DocRect | null {
  return state.kind === "committed" ? state.rect : null;
}
