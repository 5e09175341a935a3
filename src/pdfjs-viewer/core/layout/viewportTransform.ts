import type { DocPoint, DocRect, ScreenPoint, ScreenRect, Size, ViewState } from "../model/types";

export const MIN_ZOOM = 0.25;
export const MAX_ZOOM = 3;
export const ZOOM_STEP = 0.25;

export function clampZoom(zoom: number): number {
  if (!Number.isFinite(zoom)) return 1;
  return Math.min(MAX_ZOOM, Math.max(MIN_ZOOM, zoom));
}

/** Next zoom level in 25% steps (direction 1 = in, -1 = out). */
export function stepZoom(zoom: number, direction: 1 | -1): number {
  // snap first so a fractional zoom (e.g. from ctrl+wheel) lands back on the grid
  const snapped = Math.round(zoom / ZOOM_STEP) * ZOOM_STEP;
  return clampZoom(snapped + direction * ZOOM_STEP);
}

function clamp(n: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, n));
}

export function clampPointToPage(p: DocPoint, pageSize: Size): DocPoint {
  return {
    x: clamp(p.x, 0, Math.max(0, pageSize.width)),
    y: clamp(p.y, 0, Math.max(0, pageSize.height)),
  };
}

/**
 * Viewport (screen) px → document space of the displayed page.
 * Points outside the page clamp to the nearest page coordinate.
 */
export function toDocumentSpace(screen: ScreenPoint, view: ViewState): DocPoint {
  const zoom = clampZoom(view.zoom);
  const x = (screen.x + view.scroll.x - view.pageOffset.x) / zoom;
  const y = (screen.y + view.scroll.y - view.pageOffset.y) / zoom;
  return clampPointToPage({ x, y }, view.pageSize);
}

export function toScreenSpace(doc: DocPoint, view: ViewState): ScreenPoint {
  const zoom = clampZoom(view.zoom);
  return {
    x: doc.x * zoom + view.pageOffset.x - view.scroll.x,
    y: doc.y * zoom + view.pageOffset.y - view.scroll.y,
  };
}

/** Rectangle spanned by two corners, whatever the drag direction. */
export function normalizeRect(a: DocPoint, b: DocPoint): DocRect {
  return {
    x: Math.min(a.x, b.x),
    y: Math.min(a.y, b.y),
    width: Math.abs(a.x - b.x),
    height: Math.abs(a.y - b.y),
  };
}

export function rectArea(r: { width: number; height: number }): number {
  return Math.max(0, r.width) * Math.max(0, r.height);
}

export function clampRectToPage(rect: DocRect, pageSize: Size): DocRect {
  const tl = clampPointToPage({ x: rect.x, y: rect.y }, pageSize);
  const br = clampPointToPage({ x: rect.x + rect.width, y: rect.y + rect.height }, pageSize);
  return normalizeRect(tl, br);
}

export function toScreenRect(rect: DocRect, view: ViewState): ScreenRect {
  const zoom = clampZoom(view.zoom);
  const tl = toScreenSpace({ x: rect.x, y: rect.y }, view);
  return { x: tl.x, y: tl.y, width: rect.width * zoom, height: rect.height * zoom };
}

export function toDocumentRect(rect: ScreenRect, view: ViewState): DocRect {
  const a = toDocumentSpace({ x: rect.x, y: rect.y }, view);
  const b = toDocumentSpace({ x: rect.x + rect.width, y: rect.y + rect.height }, view);
  return normalizeRect(a, b);
}

export function createViewState(params: {
  pageSize: Size;
  pageIndex?: number;
  zoom?: number;
  scroll?: { x: number; y: number };
  pageOffset?: { x: number; y: number };
}): ViewState {
  return {
    pageIndex: Math.max(0, Math.floor(params.pageIndex ?? 0)),
    zoom: clampZoom(params.zoom ?? 1),
    scroll: params.scroll ?? { x: 0, y: 0 },
    pageSize: params.pageSize,
    pageOffset: params.pageOffset ?? { x: 0, y: 0 },
  };
}
