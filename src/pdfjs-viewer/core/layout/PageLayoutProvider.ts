import type { Size } from "../model/types";

export type PageBox = {
  /** container scroll coordinates */
  x: number;
  y: number;
  width: number;
  height: number;
};

/**
 * Where the rendered page canvas sits in its scroll container's content.
 * Uses the real DOM position so it stays right after zoom/scroll; falls back
 * to the centered-with-padding formula before the page has a layout box.
 */
export function computePageBox(params: {
  container: HTMLElement;
  pageEl: HTMLElement | null;
  pageSize: Size;
  zoom: number;
  padding: number;
}): PageBox {
  const { container, pageEl, pageSize, zoom, padding } = params;
  const width = Math.max(1, pageSize.width * zoom);
  const height = Math.max(1, pageSize.height * zoom);

  if (pageEl) {
    const cr = container.getBoundingClientRect();
    const pr = pageEl.getBoundingClientRect();
    const x = pr.left - cr.left + container.scrollLeft;
    const y = pr.top - cr.top + container.scrollTop;
    if (Number.isFinite(x) && Number.isFinite(y) && pr.width > 0 && pr.height > 0) {
      return { x, y, width: pr.width, height: pr.height };
    }
  }

  const availableW = Math.max(1, container.clientWidth - padding * 2);
  const centerOffset = Math.max(0, (availableW - width) / 2);
  return { x: padding + centerOffset, y: padding, width, height };
}
