import React, { useCallback, useEffect, useRef } from "react";
import type { GestureCoordinator } from "@/pdfjs-viewer/core/engine/GestureCoordinator";
import type { SelectionState, ViewState } from "@/pdfjs-viewer/core/model/types";
import type { PdfJsDocumentRenderer } from "@/pdfjs-viewer/core/render/PdfJsDocumentRenderer";
import { KonvaSelectionLayer } from "@/pdfjs-viewer/core/render/KonvaRenderer";
import { computePageBox } from "@/pdfjs-viewer/core/layout/PageLayoutProvider";
import { toScreenRect } from "@/pdfjs-viewer/core/layout/viewportTransform";
import { liveSelectionRect } from "@/pdfjs-viewer/core/selection/selectionTracker";
import { isSelectionPointer, toLocalPoint } from "@/pdfjs-viewer/core/input/pointer";

const PAGE_PADDING = 16;

const PDF_PAGE_VIEW_CSS = `
.pdf-page-view{position:relative;flex:1 1 auto;min-height:0;background:#e5e7eb}
.pdf-page-scroll{position:absolute;inset:0;overflow:auto;overscroll-behavior:contain;cursor:crosshair;touch-action:pan-x pan-y}
.pdf-page-content{display:flex;justify-content:center;align-items:flex-start;padding:${PAGE_PADDING}px;min-width:min-content}
.pdf-page-canvas{display:block;background:#fff;box-shadow:0 2px 10px rgba(0,0,0,.18)}
.pdf-page-overlay{position:absolute;inset:0;pointer-events:none;overflow:hidden}
`;

export type PdfPageViewProps = {
  renderer: PdfJsDocumentRenderer | null;
  coordinator: GestureCoordinator;
  view: ViewState | null;
  selection: SelectionState;
};

function isCancelledRender(e: unknown): boolean {
  return e instanceof Error && e.name === "RenderingCancelledException";
}

export default function PdfPageView({ renderer, coordinator, view, selection }: PdfPageViewProps) {
  const scrollRef = useRef<HTMLDivElement | null>(null);
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const overlayRef = useRef<HTMLDivElement | null>(null);
  const layerRef = useRef<KonvaSelectionLayer | null>(null);

  const pageIndex = view?.pageIndex ?? -1;
  const zoom = view?.zoom ?? 1;

  const syncLayout = useCallback(() => {
    const container = scrollRef.current;
    const v = coordinator.viewState;
    if (!container || !v) return;
    const box = computePageBox({
      container,
      pageEl: canvasRef.current,
      pageSize: v.pageSize,
      zoom: v.zoom,
      padding: PAGE_PADDING,
    });
    coordinator.setPageOffset({ x: box.x, y: box.y });
    coordinator.setScroll({ x: container.scrollLeft, y: container.scrollTop });
  }, [coordinator]);

  // page canvas
  useEffect(() => {
    const canvas = canvasRef.current;
    if (!renderer || !canvas || pageIndex < 0) return;
    let cancelled = false;
    const handle = renderer.renderPageToCanvas(pageIndex, zoom, canvas, window.devicePixelRatio || 1);
    handle.promise
      .then(() => {
        if (!cancelled) syncLayout();
      })
      .catch((e: unknown) => {
        if (!isCancelledRender(e)) console.error("Failed to render page", e);
      });
    return () => {
      cancelled = true;
      handle.cancel();
    };
  }, [renderer, pageIndex, zoom, syncLayout]);

  // selection overlay stage, sized to the visible viewport
  useEffect(() => {
    const overlay = overlayRef.current;
    const container = scrollRef.current;
    if (!overlay || !container) return;
    const layer = new KonvaSelectionLayer({
      container: overlay,
      size: { width: container.clientWidth, height: container.clientHeight },
    });
    layerRef.current = layer;
    const ro = new ResizeObserver(() => {
      layer.resize({ width: container.clientWidth, height: container.clientHeight });
      syncLayout();
    });
    ro.observe(container);
    return () => {
      ro.disconnect();
      layer.destroy();
      layerRef.current = null;
    };
  }, [syncLayout]);

  useEffect(() => {
    const rect = liveSelectionRect(selection);
    layerRef.current?.show(rect && view ? toScreenRect(rect, view) : null);
  }, [selection, view]);

  // Ctrl+wheel zoom needs a non-passive listener
  useEffect(() => {
    const container = scrollRef.current;
    if (!container) return;
    const onWheel = (e: WheelEvent) => {
      if (!e.ctrlKey) return;
      e.preventDefault();
      if (e.deltaY < 0) coordinator.zoomIn();
      else if (e.deltaY > 0) coordinator.zoomOut();
    };
    container.addEventListener("wheel", onWheel, { passive: false });
    return () => container.removeEventListener("wheel", onWheel);
  }, [coordinator]);

  const localPoint = (e: React.PointerEvent<HTMLDivElement>) =>
    toLocalPoint(e, e.currentTarget.getBoundingClientRect());

  const onPointerDown = (e: React.PointerEvent<HTMLDivElement>) => {
    if (!isSelectionPointer(e)) return;
    syncLayout();
    if (coordinator.pagePointerDown(localPoint(e))) {
      e.currentTarget.setPointerCapture(e.pointerId);
      e.preventDefault();
    }
  };

  const onPointerMove = (e: React.PointerEvent<HTMLDivElement>) => {
    coordinator.pagePointerMove(localPoint(e));
  };

  const onPointerUp = (e: React.PointerEvent<HTMLDivElement>) => {
    if (coordinator.pagePointerUp(localPoint(e)) && e.currentTarget.hasPointerCapture(e.pointerId)) {
      e.currentTarget.releasePointerCapture(e.pointerId);
    }
  };

  return (
    <div className="pdf-page-view">
      <style>{PDF_PAGE_VIEW_CSS}</style>
      <div
        ref={scrollRef}
        className="pdf-page-scroll"
        onScroll={syncLayout}
        onPointerDown={onPointerDown}
        onPointerMove={onPointerMove}
        onPointerUp={onPointerUp}
        onPointerCancel={onPointerUp}
      >
        <div className="pdf-page-content">
          <canvas ref={canvasRef} className="pdf-page-canvas" />
        </div>
      </div>
      <div ref={overlayRef} className="pdf-page-overlay" />
    </div>
  );
}
