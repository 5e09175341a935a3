import React, { useEffect, useRef } from "react";
import type { GestureCoordinator } from "@/pdfjs-viewer/core/engine/GestureCoordinator";
import type { PlacementState } from "@/pdfjs-viewer/core/model/types";
import { KonvaPlacementLayer } from "@/pdfjs-viewer/core/render/KonvaRenderer";
import { hitTestPlacement } from "@/pdfjs-viewer/core/placement/placementOverlay";
import { toLocalPoint } from "@/pdfjs-viewer/core/input/pointer";

export type PlacementOverlayViewProps = {
  coordinator: GestureCoordinator;
  placement: PlacementState;
};

const CURSORS = {
  topLeft: "nwse-resize",
  bottomRight: "nwse-resize",
  topRight: "nesw-resize",
  bottomLeft: "nesw-resize",
} as const;

/** Konva image proxy over the notes text area; takes pointer input only while a placement is active. */
export default function PlacementOverlayView({ coordinator, placement }: PlacementOverlayViewProps) {
  const hostRef = useRef<HTMLDivElement | null>(null);
  const layerRef = useRef<KonvaPlacementLayer | null>(null);
  const active = placement.kind === "active";

  useEffect(() => {
    const host = hostRef.current;
    if (!host) return;
    const size = { width: host.clientWidth, height: host.clientHeight };
    const layer = new KonvaPlacementLayer({ container: host, size });
    layerRef.current = layer;
    coordinator.resizeNotesSurface(size);
    const ro = new ResizeObserver(() => {
      const next = { width: host.clientWidth, height: host.clientHeight };
      layer.resize(next);
      coordinator.resizeNotesSurface(next);
    });
    ro.observe(host);
    return () => {
      ro.disconnect();
      layer.destroy();
      layerRef.current = null;
    };
  }, [coordinator]);

  useEffect(() => {
    layerRef.current?.render(placement);
  }, [placement]);

  const localPoint = (e: React.PointerEvent<HTMLDivElement>) =>
    toLocalPoint(e, e.currentTarget.getBoundingClientRect());

  const onPointerDown = (e: React.PointerEvent<HTMLDivElement>) => {
    if (e.button !== 0) return;
    if (coordinator.notesPointerDown(localPoint(e))) {
      e.preventDefault();
      if (coordinator.placementState.kind === "active") e.currentTarget.setPointerCapture(e.pointerId);
    }
  };

  const onPointerMove = (e: React.PointerEvent<HTMLDivElement>) => {
    const point = localPoint(e);
    if (coordinator.notesPointerMove(point)) return;
    const state = coordinator.placementState;
    if (state.kind !== "active") return;
    const hit = hitTestPlacement(state.rect, point);
    e.currentTarget.style.cursor =
      hit.kind === "corner" ? CURSORS[hit.corner] : hit.kind === "body" ? "move" : "default";
  };

  const onPointerUp = (e: React.PointerEvent<HTMLDivElement>) => {
    coordinator.notesPointerUp(localPoint(e));
    if (e.currentTarget.hasPointerCapture(e.pointerId)) e.currentTarget.releasePointerCapture(e.pointerId);
  };

  return (
    <div
      ref={hostRef}
      className="notes-placement-overlay"
      style={{ position: "absolute", inset: 0, pointerEvents: active ? "auto" : "none", zIndex: 5 }}
      onPointerDown={onPointerDown}
      onPointerMove={onPointerMove}
      onPointerUp={onPointerUp}
      onPointerCancel={onPointerUp}
    />
  );
}
