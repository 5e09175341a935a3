import { describe, expect, it } from "vitest";
import type { ImagePayload, PlacementState } from "../model/types";
import { createRaster } from "../render/raster";
import {
  INACTIVE_PLACEMENT,
  hitTestPlacement,
  initialPlacementRect,
  reducePlacement,
  type PlacementEvent,
  type PlacementOptions,
  type PlacementTransition,
} from "../placement/placementOverlay";

const bounds = { width: 800, height: 600 };
const payload: ImagePayload = { kind: "image", image: createRaster(100, 50) };

function activate(opts: PlacementOptions = {}): PlacementState {
  return reducePlacement(INACTIVE_PLACEMENT, { type: "activate", payload, bounds }, opts).state;
}

function apply(state: PlacementState, events: PlacementEvent[], opts: PlacementOptions = {}): PlacementTransition {
  let t: PlacementTransition = { state, effect: null };
  for (const e of events) t = reducePlacement(t.state, e, opts);
  return t;
}

function rectOf(state: PlacementState) {
  return state.kind === "active" ? state.rect : null;
}

describe("initialPlacementRect", () => {
  it("centers the native size on the surface", () => {
    expect(initialPlacementRect({ width: 100, height: 50 }, bounds, undefined)).toEqual({
      x: 350,
      y: 275,
      width: 100,
      height: 50,
    });
  });

  it("scales large images down keeping the aspect ratio", () => {
    expect(initialPlacementRect({ width: 1000, height: 500 }, bounds, undefined)).toEqual({
      x: 200,
      y: 200,
      width: 400,
      height: 200,
    });
  });

  it("never starts below the minimum size", () => {
    expect(initialPlacementRect({ width: 4, height: 4 }, bounds, undefined)).toEqual({
      x: 392,
      y: 292,
      width: 16,
      height: 16,
    });
  });

  it("keeps an anchored rect inside the surface", () => {
    expect(initialPlacementRect({ width: 100, height: 50 }, bounds, { x: 780, y: 590 })).toEqual({
      x: 700,
      y: 550,
      width: 100,
      height: 50,
    });
  });
});

describe("hitTestPlacement", () => {
  const rect = { x: 350, y: 275, width: 100, height: 50 };

  it("prefers corner handles, then the body", () => {
    expect(hitTestPlacement(rect, { x: 450, y: 325 })).toEqual({ kind: "corner", corner: "bottomRight" });
    expect(hitTestPlacement(rect, { x: 344, y: 270 })).toEqual({ kind: "corner", corner: "topLeft" });
    expect(hitTestPlacement(rect, { x: 400, y: 300 })).toEqual({ kind: "body" });
    expect(hitTestPlacement(rect, { x: 100, y: 100 })).toEqual({ kind: "outside" });
  });

  it("leaves the middle of a minimum-size image movable", () => {
    const small = { x: 100, y: 100, width: 16, height: 16 };
    expect(hitTestPlacement(small, { x: 108, y: 108 })).toEqual({ kind: "body" });
    expect(hitTestPlacement(small, { x: 106, y: 100 })).toEqual({ kind: "body" });
    expect(hitTestPlacement(small, { x: 101, y: 101 })).toEqual({ kind: "corner", corner: "topLeft" });
    expect(hitTestPlacement(small, { x: 116, y: 116 })).toEqual({ kind: "corner", corner: "bottomRight" });
  });
});

describe("reducePlacement", () => {
  it("resizes from the bottom-right corner and stays active after the drag", () => {
    const { state, effect } = apply(activate(), [
      { type: "pointerDown", point: { x: 450, y: 325 } },
      { type: "pointerMove", point: { x: 470, y: 335 } },
      { type: "pointerUp", point: { x: 470, y: 335 } },
    ]);
    expect(effect).toBeNull();
    expect(state.kind).toBe("active");
    if (state.kind !== "active") return;
    expect(state.rect).toEqual({ x: 350, y: 275, width: 120, height: 60 });
    expect(state.mode).toEqual({ kind: "moving" });
    expect(state.dragOrigin).toBeNull();
  });

  it("moves with the pointer and stops at the surface edge", () => {
    const moved = apply(activate(), [
      { type: "pointerDown", point: { x: 400, y: 300 } },
      { type: "pointerMove", point: { x: 420, y: 290 } },
    ]);
    expect(rectOf(moved.state)).toEqual({ x: 370, y: 265, width: 100, height: 50 });

    const pinned = apply(moved.state, [{ type: "pointerMove", point: { x: 1000, y: 1000 } }]);
    expect(rectOf(pinned.state)).toEqual({ x: 700, y: 550, width: 100, height: 50 });
  });

  it("keeps the opposite corner fixed and enforces the minimum size", () => {
    const { state } = apply(activate(), [
      { type: "pointerDown", point: { x: 350, y: 275 } },
      { type: "pointerMove", point: { x: 500, y: 400 } },
    ]);
    expect(rectOf(state)).toEqual({ x: 434, y: 309, width: 16, height: 16 });
  });

  it("clamps resized edges to the surface", () => {
    const { state } = apply(activate(), [
      { type: "pointerDown", point: { x: 450, y: 325 } },
      { type: "pointerMove", point: { x: 2000, y: 2000 } },
    ]);
    expect(rectOf(state)).toEqual({ x: 350, y: 275, width: 450, height: 325 });
  });

  it("commits on a press outside the image", () => {
    const { state, effect } = apply(activate(), [{ type: "pointerDown", point: { x: 10, y: 10 } }]);
    expect(state).toEqual({ kind: "inactive" });
    expect(effect).toEqual({ kind: "commit", payload, size: { width: 100, height: 50 }, at: { x: 350, y: 275 } });
  });

  it("moves a minimum-size image from its middle", () => {
    const tiny: ImagePayload = { kind: "image", image: createRaster(16, 16) };
    const start = reducePlacement(INACTIVE_PLACEMENT, { type: "activate", payload: tiny, bounds }).state;
    expect(rectOf(start)).toEqual({ x: 392, y: 292, width: 16, height: 16 });

    const { state } = apply(start, [
      { type: "pointerDown", point: { x: 400, y: 300 } },
      { type: "pointerMove", point: { x: 410, y: 305 } },
    ]);
    expect(state.kind === "active" && state.mode).toEqual({ kind: "moving" });
    expect(rectOf(state)).toEqual({ x: 402, y: 297, width: 16, height: 16 });
  });

  it("cancels without committing", () => {
    const { state, effect } = apply(activate(), [{ type: "cancel" }]);
    expect(state).toEqual({ kind: "inactive" });
    expect(effect).toEqual({ kind: "cancel" });
  });

  it("rejects a second activation while active", () => {
    const active = activate();
    const other: ImagePayload = { kind: "image", image: createRaster(10, 10) };
    const t = reducePlacement(active, { type: "activate", payload: other, bounds });
    expect(t.state).toBe(active);
    expect(t.effect).toBeNull();
  });

  it("ignores pointer and key events while inactive", () => {
    for (const e of [
      { type: "pointerDown", point: { x: 1, y: 1 } },
      { type: "confirm" },
      { type: "cancel" },
    ] satisfies PlacementEvent[]) {
      const t = reducePlacement(INACTIVE_PLACEMENT, e);
      expect(t.state).toBe(INACTIVE_PLACEMENT);
      expect(t.effect).toBeNull();
    }
  });

  it("pulls the image back inside when the surface shrinks", () => {
    const { state } = apply(activate(), [{ type: "surfaceResized", bounds: { width: 300, height: 200 } }]);
    expect(rectOf(state)).toEqual({ x: 200, y: 150, width: 100, height: 50 });
  });
});
