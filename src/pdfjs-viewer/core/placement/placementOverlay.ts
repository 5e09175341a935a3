import type {
  Corner,
  ImagePayload,
  PlacementState,
  RasterImage,
  ScreenPoint,
  ScreenRect,
  Size,
} from "../model/types";

export const MIN_PLACEMENT_SIZE = 16;
export const MAX_INITIAL_SIZE = 400;
export const HANDLE_HIT_RADIUS = 8;

export const CORNERS: readonly Corner[] = ["topLeft", "topRight", "bottomLeft", "bottomRight"];

export type PlacementOptions = {
  minSize?: number;
  maxInitialSize?: number;
  handleRadius?: number;
};

export type PlacementEvent =
  | { type: "activate"; payload: ImagePayload; bounds: Size; at?: ScreenPoint }
  | { type: "pointerDown"; point: ScreenPoint }
  | { type: "pointerMove"; point: ScreenPoint }
  | { type: "pointerUp"; point: ScreenPoint }
  | { type: "surfaceResized"; bounds: Size }
  | { type: "confirm" }
  | { type: "cancel" };

export type PlacementEffect =
  | { kind: "commit"; payload: ImagePayload; size: Size; at: ScreenPoint }
  | { kind: "cancel" };

export type PlacementTransition = {
  state: PlacementState;
  effect: PlacementEffect | null;
};

export const INACTIVE_PLACEMENT: PlacementState = { kind: "inactive" };

type ActivePlacement = Extract<PlacementState, { kind: "active" }>;

function clamp(n: number, lo: number, hi: number): number {
  return Math.min(Math.max(lo, hi), Math.max(lo, n));
}

function effectiveMin(bounds: Size, minSize: number) {
  return {
    w: Math.max(1, Math.min(minSize, bounds.width)),
    h: Math.max(1, Math.min(minSize, bounds.height)),
  };
}

/** Native size, scaled down (aspect kept) to fit the initial box and the surface. */
export function initialPlacementRect(
  image: Pick<RasterImage, "width" | "height">,
  bounds: Size,
  at: ScreenPoint | undefined,
  options: PlacementOptions = {}
): ScreenRect {
  const minSize = options.minSize ?? MIN_PLACEMENT_SIZE;
  const maxInitial = options.maxInitialSize ?? MAX_INITIAL_SIZE;
  const min = effectiveMin(bounds, minSize);

  const w0 = Math.max(1, image.width);
  const h0 = Math.max(1, image.height);
  const maxW = Math.max(min.w, Math.min(maxInitial, bounds.width));
  const maxH = Math.max(min.h, Math.min(maxInitial, bounds.height));
  const scale = Math.min(1, maxW / w0, maxH / h0);

  const width = clamp(Math.round(w0 * scale), min.w, maxW);
  const height = clamp(Math.round(h0 * scale), min.h, maxH);

  const x = at ? at.x : Math.round((bounds.width - width) / 2);
  const y = at ? at.y : Math.round((bounds.height - height) / 2);
  return {
    x: clamp(x, 0, bounds.width - width),
    y: clamp(y, 0, bounds.height - height),
    width,
    height,
  };
}

export function cornerPoint(rect: ScreenRect, corner: Corner): ScreenPoint {
  const right = rect.x + rect.width;
  const bottom = rect.y + rect.height;
  switch (corner) {
    case "topLeft":
      return { x: rect.x, y: rect.y };
    case "topRight":
      return { x: right, y: rect.y };
    case "bottomLeft":
      return { x: rect.x, y: bottom };
    case "bottomRight":
      return { x: right, y: bottom };
  }
}

export type PlacementHit = { kind: "corner"; corner: Corner } | { kind: "body" } | { kind: "outside" };

/**
 * Corner handles win over the body; their hit zone reaches a little outside the rect.
 * On small rects the zone shrinks to a quarter of each side so the middle still moves.
 */
export function hitTestPlacement(rect: ScreenRect, point: ScreenPoint, radius = HANDLE_HIT_RADIUS): PlacementHit {
  const rx = Math.min(radius, rect.width / 4);
  const ry = Math.min(radius, rect.height / 4);
  for (const corner of CORNERS) {
    const c = cornerPoint(rect, corner);
    if (Math.abs(point.x - c.x) <= rx && Math.abs(point.y - c.y) <= ry) {
      return { kind: "corner", corner };
    }
  }
  const inside =
    point.x >= rect.x &&
    point.x <= rect.x + rect.width &&
    point.y >= rect.y &&
    point.y <= rect.y + rect.height;
  return inside ? { kind: "body" } : { kind: "outside" };
}

export function moveRect(origin: ScreenRect, dx: number, dy: number, bounds: Size): ScreenRect {
  return {
    x: clamp(origin.x + dx, 0, bounds.width - origin.width),
    y: clamp(origin.y + dy, 0, bounds.height - origin.height),
    width: origin.width,
    height: origin.height,
  };
}

/** Moves the two edges adjacent to `corner`; the opposite corner stays put. */
export function resizeRect(
  origin: ScreenRect,
  corner: Corner,
  dx: number,
  dy: number,
  bounds: Size,
  minSize = MIN_PLACEMENT_SIZE
): ScreenRect {
  const min = effectiveMin(bounds, minSize);
  let left = origin.x;
  let top = origin.y;
  let right = origin.x + origin.width;
  let bottom = origin.y + origin.height;

  if (corner === "topLeft" || corner === "bottomLeft") {
    left = clamp(left + dx, 0, right - min.w);
  } else {
    right = clamp(right + dx, left + min.w, bounds.width);
  }
  if (corner === "topLeft" || corner === "topRight") {
    top = clamp(top + dy, 0, bottom - min.h);
  } else {
    bottom = clamp(bottom + dy, top + min.h, bounds.height);
  }
  return { x: left, y: top, width: right - left, height: bottom - top };
}

function commit(state: ActivePlacement): PlacementTransition {
  return {
    state: INACTIVE_PLACEMENT,
    effect: {
      kind: "commit",
      payload: state.payload,
      size: {
        width: Math.max(1, Math.round(state.rect.width)),
        height: Math.max(1, Math.round(state.rect.height)),
      },
      at: { x: state.rect.x, y: state.rect.y },
    },
  };
}

export function reducePlacement(
  state: PlacementState,
  event: PlacementEvent,
  options: PlacementOptions = {}
): PlacementTransition {
  const unchanged: PlacementTransition = { state, effect: null };

  if (event.type === "activate") {
    // one overlay at a time
    if (state.kind === "active") return unchanged;
    const rect = initialPlacementRect(event.payload.image, event.bounds, event.at, options);
    return {
      state: {
        kind: "active",
        payload: event.payload,
        anchor: event.at ?? { x: rect.x, y: rect.y },
        rect,
        mode: { kind: "moving" },
        bounds: event.bounds,
        dragOrigin: null,
      },
      effect: null,
    };
  }

  if (state.kind !== "active") return unchanged;

  switch (event.type) {
    case "pointerDown": {
      const hit = hitTestPlacement(state.rect, event.point, options.handleRadius ?? HANDLE_HIT_RADIUS);
      if (hit.kind === "outside") return commit(state);
      return {
        state: {
          ...state,
          anchor: event.point,
          dragOrigin: state.rect,
          mode: hit.kind === "corner" ? { kind: "resizing", corner: hit.corner } : { kind: "moving" },
        },
        effect: null,
      };
    }

    case "pointerMove": {
      if (!state.dragOrigin) return unchanged;
      const dx = event.point.x - state.anchor.x;
      const dy = event.point.y - state.anchor.y;
      const rect =
        state.mode.kind === "resizing"
          ? resizeRect(state.dragOrigin, state.mode.corner, dx, dy, state.bounds, options.minSize)
          : moveRect(state.dragOrigin, dx, dy, state.bounds);
      return { state: { ...state, rect }, effect: null };
    }

    case "pointerUp":
      if (!state.dragOrigin) return unchanged;
      return { state: { ...state, dragOrigin: null, mode: { kind: "moving" } }, effect: null };

    case "surfaceResized": {
      const min = effectiveMin(event.bounds, options.minSize ?? MIN_PLACEMENT_SIZE);
      const width = clamp(state.rect.width, min.w, event.bounds.width);
      const height = clamp(state.rect.height, min.h, event.bounds.height);
      const rect = moveRect({ ...state.rect, width, height }, 0, 0, event.bounds);
      return { state: { ...state, rect, bounds: event.bounds, dragOrigin: null, mode: { kind: "moving" } }, effect: null };
    }

    case "confirm":
      return commit(state);

    case "cancel":
      return { state: INACTIVE_PLACEMENT, effect: { kind: "cancel" } };
  }
}
