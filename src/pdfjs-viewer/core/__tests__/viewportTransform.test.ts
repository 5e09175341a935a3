import { describe, expect, it } from "vitest";
import {
  clampRectToPage,
  clampZoom,
  createViewState,
  normalizeRect,
  stepZoom,
  toDocumentRect,
  toDocumentSpace,
  toScreenRect,
  toScreenSpace,
} from "../layout/viewportTransform";

const view = createViewState({
  pageSize: { width: 600, height: 800 },
  zoom: 1.5,
  scroll: { x: 10, y: 40 },
  pageOffset: { x: 16, y: 16 },
});

describe("toDocumentSpace / toScreenSpace", () => {
  it("maps viewport pixels through scroll, page offset and zoom", () => {
    expect(toDocumentSpace({ x: 156, y: 126 }, view)).toEqual({ x: 100, y: 100 });
    expect(toScreenSpace({ x: 100, y: 100 }, view)).toEqual({ x: 156, y: 126 });
  });

  it("round-trips points that lie on the page", () => {
    for (const zoom of [0.25, 0.5, 1, 1.75, 3]) {
      const v = { ...view, zoom };
      for (let x = 0; x <= 600; x += 75) {
        for (let y = 0; y <= 800; y += 100) {
          const screen = toScreenSpace({ x, y }, v);
          const back = toScreenSpace(toDocumentSpace(screen, v), v);
          expect(back.x).toBeCloseTo(screen.x, 9);
          expect(back.y).toBeCloseTo(screen.y, 9);
        }
      }
    }
  });

  it("clamps points outside the page to its edges", () => {
    expect(toDocumentSpace({ x: -500, y: -500 }, view)).toEqual({ x: 0, y: 0 });
    expect(toDocumentSpace({ x: 5000, y: 5000 }, view)).toEqual({ x: 600, y: 800 });
  });
});

describe("rect helpers", () => {
  it("normalizes a drag in any direction", () => {
    expect(normalizeRect({ x: 10, y: 20 }, { x: 4, y: 2 })).toEqual({ x: 4, y: 2, width: 6, height: 18 });
  });

  it("clamps a rect to the page", () => {
    expect(clampRectToPage({ x: -10, y: 790, width: 50, height: 50 }, { width: 600, height: 800 })).toEqual({
      x: 0,
      y: 790,
      width: 40,
      height: 10,
    });
  });

  it("converts between document and screen rects", () => {
    const screen = toScreenRect({ x: 100, y: 100, width: 20, height: 10 }, view);
    expect(screen).toEqual({ x: 156, y: 126, width: 30, height: 15 });
    expect(toDocumentRect(screen, view)).toEqual({ x: 100, y: 100, width: 20, height: 10 });
  });
});

describe("zoom", () => {
  it("clamps to the supported range", () => {
    expect(clampZoom(0.1)).toBe(0.25);
    expect(clampZoom(5)).toBe(3);
    expect(clampZoom(Number.NaN)).toBe(1);
  });

  it("steps in 25% increments from the nearest step", () => {
    expect(stepZoom(1, 1)).toBe(1.25);
    expect(stepZoom(1, -1)).toBe(0.75);
    expect(stepZoom(1.1, 1)).toBe(1.25);
    expect(stepZoom(3, 1)).toBe(3);
    expect(stepZoom(0.25, -1)).toBe(0.25);
  });
});
