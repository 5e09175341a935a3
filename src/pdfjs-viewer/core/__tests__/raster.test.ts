import { describe, expect, it } from "vitest";
import type { RasterImage } from "../model/types";
import { createRaster, cropRaster } from "../render/raster";

/** 4×3 raster whose red channel is the pixel index. */
function indexed(): RasterImage {
  const img = createRaster(4, 3);
  for (let i = 0; i < 12; i++) img.data[i * 4] = i;
  return img;
}

function reds(img: RasterImage): number[] {
  const out: number[] = [];
  for (let i = 0; i < img.width * img.height; i++) out.push(img.data[i * 4] ?? -1);
  return out;
}

describe("createRaster", () => {
  it("fills every pixel", () => {
    const img = createRaster(2, 2, [1, 2, 3, 255]);
    expect(Array.from(img.data)).toEqual([1, 2, 3, 255, 1, 2, 3, 255, 1, 2, 3, 255, 1, 2, 3, 255]);
  });
});

describe("cropRaster", () => {
  it("copies the requested rows and columns", () => {
    const out = cropRaster(indexed(), { x: 1, y: 1, width: 2, height: 2 });
    expect(out.width).toBe(2);
    expect(out.height).toBe(2);
    expect(reds(out)).toEqual([5, 6, 9, 10]);
  });

  it("clips to the source", () => {
    const out = cropRaster(indexed(), { x: 3, y: 2, width: 5, height: 5 });
    expect(out.width).toBe(1);
    expect(out.height).toBe(1);
    expect(reds(out)).toEqual([11]);
  });
});
