import type { RasterImage } from "../model/types";

export function createRaster(width: number, height: number, fill: [number, number, number, number] = [0, 0, 0, 0]): RasterImage {
  const w = Math.max(0, Math.floor(width));
  const h = Math.max(0, Math.floor(height));
  const data = new Uint8ClampedArray(w * h * 4);
  for (let i = 0; i < data.length; i += 4) data.set(fill, i);
  return { width: w, height: h, data };
}

/** Copies a pixel-aligned sub-rectangle out of an RGBA raster; the rectangle is clipped to the source. */
export function cropRaster(src: RasterImage, r: { x: number; y: number; width: number; height: number }): RasterImage {
  const x = Math.max(0, Math.min(src.width, Math.floor(r.x)));
  const y = Math.max(0, Math.min(src.height, Math.floor(r.y)));
  const width = Math.max(0, Math.min(src.width - x, Math.floor(r.width)));
  const height = Math.max(0, Math.min(src.height - y, Math.floor(r.height)));
  const data = new Uint8ClampedArray(width * height * 4);
  for (let row = 0; row < height; row++) {
    const from = ((y + row) * src.width + x) * 4;
    data.set(src.data.subarray(from, from + width * 4), row * width * 4);
  }
  return { width, height, data };
}

export function rasterToCanvas(raster: RasterImage, width = raster.width, height = raster.height): HTMLCanvasElement {
  const source = document.createElement("canvas");
  source.width = Math.max(1, raster.width);
  source.height = Math.max(1, raster.height);
  const sctx = source.getContext("2d");
  if (!sctx) throw new Error("Canvas 2D context unavailable");
  const img = sctx.createImageData(source.width, source.height);
  img.data.set(raster.data.subarray(0, img.data.length));
  sctx.putImageData(img, 0, 0);
  if (width === source.width && height === source.height) return source;

  const scaled = document.createElement("canvas");
  scaled.width = Math.max(1, Math.round(width));
  scaled.height = Math.max(1, Math.round(height));
  const ctx = scaled.getContext("2d");
  if (!ctx) throw new Error("Canvas 2D context unavailable");
  ctx.imageSmoothingQuality = "high";
  ctx.drawImage(source, 0, 0, scaled.width, scaled.height);
  return scaled;
}

/** PNG data URL of the raster scaled to width×height (used for images embedded in notes). */
export function rasterToDataUrl(raster: RasterImage, width = raster.width, height = raster.height): string {
  return rasterToCanvas(raster, width, height).toDataURL("image/png");
}
