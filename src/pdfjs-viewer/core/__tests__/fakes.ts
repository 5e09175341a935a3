import { vi } from "vitest";
import type { DocRect, DocumentRenderer, RasterImage, ScreenPoint, Size } from "../model/types";
import { createRaster } from "../render/raster";

export class FakeRenderer implements DocumentRenderer {
  constructor(
    public pageCount = 2,
    private size: Size = { width: 600, height: 800 }
  ) {}

  getPageSize(pageIndex: number): Size {
    if (pageIndex < 0 || pageIndex >= this.pageCount) throw new Error(`Page ${pageIndex + 1} out of range`);
    return this.size;
  }

  renderPage = vi.fn(async (_pageIndex: number, zoom: number): Promise<RasterImage> =>
    createRaster(this.size.width * zoom, this.size.height * zoom)
  );

  extractText = vi.fn(async (_pageIndex: number, _rect: DocRect): Promise<string> => "Hello");

  rasterizeRegion = vi.fn(
    async (_pageIndex: number, rect: DocRect, zoom: number): Promise<RasterImage> =>
      createRaster(rect.width * zoom, rect.height * zoom, [255, 0, 0, 255])
  );
}

export function fakeSurface() {
  return {
    insertTextAtCursor: vi.fn((_text: string) => {}),
    insertImageAtCursor: vi.fn((_image: RasterImage, _width: number, _height: number) => {}),
    placeCursorAt: vi.fn((_point: ScreenPoint) => {}),
  };
}

/** A promise plus the function that settles it, for holding an async call open. */
export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
