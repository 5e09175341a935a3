import * as pdfjsLib from "pdfjs-dist";
import type { PDFDocumentProxy, PDFPageProxy } from "pdfjs-dist";
import type { TextItem, TextMarkedContent } from "pdfjs-dist/types/src/display/api";
import workerUrl from "pdfjs-dist/build/pdf.worker.min.mjs?url";
import type { DocRect, DocumentRenderer, RasterImage, Size } from "../model/types";
import { clampZoom } from "../layout/viewportTransform";
import { collectTextInRect, textItemBox, type PositionedText } from "../text/textInRect";
import { cropRaster } from "./raster";

if (typeof window !== "undefined") {
  pdfjsLib.GlobalWorkerOptions.workerSrc = workerUrl;
}

export type PageRenderHandle = {
  promise: Promise<void>;
  cancel: () => void;
};

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return "str" in item;
}

function createCanvas(width: number, height: number): HTMLCanvasElement {
  const canvas = document.createElement("canvas");
  canvas.width = Math.max(1, Math.round(width));
  canvas.height = Math.max(1, Math.round(height));
  return canvas;
}

function get2d(canvas: HTMLCanvasElement): CanvasRenderingContext2D {
  const ctx = canvas.getContext("2d", { willReadFrequently: true });
  if (!ctx) throw new Error("Canvas 2D context unavailable");
  return ctx;
}

/**
 * pdf.js backed page source: page canvases for the viewer, text extraction within a
 * document-space rectangle and region rasterization at the current zoom.
 */
export class PdfJsDocumentRenderer implements DocumentRenderer {
  private textCache: Map<number, PositionedText[]> = new Map();

  private constructor(
    private pdfDocument: PDFDocumentProxy,
    private pages: PDFPageProxy[],
    private pageSizes: Size[]
  ) {}

  static async open(url: string, opts: { httpHeaders?: Record<string, string> } = {}): Promise<PdfJsDocumentRenderer> {
    const task = pdfjsLib.getDocument({
      url,
      httpHeaders: opts.httpHeaders,
      withCredentials: true,
      rangeChunkSize: 1024 * 1024,
    });
    const pdfDocument = await task.promise;
    try {
      const pages = await Promise.all(
        Array.from({ length: pdfDocument.numPages }, (_, i) => pdfDocument.getPage(i + 1))
      );
      const sizes = pages.map((p) => {
        const vp = p.getViewport({ scale: 1 });
        return { width: vp.width, height: vp.height };
      });
      return new PdfJsDocumentRenderer(pdfDocument, pages, sizes);
    } catch (e) {
      await pdfDocument.destroy();
      throw e;
    }
  }

  get pageCount(): number {
    return this.pages.length;
  }

  getPageSize(pageIndex: number): Size {
    const size = this.pageSizes[pageIndex];
    if (!size) throw new Error(`Page ${pageIndex + 1} out of range`);
    return size;
  }

  private getPage(pageIndex: number): PDFPageProxy {
    const page = this.pages[pageIndex];
    if (!page) throw new Error(`Page ${pageIndex + 1} out of range`);
    return page;
  }

  /** Draws a page into a visible canvas; `pixelRatio` sharpens output on HiDPI screens. */
  renderPageToCanvas(pageIndex: number, zoom: number, canvas: HTMLCanvasElement, pixelRatio = 1): PageRenderHandle {
    const page = this.getPage(pageIndex);
    const scale = clampZoom(zoom);
    const viewport = page.getViewport({ scale: scale * pixelRatio });
    canvas.width = Math.max(1, Math.floor(viewport.width));
    canvas.height = Math.max(1, Math.floor(viewport.height));
    canvas.style.width = `${Math.floor(viewport.width / pixelRatio)}px`;
    canvas.style.height = `${Math.floor(viewport.height / pixelRatio)}px`;
    const task = page.render({ canvasContext: get2d(canvas), viewport });
    return { promise: task.promise, cancel: () => task.cancel() };
  }

  async renderPage(pageIndex: number, zoom: number): Promise<RasterImage> {
    const page = this.getPage(pageIndex);
    const viewport = page.getViewport({ scale: clampZoom(zoom) });
    const canvas = createCanvas(viewport.width, viewport.height);
    const ctx = get2d(canvas);
    await page.render({ canvasContext: ctx, viewport }).promise;
    const img = ctx.getImageData(0, 0, canvas.width, canvas.height);
    return { width: img.width, height: img.height, data: img.data };
  }

  async extractText(pageIndex: number, rect: DocRect): Promise<string> {
    const items = await this.getPositionedText(pageIndex);
    return collectTextInRect(items, rect);
  }

  async rasterizeRegion(pageIndex: number, rect: DocRect, zoom: number): Promise<RasterImage> {
    const scale = clampZoom(zoom);
    const full = await this.renderPage(pageIndex, scale);
    const sx = Math.max(0, Math.min(full.width - 1, Math.round(rect.x * scale)));
    const sy = Math.max(0, Math.min(full.height - 1, Math.round(rect.y * scale)));
    const width = Math.max(1, Math.min(full.width - sx, Math.round(rect.width * scale)));
    const height = Math.max(1, Math.min(full.height - sy, Math.round(rect.height * scale)));
    return cropRaster(full, { x: sx, y: sy, width, height });
  }

  private async getPositionedText(pageIndex: number): Promise<PositionedText[]> {
    const cached = this.textCache.get(pageIndex);
    if (cached) return cached;
    const page = this.getPage(pageIndex);
    const viewport = page.getViewport({ scale: 1 });
    const content = await page.getTextContent();
    const items = content.items.filter(isTextItem).map((it) => textItemBox(it, viewport.transform));
    this.textCache.set(pageIndex, items);
    return items;
  }

  async destroy() {
    this.textCache.clear();
    await this.pdfDocument.destroy();
  }
}
