import type { DocRect, DocumentRenderer, ImagePayload, TextPayload } from "../model/types";
import { clampRectToPage, rectArea } from "../layout/viewportTransform";

export type CaptureRequest = {
  pageIndex: number;
  rect: DocRect;
  /** generation token captured when the request was triggered */
  token: number;
};

export type ScreenshotRequest = CaptureRequest & { zoom: number };

export type CaptureResult<P> =
  | { status: "ok"; payload: P; token: number }
  | { status: "busy" }
  | { status: "failed"; token: number };

/**
 * Turns a committed selection into a clipboard payload through the renderer.
 * Serializes renderer calls: while one request is in flight, new triggers are ignored.
 */
export class CaptureEngine {
  private inFlight = false;

  constructor(private readonly renderer: DocumentRenderer) {}

  get busy(): boolean {
    return this.inFlight;
  }

  async captureText(req: CaptureRequest): Promise<CaptureResult<TextPayload>> {
    if (this.inFlight) return { status: "busy" };
    this.inFlight = true;
    try {
      const rect = this.clampToPage(req.pageIndex, req.rect);
      let content = "";
      if (rect && rectArea(rect) > 0) {
        try {
          content = await this.renderer.extractText(req.pageIndex, rect);
        } catch (e) {
          // unreadable text layer → empty payload
          console.warn("Text extraction failed", e);
          content = "";
        }
      }
      return { status: "ok", payload: { kind: "text", content }, token: req.token };
    } finally {
      this.inFlight = false;
    }
  }

  async captureScreenshot(req: ScreenshotRequest): Promise<CaptureResult<ImagePayload>> {
    if (this.inFlight) return { status: "busy" };
    this.inFlight = true;
    try {
      const rect = this.clampToPage(req.pageIndex, req.rect);
      if (!rect || rectArea(rect) <= 0) return { status: "failed", token: req.token };
      try {
        const image = await this.renderer.rasterizeRegion(req.pageIndex, rect, req.zoom);
        if (!image || image.width <= 0 || image.height <= 0) return { status: "failed", token: req.token };
        return { status: "ok", payload: { kind: "image", image }, token: req.token };
      } catch (e) {
        console.warn("Region rasterization failed", e);
        return { status: "failed", token: req.token };
      }
    } finally {
      this.inFlight = false;
    }
  }

  private clampToPage(pageIndex: number, rect: DocRect): DocRect | null {
    if (pageIndex < 0 || pageIndex >= this.renderer.pageCount) return null;
    try {
      return clampRectToPage(rect, this.renderer.getPageSize(pageIndex));
    } catch (e) {
      console.warn("Failed to read page size", e);
      return null;
    }
  }
}
