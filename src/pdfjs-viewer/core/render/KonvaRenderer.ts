import Konva from "konva";
import type { PlacementState, RasterImage, ScreenRect, Size } from "../model/types";
import { CORNERS, cornerPoint } from "../placement/placementOverlay";
import { rasterToCanvas } from "./raster";

const ACCENT = "#0078D7";
const HANDLE_SIZE = 12;

export type KonvaRendererOptions = {
  container: HTMLDivElement;
  size: Size;
};

/**
 * Viewport-sized Konva stage laid over a view. Pointer input stays with the DOM
 * underneath: the stage never listens.
 */
abstract class OverlayStage {
  protected stage: Konva.Stage;
  protected layer: Konva.Layer;

  constructor(opts: KonvaRendererOptions) {
    this.stage = new Konva.Stage({
      container: opts.container,
      width: Math.max(1, opts.size.width),
      height: Math.max(1, opts.size.height),
      listening: false,
    });
    this.layer = new Konva.Layer({ listening: false });
    this.stage.add(this.layer);
  }

  resize(size: Size) {
    this.stage.size({ width: Math.max(1, size.width), height: Math.max(1, size.height) });
    this.layer.batchDraw();
  }

  destroy() {
    this.stage.destroy();
  }
}

/** Translucent highlight over the page while a region is dragged or selected. */
export class KonvaSelectionLayer extends OverlayStage {
  private highlight: Konva.Rect;

  constructor(opts: KonvaRendererOptions) {
    super(opts);
    this.highlight = new Konva.Rect({
      x: 0,
      y: 0,
      width: 0,
      height: 0,
      stroke: ACCENT,
      strokeWidth: 2,
      fill: "rgba(0, 120, 215, 0.2)",
      visible: false,
      listening: false,
    });
    this.layer.add(this.highlight);
  }

  show(rect: ScreenRect | null) {
    if (!rect) {
      this.highlight.visible(false);
    } else {
      this.highlight.setAttrs({ x: rect.x, y: rect.y, width: rect.width, height: rect.height, visible: true });
    }
    this.layer.batchDraw();
  }
}

/** Floating image proxy with a dashed border and four corner handles. */
export class KonvaPlacementLayer extends OverlayStage {
  private image: Konva.Image | null = null;
  private imageSource: RasterImage | null = null;
  private border: Konva.Rect;
  private handles: Konva.Rect[];

  constructor(opts: KonvaRendererOptions) {
    super(opts);
    this.border = new Konva.Rect({
      stroke: ACCENT,
      strokeWidth: 2,
      dash: [6, 4],
      visible: false,
      listening: false,
    });
    this.layer.add(this.border);
    this.handles = CORNERS.map(() => {
      const h = new Konva.Rect({
        width: HANDLE_SIZE,
        height: HANDLE_SIZE,
        fill: "#ffffff",
        stroke: ACCENT,
        strokeWidth: 2,
        visible: false,
        listening: false,
      });
      this.layer.add(h);
      return h;
    });
  }

  render(state: PlacementState) {
    if (state.kind !== "active") {
      this.image?.visible(false);
      this.border.visible(false);
      this.handles.forEach((h) => h.visible(false));
      this.layer.batchDraw();
      return;
    }

    const { rect } = state;
    const raster = state.payload.image;
    if (!this.image || this.imageSource !== raster) {
      this.image?.destroy();
      this.image = new Konva.Image({ image: rasterToCanvas(raster), listening: false });
      this.imageSource = raster;
      this.layer.add(this.image);
      this.image.moveToBottom();
    }
    this.image.setAttrs({ x: rect.x, y: rect.y, width: rect.width, height: rect.height, visible: true });
    this.border.setAttrs({ x: rect.x + 1, y: rect.y + 1, width: rect.width - 2, height: rect.height - 2, visible: true });

    const half = HANDLE_SIZE / 2;
    CORNERS.forEach((corner, i) => {
      const p = cornerPoint(rect, corner);
      this.handles[i]?.setAttrs({ x: p.x - half, y: p.y - half, visible: true });
    });
    this.layer.batchDraw();
  }

  destroy() {
    this.image = null;
    this.imageSource = null;
    super.destroy();
  }
}
