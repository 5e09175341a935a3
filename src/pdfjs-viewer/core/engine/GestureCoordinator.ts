import type {
  ClipboardPayload,
  DocumentRenderer,
  PlacementState,
  RichTextSurface,
  ScreenPoint,
  SelectionState,
  Size,
  SystemClipboard,
  ViewState,
} from "../model/types";
import { TypedEmitter } from "./emitter";
import { CaptureEngine } from "../capture/captureEngine";
import { clampZoom, createViewState, stepZoom, toDocumentSpace } from "../layout/viewportTransform";
import {
  IDLE_SELECTION,
  committedRect,
  reduceSelection,
  type SelectionEvent,
  type SelectionOptions,
} from "../selection/selectionTracker";
import {
  INACTIVE_PLACEMENT,
  reducePlacement,
  type PlacementEvent,
  type PlacementOptions,
} from "../placement/placementOverlay";

export type CoordinatorEvents = {
  viewChanged: ViewState | null;
  selectionChanged: SelectionState;
  clipboardChanged: ClipboardPayload | null;
  placementChanged: PlacementState;
  status: string;
};

export type InteractionMode = "select" | "placement";

export type GestureCoordinatorOptions = {
  surface: RichTextSurface;
  systemClipboard?: SystemClipboard | null;
  selection?: SelectionOptions;
  placement?: PlacementOptions;
};

const STATUS_PREVIEW_CHARS = 50;

function preview(text: string): string {
  return text.length > STATUS_PREVIEW_CHARS ? `${text.slice(0, STATUS_PREVIEW_CHARS)}...` : text;
}

/**
 * Owns the page view's selection, the notes view's placement overlay and the single
 * clipboard slot. Page and notes gestures are mutually exclusive: while an image is
 * being placed, page pointer input and capture triggers are ignored.
 */
export class GestureCoordinator extends TypedEmitter<CoordinatorEvents> {
  private renderer: DocumentRenderer | null = null;
  private capture: CaptureEngine | null = null;
  private view: ViewState | null = null;
  private selection: SelectionState = IDLE_SELECTION;
  private placement: PlacementState = INACTIVE_PLACEMENT;
  private clipboard: ClipboardPayload | null = null;
  private notesBounds: Size = { width: 0, height: 0 };
  /** bumped on every page/zoom/document change; stale capture results carry an old value */
  private generation = 0;

  private readonly surface: RichTextSurface;
  private systemClipboard: SystemClipboard | null;
  private selectionOptions: SelectionOptions;
  private placementOptions: PlacementOptions;

  constructor(opts: GestureCoordinatorOptions) {
    super();
    this.surface = opts.surface;
    this.systemClipboard = opts.systemClipboard ?? null;
    this.selectionOptions = opts.selection ?? {};
    this.placementOptions = opts.placement ?? {};
  }

  get viewState(): ViewState | null {
    return this.view;
  }

  get selectionState(): SelectionState {
    return this.selection;
  }

  get placementState(): PlacementState {
    return this.placement;
  }

  get clipboardPayload(): ClipboardPayload | null {
    return this.clipboard;
  }

  get generationToken(): number {
    return this.generation;
  }

  get mode(): InteractionMode {
    return this.placement.kind === "active" ? "placement" : "select";
  }

  get pageCount(): number {
    return this.renderer?.pageCount ?? 0;
  }

  // -----------------
  // document lifecycle
  // -----------------
  openDocument(renderer: DocumentRenderer, opts: { pageIndex?: number; zoom?: number } = {}) {
    if (renderer.pageCount <= 0) {
      this.emit("status", "Document has no pages.");
      return;
    }
    this.renderer = renderer;
    this.capture = new CaptureEngine(renderer);
    const pageIndex = Math.min(renderer.pageCount - 1, Math.max(0, Math.floor(opts.pageIndex ?? 0)));
    this.generation += 1;
    this.setView(
      createViewState({
        pageIndex,
        zoom: opts.zoom ?? 1,
        pageSize: renderer.getPageSize(pageIndex),
      })
    );
    this.applySelection({ type: "pageChanged" });
  }

  closeDocument() {
    if (!this.renderer && !this.view) return;
    this.generation += 1;
    this.renderer = null;
    this.capture = null;
    this.setView(null);
    this.applySelection({ type: "clear" });
  }

  // -----------------
  // navigation / zoom / scroll
  // -----------------
  goToPage(pageIndex: number) {
    const view = this.view;
    const renderer = this.renderer;
    if (!view || !renderer) return;
    const next = Math.floor(pageIndex);
    if (!Number.isFinite(next) || next < 0 || next >= renderer.pageCount || next === view.pageIndex) return;
    this.generation += 1;
    this.applySelection({ type: "pageChanged" });
    this.setView({ ...view, pageIndex: next, pageSize: renderer.getPageSize(next) });
  }

  nextPage() {
    if (this.view) this.goToPage(this.view.pageIndex + 1);
  }

  previousPage() {
    if (this.view) this.goToPage(this.view.pageIndex - 1);
  }

  setZoom(zoom: number) {
    const view = this.view;
    if (!view) return;
    const next = clampZoom(zoom);
    if (next === view.zoom) return;
    this.generation += 1;
    this.applySelection({ type: "zoomChanged" });
    this.setView({ ...view, zoom: next });
  }

  zoomIn() {
    if (this.view) this.setZoom(stepZoom(this.view.zoom, 1));
  }

  zoomOut() {
    if (this.view) this.setZoom(stepZoom(this.view.zoom, -1));
  }

  /** Scrolling keeps a drag alive: its anchor is already in document space. */
  setScroll(scroll: { x: number; y: number }) {
    const view = this.view;
    if (!view || (view.scroll.x === scroll.x && view.scroll.y === scroll.y)) return;
    this.setView({ ...view, scroll: { x: scroll.x, y: scroll.y } });
  }

  setPageOffset(offset: { x: number; y: number }) {
    const view = this.view;
    if (!view || (view.pageOffset.x === offset.x && view.pageOffset.y === offset.y)) return;
    this.setView({ ...view, pageOffset: { x: offset.x, y: offset.y } });
  }

  // -----------------
  // page view pointer input
  // -----------------
  pagePointerDown(point: ScreenPoint): boolean {
    if (!this.view || this.mode === "placement") return false;
    this.applySelection({ type: "pointerDown", point: toDocumentSpace(point, this.view) });
    return true;
  }

  pagePointerMove(point: ScreenPoint): boolean {
    if (!this.view || this.mode === "placement" || this.selection.kind !== "dragging") return false;
    this.applySelection({ type: "pointerMove", point: toDocumentSpace(point, this.view) });
    return true;
  }

  pagePointerUp(point: ScreenPoint): boolean {
    if (!this.view || this.mode === "placement" || this.selection.kind !== "dragging") return false;
    this.applySelection({ type: "pointerUp", point: toDocumentSpace(point, this.view) });
    if (this.selectionState.kind === "committed") {
      this.emit("status", "Region selected. Press 'C' to copy text or 'S' to capture a screenshot.");
    }
    return true;
  }

  clearSelection() {
    this.applySelection({ type: "clear" });
  }

  // -----------------
  // capture triggers
  // -----------------
  async copySelectedText(): Promise<void> {
    const req = this.captureRequest();
    if (!req || !this.capture) {
      this.reportMissingSelection("C");
      return;
    }
    const result = await this.capture.captureText(req);
    if (result.status !== "ok" || !this.isCurrent(result.token)) return;

    const text = result.payload.content;
    this.setClipboard(result.payload);
    if (!text) {
      this.emit("status", "No text found in the selected region.");
      return;
    }
    if (this.systemClipboard) {
      try {
        await this.systemClipboard.writeText(text);
      } catch (e) {
        console.warn("Failed to write system clipboard", e);
      }
    }
    this.emit("status", `Copied: ${preview(text)}`);
  }

  async captureScreenshot(): Promise<void> {
    const req = this.captureRequest();
    if (!req || !this.capture || !this.view) {
      this.reportMissingSelection("S");
      return;
    }
    const result = await this.capture.captureScreenshot({ ...req, zoom: this.view.zoom });
    if (result.status !== "ok" || !this.isCurrent(result.token)) return;
    this.setClipboard(result.payload);
    this.emit("status", "Screenshot captured. Press 'P' in notes to paste.");
  }

  private captureRequest() {
    if (this.mode === "placement" || !this.view || !this.capture) return null;
    const rect = committedRect(this.selection);
    if (!rect) return null;
    return { pageIndex: this.view.pageIndex, rect, token: this.generation };
  }

  private reportMissingSelection(key: "C" | "S") {
    if (this.mode === "select" && this.view && this.selection.kind !== "committed") {
      this.emit("status", `No selection. Select a region first, then press '${key}'.`);
    }
  }

  /** A result is dropped once the page, zoom or document moved on, or while an image is being placed. */
  private isCurrent(token: number): boolean {
    return token === this.generation && this.renderer !== null && this.mode !== "placement";
  }

  // -----------------
  // notes view
  // -----------------
  resizeNotesSurface(bounds: Size) {
    this.notesBounds = { width: Math.max(0, bounds.width), height: Math.max(0, bounds.height) };
    if (this.placement.kind === "active") this.applyPlacement({ type: "surfaceResized", bounds: this.notesBounds });
  }

  /**
   * Single paste entry point. Text goes straight to the cursor; an image opens the
   * placement overlay. Returns whether anything happened.
   */
  pasteIntoNotes(opts: { at?: ScreenPoint; bounds?: Size } = {}): boolean {
    const payload = this.clipboard;
    if (!payload || this.mode === "placement" || this.selection.kind === "dragging") return false;

    switch (payload.kind) {
      case "text":
        if (!payload.content) return false;
        this.surface.insertTextAtCursor(payload.content);
        return true;
      case "image": {
        const bounds = opts.bounds ?? this.notesBounds;
        if (opts.bounds) this.notesBounds = opts.bounds;
        if (bounds.width <= 0 || bounds.height <= 0) return false;
        this.applyPlacement({ type: "activate", payload, bounds, at: opts.at });
        this.emit("status", "Drag to move, drag a corner to resize. Click outside to place, Esc to cancel.");
        return this.placement.kind === "active";
      }
    }
  }

  notesPointerDown(point: ScreenPoint): boolean {
    if (this.placement.kind !== "active") return false;
    this.applyPlacement({ type: "pointerDown", point });
    return true;
  }

  notesPointerMove(point: ScreenPoint): boolean {
    if (this.placement.kind !== "active" || !this.placement.dragOrigin) return false;
    this.applyPlacement({ type: "pointerMove", point });
    return true;
  }

  notesPointerUp(point: ScreenPoint): boolean {
    if (this.placement.kind !== "active" || !this.placement.dragOrigin) return false;
    this.applyPlacement({ type: "pointerUp", point });
    return true;
  }

  confirmPlacement(): boolean {
    if (this.placement.kind !== "active") return false;
    this.applyPlacement({ type: "confirm" });
    return true;
  }

  cancelPlacement(): boolean {
    if (this.placement.kind !== "active") return false;
    this.applyPlacement({ type: "cancel" });
    this.emit("status", "Image placement cancelled. Press 'P' to try again.");
    return true;
  }

  destroy() {
    this.generation += 1;
    this.renderer = null;
    this.capture = null;
    this.view = null;
    this.selection = IDLE_SELECTION;
    this.placement = INACTIVE_PLACEMENT;
    this.clipboard = null;
    this.removeAllListeners();
  }

  // -----------------
  // internal helpers
  // -----------------
  private setView(view: ViewState | null) {
    this.view = view;
    this.emit("viewChanged", view);
  }

  private applySelection(event: SelectionEvent) {
    const next = reduceSelection(this.selection, event, this.selectionOptions);
    if (next === this.selection) return;
    this.selection = next;
    this.emit("selectionChanged", next);
  }

  private setClipboard(payload: ClipboardPayload | null) {
    this.clipboard = payload;
    this.emit("clipboardChanged", payload);
  }

  private applyPlacement(event: PlacementEvent) {
    const { state, effect } = reducePlacement(this.placement, event, this.placementOptions);
    if (state !== this.placement) {
      this.placement = state;
      this.emit("placementChanged", state);
    }
    if (effect?.kind !== "commit") return;

    try {
      this.surface.placeCursorAt?.(effect.at);
      this.surface.insertImageAtCursor(effect.payload.image, effect.size.width, effect.size.height);
    } catch (e) {
      // keep the payload so the user can paste again
      console.error("Failed to insert image into notes", e);
      this.emit("status", "Failed to insert image.");
      return;
    }
    this.setClipboard(null);
    this.emit("status", `Inserted image (${effect.size.width}×${effect.size.height}).`);
  }
}
