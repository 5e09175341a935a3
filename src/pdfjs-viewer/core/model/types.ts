// Shared types for the pdf.js page view, capture pipeline and notes placement.

export type Size = { width: number; height: number };

/** Coordinates in the unzoomed page's native units (pdf points, top-left origin). */
export type DocPoint = { x: number; y: number };

/** Normalized: width/height are never negative. */
export type DocRect = { x: number; y: number; width: number; height: number };

/** CSS pixels relative to the visible viewport of a view. */
export type ScreenPoint = { x: number; y: number };

export type ScreenRect = { x: number; y: number; width: number; height: number };

export type ViewState = {
  pageIndex: number;
  zoom: number;
  /** scroll position of the page view's scroll container */
  scroll: { x: number; y: number };
  /** document-space size of the displayed page */
  pageSize: Size;
  /** where the page's top-left corner sits inside the scroll content (px) */
  pageOffset: { x: number; y: number };
};

export type SelectionState =
  | { kind: "idle" }
  | { kind: "dragging"; anchor: DocPoint; current: DocPoint }
  | { kind: "committed"; rect: DocRect };

/** RGBA, row-major, 4 bytes per pixel. */
export type RasterImage = {
  width: number;
  height: number;
  data: Uint8ClampedArray;
};

export type TextPayload = { kind: "text"; content: string };
export type ImagePayload = { kind: "image"; image: RasterImage };
export type ClipboardPayload = TextPayload | ImagePayload;

export type Corner = "topLeft" | "topRight" | "bottomLeft" | "bottomRight";

export type PlacementMode = { kind: "moving" } | { kind: "resizing"; corner: Corner };

export type PlacementState =
  | { kind: "inactive" }
  | {
      kind: "active";
      payload: ImagePayload;
      /** pointer position where the current drag started (spawn point when idle) */
      anchor: ScreenPoint;
      rect: ScreenRect;
      mode: PlacementMode;
      /** visible notes surface the rect is kept inside */
      bounds: Size;
      /** rect at the moment the current drag started; null while no drag is in progress */
      dragOrigin: ScreenRect | null;
    };

declare const linkKeyBrand: unique symbol;

/** Fixed-length (64 hex chars) key derived from a document's normalized path. */
export type LinkKey = string & { readonly [linkKeyBrand]: true };

export interface NoteDocument {
  sourcePath: string;
  sourceName: string;
  /** editor HTML; images are embedded as data URLs */
  content: string;
  lastModified: string;
}

export interface DocumentRenderer {
  readonly pageCount: number;
  /** Document-space size of a page (zoom 1). */
  getPageSize(pageIndex: number): Size;
  renderPage(pageIndex: number, zoom: number): Promise<RasterImage>;
  extractText(pageIndex: number, rect: DocRect): Promise<string>;
  rasterizeRegion(pageIndex: number, rect: DocRect, zoom: number): Promise<RasterImage>;
}

export interface RichTextSurface {
  insertTextAtCursor(text: string): void;
  insertImageAtCursor(image: RasterImage, width: number, height: number): void;
  /** Move the caret to the text position under a surface point, when the surface supports it. */
  placeCursorAt?(point: ScreenPoint): void;
}

export interface SystemClipboard {
  writeText(text: string): Promise<void>;
}
