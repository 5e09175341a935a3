export type * from "./core/model/types";
export { hasNotes } from "./api/notes";
export { GestureCoordinator, type CoordinatorEvents, type InteractionMode } from "./core/engine/GestureCoordinator";
export { CaptureEngine, type CaptureResult } from "./core/capture/captureEngine";
export { reduceSelection, liveSelectionRect, committedRect, MIN_SELECTION_AREA } from "./core/selection/selectionTracker";
export { reducePlacement, initialPlacementRect, hitTestPlacement } from "./core/placement/placementOverlay";
export { resolveLinkKey, normalizeDocumentPath, documentName, notesFileName } from "./core/link/linkResolver";
export { toDocumentSpace, toScreenSpace, clampZoom, stepZoom, MIN_ZOOM, MAX_ZOOM } from "./core/layout/viewportTransform";
export type { NoteStore } from "./core/io/NoteStore";
export { LocalNoteStore } from "./core/io/LocalNoteStore";
export { ServerNoteStore } from "./core/io/ServerNoteStore";
export { NotesSession, type NotesSessionEvents } from "./core/io/NotesSession";
export { PdfJsDocumentRenderer } from "./core/render/PdfJsDocumentRenderer";
export { KonvaSelectionLayer, KonvaPlacementLayer } from "./core/render/KonvaRenderer";
