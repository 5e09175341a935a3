import React, { useCallback, useEffect, useMemo, useRef, useState } from "react";
import { Link, useSearchParams } from "react-router-dom";
import {
  Camera,
  ChevronLeft,
  ChevronRight,
  ClipboardPaste,
  Copy,
  Download,
  Keyboard,
  Loader2,
  Save,
  ZoomIn,
  ZoomOut,
} from "lucide-react";
import PdfPageView from "@/components/PdfPageView";
import NotesEditor, { type NotesEditorHandle } from "@/components/NotesEditor";
import PlacementOverlayView from "@/components/PlacementOverlayView";
import ShortcutsPanel from "@/components/ShortcutsPanel";
import TopBar from "@/layout/TopBar";
import { useGestureCoordinator } from "@/hooks/useGestureCoordinator";
import { useNotesSession } from "@/hooks/useNotesSession";
import { browserStorage, documentUrl } from "@/data/notes/api";
import { rememberDocument } from "@/data/notes/recent";
import { PdfJsDocumentRenderer, documentName } from "@/pdfjs-viewer/main";
import { shortcutFor, type FocusArea, type ShortcutAction } from "@/pdfjs-viewer/toolbar/shortcuts";
import type { ClipboardPayload } from "@/pdfjs-viewer/core/model/types";

const READER_CSS = `
.reader{display:flex;flex-direction:column;height:100vh;background:#f3f4f6}
.reader-toolbar{display:flex;align-items:center;gap:8px;flex-wrap:wrap;padding:8px 10px;background:#111827;color:#f9fafb}
.reader-toolbar .btn{display:inline-flex;align-items:center;gap:6px;appearance:none;border:1px solid rgba(255,255,255,.18);background:rgba(255,255,255,.06);color:inherit;height:30px;min-width:30px;padding:0 10px;border-radius:8px;cursor:pointer;font-size:13px}
.reader-toolbar .btn:hover{background:rgba(255,255,255,.12)}
.reader-toolbar .btn:disabled{opacity:.5;cursor:default}
.reader-toolbar .inp{width:56px;height:30px;padding:0 8px;border-radius:8px;border:1px solid rgba(255,255,255,.18);background:rgba(0,0,0,.25);color:#f9fafb}
.reader-toolbar .sep{display:inline-block;width:1px;height:22px;margin:0 4px;background:rgba(255,255,255,.16)}
.reader-toolbar .pct{min-width:48px;text-align:center;font-variant-numeric:tabular-nums}
.reader-body{display:flex;flex:1 1 auto;min-height:0}
.reader-page{display:flex;flex:3 1 0;min-width:0;border-right:1px solid #d1d5db}
.reader-notes{display:flex;flex-direction:column;flex:2 1 0;min-width:0}
.reader-status{padding:4px 10px;font-size:12px;color:#374151;background:#fff;border-top:1px solid #e5e7eb;min-height:24px}
.reader-message{display:flex;align-items:center;gap:8px;margin:auto;color:#4b5563;font-size:14px}
.shortcuts-panel{position:fixed;right:16px;top:100px;width:320px;background:#0b1220;color:#f9fafb;border-radius:12px;padding:10px 12px;z-index:80;box-shadow:0 10px 30px rgba(0,0,0,.35);font-size:13px}
.shortcuts-panel .shortcuts-header{display:flex;justify-content:space-between;align-items:center;margin-bottom:6px;font-weight:600}
.shortcuts-panel .btn{appearance:none;border:none;background:transparent;color:inherit;cursor:pointer}
.shortcuts-panel td{padding:3px 6px;vertical-align:top}
.shortcuts-panel td.keys{white-space:nowrap;opacity:.8}
`;

function focusArea(target: EventTarget | null, notesBody: HTMLElement | null): FocusArea {
  if (!(target instanceof HTMLElement)) return "page";
  if (notesBody && notesBody.contains(target)) return "notes";
  const editable =
    target.tagName === "INPUT" || target.tagName === "TEXTAREA" || target.tagName === "SELECT" || target.isContentEditable;
  return editable ? "field" : "page";
}

function hasPasteable(payload: ClipboardPayload | null): boolean {
  if (!payload) return false;
  return payload.kind === "image" || payload.content !== "";
}

function downloadText(fileName: string, text: string) {
  const url = URL.createObjectURL(new Blob([text], { type: "application/json" }));
  const a = document.createElement("a");
  a.href = url;
  a.download = fileName;
  document.body.appendChild(a);
  a.click();
  a.remove();
  setTimeout(() => URL.revokeObjectURL(url), 1500);
}

export default function ReaderPage() {
  const [params] = useSearchParams();
  const path = params.get("path");

  const { coordinator, surfaceRef, view, selection, placement, clipboard, status } = useGestureCoordinator();
  const notes = useNotesSession(path);

  const [renderer, setRenderer] = useState<PdfJsDocumentRenderer | null>(null);
  const [loading, setLoading] = useState(false);
  const [loadError, setLoadError] = useState<string | null>(null);
  const [shortcutsOpen, setShortcutsOpen] = useState(false);
  const [pageInput, setPageInput] = useState("1");

  const name = useMemo(() => {
    if (!path) return null;
    try {
      return documentName(path);
    } catch {
      return path;
    }
  }, [path]);

  const editorRef = useRef<NotesEditorHandle | null>(null);
  const bindEditor = useCallback(
    (handle: NotesEditorHandle | null) => {
      editorRef.current = handle;
      surfaceRef.current = handle;
    },
    [surfaceRef]
  );

  useEffect(() => {
    if (!path) return;
    let cancelled = false;
    let opened: PdfJsDocumentRenderer | null = null;

    const load = async () => {
      setLoading(true);
      setLoadError(null);
      try {
        const doc = await PdfJsDocumentRenderer.open(documentUrl(path));
        if (cancelled) {
          await doc.destroy();
          return;
        }
        opened = doc;
        coordinator.openDocument(doc);
        setRenderer(doc);
        rememberDocument(browserStorage(), {
          path,
          name: name ?? path,
          openedAt: new Date().toISOString(),
        });
      } catch (e) {
        console.error("Failed to load PDF", e);
        if (!cancelled) setLoadError(e instanceof Error ? e.message : "Failed to load PDF");
      } finally {
        if (!cancelled) setLoading(false);
      }
    };

    void load();
    return () => {
      cancelled = true;
      coordinator.closeDocument();
      setRenderer(null);
      opened?.destroy().catch((e) => console.warn("Failed to release PDF", e));
    };
  }, [path, name, coordinator]);

  useEffect(() => {
    if (view) setPageInput(String(view.pageIndex + 1));
  }, [view]);

  const runAction = useCallback(
    (action: ShortcutAction) => {
      switch (action) {
        case "copyText":
          coordinator.copySelectedText().catch((e) => console.error("Failed to copy text", e));
          return;
        case "captureScreenshot":
          coordinator.captureScreenshot().catch((e) => console.error("Failed to capture screenshot", e));
          return;
        case "paste":
          try {
            coordinator.pasteIntoNotes();
          } catch (e) {
            console.error("Failed to paste into notes", e);
          }
          return;
        case "save":
          notes.save();
          return;
        case "confirmPlacement":
          coordinator.confirmPlacement();
          return;
        case "cancelPlacement":
          coordinator.cancelPlacement();
          return;
        case "clearSelection":
          coordinator.clearSelection();
          return;
        case "previousPage":
          coordinator.previousPage();
          return;
        case "nextPage":
          coordinator.nextPage();
          return;
        case "zoomIn":
          coordinator.zoomIn();
          return;
        case "zoomOut":
          coordinator.zoomOut();
          return;
      }
    },
    [coordinator, notes.save]
  );

  useEffect(() => {
    const handleKeyDown = (e: KeyboardEvent) => {
      const action = shortcutFor(e, {
        mode: coordinator.mode,
        focus: focusArea(e.target, editorRef.current?.element() ?? null),
        canPaste: hasPasteable(coordinator.clipboardPayload),
      });
      if (!action) return;
      e.preventDefault();
      runAction(action);
    };
    window.addEventListener("keydown", handleKeyDown);
    return () => window.removeEventListener("keydown", handleKeyDown);
  }, [coordinator, runAction]);

  const commitPageInput = () => {
    const n = Number(pageInput);
    if (Number.isFinite(n)) coordinator.goToPage(n - 1);
    else if (view) setPageInput(String(view.pageIndex + 1));
  };

  const exportNotes = () => {
    const file = notes.session.exportFile();
    if (file) downloadText(file.fileName, file.json);
  };

  const hasSelection = selection.kind === "committed";
  const placing = placement.kind === "active";

  if (!path) {
    return (
      <div className="reader">
        <style>{READER_CSS}</style>
        <TopBar />
        <p className="reader-message">
          No document selected. <Link to="/">Open a PDF</Link>
        </p>
      </div>
    );
  }

  return (
    <div className="reader">
      <style>{READER_CSS}</style>
      <TopBar documentName={name} dirty={notes.dirty} saveStatus={notes.saveStatus} />

      <div className="reader-toolbar">
        <button className="btn" disabled={!view || view.pageIndex <= 0} onClick={() => coordinator.previousPage()}>
          <ChevronLeft size={16} />
        </button>
        <input
          className="inp"
          value={pageInput}
          onChange={(e) => setPageInput(e.target.value)}
          onBlur={commitPageInput}
          onKeyDown={(e) => {
            if (e.key === "Enter") commitPageInput();
          }}
        />
        <span>/ {coordinator.pageCount}</span>
        <button
          className="btn"
          disabled={!view || view.pageIndex >= coordinator.pageCount - 1}
          onClick={() => coordinator.nextPage()}
        >
          <ChevronRight size={16} />
        </button>
        <span className="sep" />
        <button className="btn" disabled={!view} onClick={() => coordinator.zoomOut()}>
          <ZoomOut size={16} />
        </button>
        <span className="pct">{Math.round((view?.zoom ?? 1) * 100)}%</span>
        <button className="btn" disabled={!view} onClick={() => coordinator.zoomIn()}>
          <ZoomIn size={16} />
        </button>
        <span className="sep" />
        <button className="btn" disabled={!hasSelection || placing} onClick={() => runAction("copyText")}>
          <Copy size={14} /> Copy text (C)
        </button>
        <button className="btn" disabled={!hasSelection || placing} onClick={() => runAction("captureScreenshot")}>
          <Camera size={14} /> Screenshot (S)
        </button>
        <button className="btn" disabled={!clipboard || placing} onClick={() => runAction("paste")}>
          <ClipboardPaste size={14} /> Paste (P)
        </button>
        <span className="sep" />
        <button className="btn" disabled={!notes.dirty} onClick={() => runAction("save")}>
          <Save size={14} /> Save
        </button>
        <button className="btn" disabled={!notes.loaded} title="Download notes as JSON" onClick={exportNotes}>
          <Download size={14} /> Export
        </button>
        <button className="btn" title="Keyboard shortcuts" onClick={() => setShortcutsOpen((v) => !v)}>
          <Keyboard size={16} />
        </button>
      </div>

      <div className="reader-body">
        <div className="reader-page">
          {loadError ? (
            <p className="reader-message">Failed to open document: {loadError}</p>
          ) : loading && !renderer ? (
            <p className="reader-message">
              <Loader2 size={16} /> Loading…
            </p>
          ) : (
            <PdfPageView renderer={renderer} coordinator={coordinator} view={view} selection={selection} />
          )}
        </div>
        <div className="reader-notes">
          <NotesEditor
            ref={bindEditor}
            documentKey={notes.loaded?.key ?? null}
            initialHtml={notes.loaded?.html ?? ""}
            onChange={notes.setContent}
            readOnly={notes.loading}
            overlay={<PlacementOverlayView coordinator={coordinator} placement={placement} />}
          />
        </div>
      </div>

      <div className="reader-status">{status}</div>
      <ShortcutsPanel open={shortcutsOpen} onClose={() => setShortcutsOpen(false)} />
    </div>
  );
}
