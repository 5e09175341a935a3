import React, { forwardRef, useCallback, useEffect, useImperativeHandle, useRef, useState } from "react";
import type { RasterImage, RichTextSurface, ScreenPoint } from "@/pdfjs-viewer/core/model/types";
import { rasterToDataUrl } from "@/pdfjs-viewer/core/render/raster";

export const FONT_SIZES = [8, 9, 10, 11, 12, 14, 16, 18, 20, 24, 28, 32, 36, 48, 60, 72];

export type NotesEditorHandle = RichTextSurface & {
  element: () => HTMLDivElement | null;
  getHtml: () => string;
  focus: () => void;
};

export type NotesEditorProps = {
  /** changes when another document's notes are loaded; the editor then resets to `initialHtml` */
  documentKey: string | null;
  initialHtml: string;
  onChange: (html: string) => void;
  readOnly?: boolean;
  /** drawn over the text area, sharing its box */
  overlay?: React.ReactNode;
};

const NOTES_EDITOR_CSS = `
.notes-editor{display:flex;flex-direction:column;height:100%;min-height:0;background:#fff}
.notes-editor-toolbar{display:flex;align-items:center;gap:6px;flex-wrap:wrap;padding:6px 8px;border-bottom:1px solid #e5e7eb;background:#f9fafb}
.notes-editor-toolbar .btn{appearance:none;border:1px solid #d1d5db;background:#fff;height:28px;min-width:28px;padding:0 8px;border-radius:6px;cursor:pointer;font-size:13px}
.notes-editor-toolbar .btn:hover{background:#f3f4f6}
.notes-editor-toolbar select,.notes-editor-toolbar input[type=color]{height:28px;border:1px solid #d1d5db;border-radius:6px;background:#fff}
.notes-editor-stage{position:relative;flex:1 1 auto;min-height:0}
.notes-editor-body{position:absolute;inset:0;overflow:auto;padding:12px 14px;outline:none;font-size:14px;line-height:1.5}
.notes-editor-body img{max-width:none;vertical-align:bottom}
`;

function selectionInside(root: HTMLElement): Range | null {
  const sel = window.getSelection();
  if (!sel || sel.rangeCount === 0) return null;
  const range = sel.getRangeAt(0);
  return root.contains(range.commonAncestorContainer) ? range : null;
}

function caretAtEnd(root: HTMLElement): Range {
  const range = document.createRange();
  range.selectNodeContents(root);
  range.collapse(false);
  const sel = window.getSelection();
  sel?.removeAllRanges();
  sel?.addRange(range);
  return range;
}

function caretFromPoint(x: number, y: number): Range | null {
  if (typeof document.caretRangeFromPoint === "function") {
    return document.caretRangeFromPoint(x, y);
  }
  return null;
}

/** contentEditable notes surface with a small formatting toolbar. */
const NotesEditor = forwardRef<NotesEditorHandle, NotesEditorProps>(function NotesEditor(
  { documentKey, initialHtml, onChange, readOnly = false, overlay },
  ref
) {
  const bodyRef = useRef<HTMLDivElement | null>(null);
  const [fontSize, setFontSize] = useState(14);
  const [color, setColor] = useState("#111827");

  const emitChange = useCallback(() => {
    const body = bodyRef.current;
    if (body) onChange(body.innerHTML);
  }, [onChange]);

  // reset content only when a different document's notes arrive
  useEffect(() => {
    const body = bodyRef.current;
    if (body) body.innerHTML = initialHtml;
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [documentKey]);

  const ensureCaret = useCallback((): Range | null => {
    const body = bodyRef.current;
    if (!body) return null;
    body.focus();
    return selectionInside(body) ?? caretAtEnd(body);
  }, []);

  useImperativeHandle(
    ref,
    () => ({
      element: () => bodyRef.current,
      getHtml: () => bodyRef.current?.innerHTML ?? "",
      focus: () => bodyRef.current?.focus(),

      insertTextAtCursor(text: string) {
        if (!ensureCaret()) throw new Error("Notes editor is not mounted");
        document.execCommand("insertText", false, text);
        emitChange();
      },

      insertImageAtCursor(image: RasterImage, width: number, height: number) {
        const range = ensureCaret();
        if (!range) throw new Error("Notes editor is not mounted");
        const img = document.createElement("img");
        img.src = rasterToDataUrl(image, width, height);
        img.width = width;
        img.height = height;
        img.alt = "";
        range.deleteContents();
        range.insertNode(img);
        range.setStartAfter(img);
        range.collapse(true);
        const sel = window.getSelection();
        sel?.removeAllRanges();
        sel?.addRange(range);
        emitChange();
      },

      placeCursorAt(point: ScreenPoint) {
        const body = bodyRef.current;
        if (!body) return;
        const box = body.getBoundingClientRect();
        const range = caretFromPoint(box.left + point.x, box.top + point.y);
        if (!range || !body.contains(range.startContainer)) return;
        const sel = window.getSelection();
        sel?.removeAllRanges();
        sel?.addRange(range);
      },
    }),
    [ensureCaret, emitChange]
  );

  const exec = (command: string, value?: string) => {
    ensureCaret();
    document.execCommand(command, false, value);
    emitChange();
  };

  // execCommand only knows sizes 1–7: mark with 7, then swap the <font> tags for px spans
  const applyFontSize = (px: number) => {
    setFontSize(px);
    const body = bodyRef.current;
    if (!body) return;
    exec("fontSize", "7");
    body.querySelectorAll('font[size="7"]').forEach((font) => {
      const span = document.createElement("span");
      span.style.fontSize = `${px}px`;
      span.append(...Array.from(font.childNodes));
      font.replaceWith(span);
    });
    emitChange();
  };

  const keepSelection = (e: React.MouseEvent) => e.preventDefault();

  return (
    <div className="notes-editor">
      <style>{NOTES_EDITOR_CSS}</style>
      <div className="notes-editor-toolbar" onMouseDown={keepSelection}>
        <button type="button" className="btn" title="Bold" onClick={() => exec("bold")}>
          <b>B</b>
        </button>
        <button type="button" className="btn" title="Italic" onClick={() => exec("italic")}>
          <i>I</i>
        </button>
        <button type="button" className="btn" title="Underline" onClick={() => exec("underline")}>
          <u>U</u>
        </button>
        <select
          title="Font size"
          value={fontSize}
          onMouseDown={(e) => e.stopPropagation()}
          onChange={(e) => applyFontSize(Number(e.target.value))}
        >
          {FONT_SIZES.map((s) => (
            <option key={s} value={s}>
              {s}
            </option>
          ))}
        </select>
        <input
          type="color"
          title="Text color"
          value={color}
          onMouseDown={(e) => e.stopPropagation()}
          onChange={(e) => {
            setColor(e.target.value);
            exec("foreColor", e.target.value);
          }}
        />
        <button type="button" className="btn" title="Bulleted list" onClick={() => exec("insertUnorderedList")}>
          • List
        </button>
        <button type="button" className="btn" title="Numbered list" onClick={() => exec("insertOrderedList")}>
          1. List
        </button>
      </div>
      <div className="notes-editor-stage">
        <div
          ref={bodyRef}
          className="notes-editor-body"
          contentEditable={!readOnly}
          suppressContentEditableWarning
          spellCheck
          onInput={emitChange}
        />
        {overlay}
      </div>
    </div>
  );
});

export default NotesEditor;
