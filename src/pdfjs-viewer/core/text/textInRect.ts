import type { DocRect } from "../model/types";

/** A run of text with its document-space box (top-left origin, baseline at y + height). */
export type PositionedText = {
  str: string;
  x: number;
  y: number;
  width: number;
  height: number;
};

type TransformedItem = {
  str: string;
  transform: number[];
  width: number;
};

type Matrix = [number, number, number, number, number, number];

function toMatrix(m: number[]): Matrix {
  return [m[0] ?? 1, m[1] ?? 0, m[2] ?? 0, m[3] ?? 1, m[4] ?? 0, m[5] ?? 0];
}

// same composition pdf.js uses for text layer placement (Util.transform)
function multiply(a: Matrix, b: Matrix): Matrix {
  return [
    a[0] * b[0] + a[2] * b[1],
    a[1] * b[0] + a[3] * b[1],
    a[0] * b[2] + a[2] * b[3],
    a[1] * b[2] + a[3] * b[3],
    a[0] * b[4] + a[2] * b[5] + a[4],
    a[1] * b[4] + a[3] * b[5] + a[5],
  ];
}

/**
 * Maps a pdf.js text item into document space using the page viewport transform at scale 1.
 */
export function textItemBox(item: TransformedItem, viewportTransform: number[]): PositionedText {
  const vt = toMatrix(viewportTransform);
  const m = multiply(vt, toMatrix(item.transform));
  const fontHeight = Math.hypot(m[2], m[3]);
  const scaleX = Math.hypot(vt[0], vt[1]) || 1;
  return {
    str: item.str,
    x: m[4],
    y: m[5] - fontHeight,
    width: item.width * scaleX,
    height: fontHeight,
  };
}

type Piece = { text: string; left: number; right: number; baseline: number; height: number };

/**
 * Characters whose centers fall inside `rect`, grouped into lines top to bottom.
 * Character boxes are approximated by splitting each run's width evenly.
 */
export function collectTextInRect(items: PositionedText[], rect: DocRect): string {
  const right = rect.x + rect.width;
  const bottom = rect.y + rect.height;
  const pieces: Piece[] = [];

  for (const item of items) {
    if (!item.str || item.width <= 0 || item.height <= 0) continue;
    const cy = item.y + item.height / 2;
    if (cy < rect.y || cy > bottom) continue;

    const chars = Array.from(item.str);
    const cw = item.width / chars.length;
    let text = "";
    let first = -1;
    let last = -1;
    chars.forEach((ch, i) => {
      const cx = item.x + (i + 0.5) * cw;
      if (cx < rect.x || cx > right) return;
      if (first < 0) first = i;
      last = i;
      text += ch;
    });
    if (!text) continue;
    pieces.push({
      text,
      left: item.x + first * cw,
      right: item.x + (last + 1) * cw,
      baseline: item.y + item.height,
      height: item.height,
    });
  }

  if (pieces.length === 0) return "";

  pieces.sort((a, b) => a.baseline - b.baseline || a.left - b.left);
  const lines: Piece[][] = [];
  for (const p of pieces) {
    const line = lines[lines.length - 1];
    const ref = line?.[0];
    if (line && ref && Math.abs(p.baseline - ref.baseline) <= Math.min(p.height, ref.height) / 2) {
      line.push(p);
    } else {
      lines.push([p]);
    }
  }

  const out = lines.map((line) => {
    line.sort((a, b) => a.left - b.left);
    let s = "";
    let prev: Piece | null = null;
    for (const p of line) {
      if (prev) {
        const gap = p.left - prev.right;
        const spaced = /\s$/.test(s) || /^\s/.test(p.text);
        if (gap > prev.height * 0.25 && !spaced) s += " ";
      }
      s += p.text;
      prev = p;
    }
    return s.trimEnd();
  });

  return out.join("\n").trim();
}
