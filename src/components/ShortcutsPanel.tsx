import React from "react";
import { X } from "lucide-react";
import { KEY_BINDINGS } from "@/pdfjs-viewer/toolbar/shortcuts";

export type ShortcutsPanelProps = {
  open: boolean;
  onClose: () => void;
};

export default function ShortcutsPanel({ open, onClose }: ShortcutsPanelProps) {
  if (!open) return null;
  return (
    <div className="shortcuts-panel" role="dialog" aria-label="Keyboard shortcuts">
      <div className="shortcuts-header">
        <span>Keyboard shortcuts</span>
        <button type="button" className="btn" title="Close" onClick={onClose}>
          <X size={14} />
        </button>
      </div>
      <table>
        <tbody>
          {KEY_BINDINGS.map((b) => (
            <tr key={b.keys}>
              <td className="keys">{b.keys}</td>
              <td>{b.description}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
