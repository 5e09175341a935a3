import { Link } from "react-router-dom";
import type { SaveStatus } from "@/hooks/useNotesSession";

export type TopBarProps = {
  documentName?: string | null;
  dirty?: boolean;
  saveStatus?: SaveStatus;
};

const TOPBAR_CSS = `
.topbar{display:flex;align-items:center;gap:16px;height:48px;padding:0 16px;background:#0f172a;color:#f8fafc;flex:0 0 auto}
.topbar .logo{color:inherit;font-weight:700;text-decoration:none;letter-spacing:.5px}
.topbar-document{max-width:50vw;overflow:hidden;text-overflow:ellipsis;white-space:nowrap;font-size:14px;opacity:.9}
.topbar .grow{flex:1 1 auto}
.topbar .save-status{font-size:12px;opacity:.8}
.topbar .save-status.error{color:#fca5a5;opacity:1}
`;

const SAVE_LABELS: Record<SaveStatus, string> = {
  idle: "",
  saving: "Saving…",
  saved: "Saved",
  error: "Save failed",
};

export default function TopBar({ documentName = null, dirty = false, saveStatus = "idle" }: TopBarProps) {
  return (
    <header className="topbar">
      <style>{TOPBAR_CSS}</style>
      <div className="brand">
        <Link to="/" className="logo">
          PDF Notes
        </Link>
      </div>

      {documentName && (
        <div className="topbar-document" title={documentName}>
          {dirty ? "• " : ""}
          {documentName}
        </div>
      )}

      <div className="grow" />

      <div className="topbar-right">
        <span className={`save-status ${saveStatus}`}>{SAVE_LABELS[saveStatus]}</span>
      </div>
    </header>
  );
}
