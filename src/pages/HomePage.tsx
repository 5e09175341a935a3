import React, { useState } from "react";
import { Link, useNavigate } from "react-router-dom";
import { useQuery } from "@tanstack/react-query";
import { FileText, X } from "lucide-react";
import { browserStorage } from "@/data/notes/api";
import { forgetDocument, readRecentDocuments, type RecentDocument } from "@/data/notes/recent";
import { hasNotes } from "@/pdfjs-viewer/main";

const HOME_CSS = `
.home{max-width:760px;margin:32px auto;padding:0 16px;font-family:system-ui,-apple-system,Segoe UI,Roboto,sans-serif}
.home h1{font-size:20px;margin:0 0 4px}
.home .hint{color:#6b7280;font-size:13px;margin:0 0 16px}
.home form{display:flex;gap:8px}
.home input{flex:1 1 auto;height:36px;padding:0 10px;border:1px solid #d1d5db;border-radius:8px}
.home button{height:36px;padding:0 14px;border-radius:8px;border:1px solid #4f46e5;background:#4f46e5;color:#fff;cursor:pointer}
.home button.link{background:transparent;border:none;color:#6b7280;padding:0 6px}
.home ul{list-style:none;padding:0;margin:24px 0 0;border:1px solid #e5e7eb;border-radius:12px;background:#fff}
.home li{display:flex;align-items:center;gap:10px;padding:10px 12px;color:#374151;border-top:1px solid #f3f4f6}
.home li:first-child{border-top:none}
.home li .path{color:#9ca3af;font-size:12px;overflow:hidden;text-overflow:ellipsis;white-space:nowrap}
.home li .badge{font-size:11px;color:#4f46e5;border:1px solid #c7d2fe;border-radius:999px;padding:1px 8px}
`;

export function readerHref(path: string): string {
  return `/read?path=${encodeURIComponent(path)}`;
}

function RecentItem({ doc, onForget }: { doc: RecentDocument; onForget: () => void }) {
  const { data: withNotes = false } = useQuery({
    queryKey: ["hasNotes", doc.path],
    queryFn: () => hasNotes(doc.path),
    staleTime: 30_000,
  });

  return (
    <li>
      <FileText size={18} />
      <div style={{ flex: "1 1 auto", minWidth: 0 }}>
        <Link to={readerHref(doc.path)}>{doc.name}</Link>
        <div className="path">{doc.path}</div>
      </div>
      {withNotes && <span className="badge">notes</span>}
      <button type="button" className="link" title="Remove from list" onClick={onForget}>
        <X size={14} />
      </button>
    </li>
  );
}

export default function HomePage() {
  const navigate = useNavigate();
  const [path, setPath] = useState("");
  const [recent, setRecent] = useState<RecentDocument[]>(() => readRecentDocuments(browserStorage()));

  const onSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    const trimmed = path.trim();
    if (!trimmed) return;
    navigate(readerHref(trimmed));
  };

  return (
    <div className="home">
      <style>{HOME_CSS}</style>
      <h1>Open a PDF</h1>
      <p className="hint">Enter a file path or an http(s) URL. Notes are linked to the document's path.</p>

      <form onSubmit={onSubmit}>
        <input
          value={path}
          placeholder="/home/me/papers/paper.pdf or https://example.com/paper.pdf"
          onChange={(e) => setPath(e.target.value)}
        />
        <button type="submit" disabled={!path.trim()}>
          Open
        </button>
      </form>

      {recent.length > 0 && (
        <ul>
          {recent.map((doc) => (
            <RecentItem
              key={doc.path}
              doc={doc}
              onForget={() => setRecent(forgetDocument(browserStorage(), doc.path))}
            />
          ))}
        </ul>
      )}
    </div>
  );
}
