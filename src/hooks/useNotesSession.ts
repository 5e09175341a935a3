import { useCallback, useEffect, useMemo, useState } from "react";
import { useMutation, useQuery } from "@tanstack/react-query";
import { config } from "@/config";
import { noteStore } from "@/data/notes/api";
import { NotesSession } from "@/pdfjs-viewer/core/io/NotesSession";

export const NOTES_QUERY_KEY = ["notes"] as const;

export type SaveStatus = "idle" | "saving" | "saved" | "error";

/** Content the editor starts from, tagged with the link key it belongs to. */
export type LoadedNotes = { key: string; html: string };

/**
 * Notes for `path`: loaded through react-query, written on the autosave tick,
 * by `save()`, when the document changes and when the window closes.
 */
export function useNotesSession(path: string | null) {
  const session = useMemo(
    () => new NotesSession({ store: noteStore, autosaveMs: config.autosaveMs }),
    []
  );
  const [dirty, setDirty] = useState(false);
  const [saveStatus, setSaveStatus] = useState<SaveStatus>("idle");
  const [loaded, setLoaded] = useState<LoadedNotes | null>(null);

  useEffect(() => {
    const offs = [
      session.on("loaded", () => {
        const key = session.linkKey;
        setLoaded(key ? { key, html: session.html } : null);
      }),
      session.on("dirtyChanged", setDirty),
      session.on("saved", () => setSaveStatus("saved")),
      session.on("saveFailed", () => setSaveStatus("error")),
    ];
    return () => offs.forEach((off) => off());
  }, [session]);

  const notesQuery = useQuery({
    queryKey: [...NOTES_QUERY_KEY, path],
    queryFn: async () => {
      if (!path) return null;
      setSaveStatus("idle");
      return await session.open(path);
    },
    enabled: Boolean(path),
    staleTime: Infinity,
    gcTime: 0,
    retry: false,
    refetchOnWindowFocus: false,
  });

  const saveMutation = useMutation({
    mutationFn: async () => {
      if (!session.sourcePath) return false;
      setSaveStatus("saving");
      const ok = await session.save();
      if (!ok) throw new Error("Save failed");
      return ok;
    },
  });

  useEffect(() => {
    const onBeforeUnload = (e: BeforeUnloadEvent) => {
      if (!session.isDirty) return;
      // writes to localStorage finish synchronously; a server write is best effort
      void session.flush();
      e.preventDefault();
    };
    window.addEventListener("beforeunload", onBeforeUnload);
    return () => window.removeEventListener("beforeunload", onBeforeUnload);
  }, [session]);

  useEffect(
    () => () => {
      session
        .close()
        .catch((e) => console.error("Failed to close notes", e))
        .finally(() => session.destroy());
    },
    [session]
  );

  const setContent = useCallback((html: string) => session.setContent(html), [session]);

  return {
    session,
    loaded,
    loading: notesQuery.isLoading,
    loadError: notesQuery.error,
    dirty,
    saveStatus,
    save: saveMutation.mutate,
    setContent,
  };
}
