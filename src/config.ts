export type NotesBackend = "local" | "server";

export type AppConfig = {
  apiBaseUrl: string;
  notesBackend: NotesBackend;
  autosaveMs: number;
};

type EnvLike = {
  VITE_API_BASE_URL?: string;
  VITE_NOTES_BACKEND?: string;
  VITE_AUTOSAVE_MS?: string;
};

export const DEFAULT_API_BASE_URL = "http://localhost:8000";

export function readConfig(env: EnvLike): AppConfig {
  const autosave = Number(env.VITE_AUTOSAVE_MS);
  return {
    apiBaseUrl: (env.VITE_API_BASE_URL || DEFAULT_API_BASE_URL).replace(/\/+$/, ""),
    notesBackend: env.VITE_NOTES_BACKEND === "server" ? "server" : "local",
    autosaveMs: Number.isFinite(autosave) && autosave > 0 ? autosave : 30_000,
  };
}

export const config: AppConfig = readConfig(import.meta.env);
