/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_API_BASE_URL?: string;
  readonly VITE_NOTES_BACKEND?: "local" | "server";
  readonly VITE_AUTOSAVE_MS?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
