import { resolveLinkKey } from "../core/link/linkResolver";
import { noteStore } from "@/data/notes/api";

// Whether the configured store holds notes for a document path
export async function hasNotes(path: string): Promise<boolean> {
  return await noteStore.has(await resolveLinkKey(path));
}
