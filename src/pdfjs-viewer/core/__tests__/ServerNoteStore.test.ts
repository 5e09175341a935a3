import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import { beforeAll, describe, expect, it } from "vitest";
import type { LinkKey, NoteDocument } from "../model/types";
import { ServerNoteStore } from "../io/ServerNoteStore";
import { resolveLinkKey } from "../link/linkResolver";

type Reply = { status: number; data?: unknown };

/** axios client answered in process by `handler`. */
function clientWith(handler: (config: InternalAxiosRequestConfig) => Reply) {
  const calls: InternalAxiosRequestConfig[] = [];
  const client = axios.create({
    baseURL: "http://notes.test",
    adapter: async (config) => {
      calls.push(config);
      const { status, data } = handler(config);
      const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, null, response);
      }
      return response;
    },
  });
  return { client, calls };
}

const doc: NoteDocument = {
  sourcePath: "/home/reader/papers/paper.pdf",
  sourceName: "paper.pdf",
  content: "<p>Summary</p>",
  lastModified: "2026-01-02T03:04:05.000Z",
};

let key: LinkKey;

beforeAll(async () => {
  key = await resolveLinkKey(doc.sourcePath);
});

describe("ServerNoteStore", () => {
  it("loads a note document", async () => {
    const { client, calls } = clientWith(() => ({ status: 200, data: doc }));
    const store = new ServerNoteStore(client);
    expect(await store.load(key)).toEqual(doc);
    expect(calls[0]?.method).toBe("get");
    expect(calls[0]?.url).toBe(`/notes/${key}`);
  });

  it("treats 404 as no notes", async () => {
    const { client } = clientWith(() => ({ status: 404 }));
    const store = new ServerNoteStore(client);
    expect(await store.load(key)).toBeNull();
    expect(await store.has(key)).toBe(false);
  });

  it("loads a malformed body as null", async () => {
    const { client } = clientWith(() => ({ status: 200, data: { content: 42 } }));
    expect(await new ServerNoteStore(client).load(key)).toBeNull();
  });

  it("passes other load failures through", async () => {
    const { client } = clientWith(() => ({ status: 500 }));
    await expect(new ServerNoteStore(client).load(key)).rejects.toBeInstanceOf(AxiosError);
  });

  it("checks existence with HEAD", async () => {
    const { client, calls } = clientWith(() => ({ status: 200 }));
    expect(await new ServerNoteStore(client).has(key)).toBe(true);
    expect(calls[0]?.method).toBe("head");
  });

  it("saves with PUT and a JSON body", async () => {
    const { client, calls } = clientWith(() => ({ status: 204 }));
    await new ServerNoteStore(client).save(key, doc);
    expect(calls[0]?.method).toBe("put");
    expect(calls[0]?.url).toBe(`/notes/${key}`);
    expect(JSON.parse(String(calls[0]?.data))).toEqual(doc);
  });

  it("reports the server's message when a save fails", async () => {
    const { client } = clientWith(() => ({ status: 507, data: "disk full" }));
    await expect(new ServerNoteStore(client).save(key, doc)).rejects.toThrow("disk full");

    const bare = clientWith(() => ({ status: 503 }));
    await expect(new ServerNoteStore(bare.client).save(key, doc)).rejects.toThrow("Save failed (503)");
  });
});
