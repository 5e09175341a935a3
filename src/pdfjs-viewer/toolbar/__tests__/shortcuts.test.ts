import { describe, expect, it } from "vitest";
import { shortcutFor, type ShortcutContext } from "../shortcuts";

const onPage: ShortcutContext = { mode: "select", focus: "page", canPaste: false };
const inNotes: ShortcutContext = { mode: "select", focus: "notes", canPaste: true };
const inField: ShortcutContext = { mode: "select", focus: "field", canPaste: true };
const placing: ShortcutContext = { mode: "placement", focus: "page", canPaste: true };

describe("shortcutFor", () => {
  it("maps plain keys outside text fields", () => {
    expect(shortcutFor({ key: "c" }, onPage)).toBe("copyText");
    expect(shortcutFor({ key: "S" }, onPage)).toBe("captureScreenshot");
    expect(shortcutFor({ key: "p" }, onPage)).toBe("paste");
    expect(shortcutFor({ key: "ArrowLeft" }, onPage)).toBe("previousPage");
    expect(shortcutFor({ key: "PageDown" }, onPage)).toBe("nextPage");
    expect(shortcutFor({ key: "=" }, onPage)).toBe("zoomIn");
    expect(shortcutFor({ key: "-" }, onPage)).toBe("zoomOut");
    expect(shortcutFor({ key: "Escape" }, onPage)).toBe("clearSelection");
    expect(shortcutFor({ key: "x" }, onPage)).toBeNull();
  });

  it("only confirms or cancels while placing", () => {
    expect(shortcutFor({ key: "Enter" }, placing)).toBe("confirmPlacement");
    expect(shortcutFor({ key: "Escape" }, { ...placing, focus: "notes" })).toBe("cancelPlacement");
    expect(shortcutFor({ key: "p" }, placing)).toBeNull();
    expect(shortcutFor({ key: "s", ctrlKey: true }, placing)).toBeNull();
  });

  it("pastes with P in the notes when something was captured", () => {
    expect(shortcutFor({ key: "p" }, inNotes)).toBe("paste");
    expect(shortcutFor({ key: "P" }, inNotes)).toBe("paste");
    expect(shortcutFor({ key: "p" }, { ...inNotes, canPaste: false })).toBeNull();
    expect(shortcutFor({ key: "p", ctrlKey: true }, inNotes)).toBeNull();
  });

  it("leaves other typing in the notes alone", () => {
    expect(shortcutFor({ key: "c" }, inNotes)).toBeNull();
    expect(shortcutFor({ key: "ArrowRight" }, inNotes)).toBeNull();
    expect(shortcutFor({ key: "Escape" }, inNotes)).toBeNull();
    expect(shortcutFor({ key: "s", ctrlKey: true }, inNotes)).toBe("save");
  });

  it("takes only Ctrl+S from other text fields", () => {
    expect(shortcutFor({ key: "p" }, inField)).toBeNull();
    expect(shortcutFor({ key: "c" }, inField)).toBeNull();
    expect(shortcutFor({ key: "S", metaKey: true }, inField)).toBe("save");
  });

  it("treats modified keys as zoom or nothing", () => {
    expect(shortcutFor({ key: "+", ctrlKey: true }, onPage)).toBe("zoomIn");
    expect(shortcutFor({ key: "-", metaKey: true }, onPage)).toBe("zoomOut");
    expect(shortcutFor({ key: "c", ctrlKey: true }, onPage)).toBeNull();
    expect(shortcutFor({ key: "c", altKey: true }, onPage)).toBeNull();
  });
});
