import { describe, expect, it } from "vitest";

import { toClipboardContent, toClipboardItem, toClipboardItemDto } from "@/paste/clipboard-content";
import { EMPTY_CLIPBOARD_CONTENT } from "@/paste/payload";

describe("toClipboardItem", () => {
  it("normalizes the mime type and copies the bytes", () => {
    const item = toClipboardItem({ data: [1, 2], mimeType: " Image/PNG " });

    expect(item?.mimeType).toBe("image/png");
    expect(Array.from(item?.data ?? [])).toEqual([1, 2]);
  });

  it("copies typed arrays so later writes do not leak in", () => {
    const source = Uint8Array.from([7, 8]);
    const item = toClipboardItem({ data: source, mimeType: "image/png" });
    source[0] = 0;

    expect(Array.from(item?.data ?? [])).toEqual([7, 8]);
  });

  it("rejects malformed items", () => {
    expect(toClipboardItem(null)).toBeNull();
    expect(toClipboardItem("text/plain")).toBeNull();
    expect(toClipboardItem({ data: [1] })).toBeNull();
    expect(toClipboardItem({ data: [1], mimeType: "  " })).toBeNull();
    expect(toClipboardItem({ data: [256], mimeType: "text/plain" })).toBeNull();
    expect(toClipboardItem({ data: [1.5], mimeType: "text/plain" })).toBeNull();
    expect(toClipboardItem({ data: "abc", mimeType: "text/plain" })).toBeNull();
  });
});

describe("toClipboardContent", () => {
  it("returns the shared empty content for missing payloads", () => {
    expect(toClipboardContent(null)).toBe(EMPTY_CLIPBOARD_CONTENT);
    expect(toClipboardContent({ items: [] })).toBe(EMPTY_CLIPBOARD_CONTENT);
  });

  it("drops malformed items and keeps the rest in order", () => {
    const content = toClipboardContent({
      items: [
        { data: [104, 105], mimeType: "text/plain" },
        { data: [300], mimeType: "image/png" },
        { data: [1], mimeType: "image/gif" },
      ],
    });

    expect(content.items.map((item) => item.mimeType)).toEqual(["text/plain", "image/gif"]);
  });

  it("converts items back to the wire shape", () => {
    const item = toClipboardItem({ data: [9, 10], mimeType: "image/webp" });
    if (!item) {
      throw new Error("expected a clipboard item");
    }

    expect(toClipboardItemDto(item)).toEqual({ data: [9, 10], mimeType: "image/webp" });
  });
});
