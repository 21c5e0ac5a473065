import { describe, expect, it } from "vitest";

import {
  acceptsPayload,
  clipboardItem,
  fileImagePaste,
  hasGif,
  imageCount,
  imagePaste,
  payloadEquals,
  payloadMimeTypes,
  payloadType,
  textPaste,
  toPasteFilter,
  UNSUPPORTED_PASTE,
} from "@/paste";

const png = clipboardItem(Uint8Array.from([1, 2, 3]), "image/png");
const gif = clipboardItem(Uint8Array.from([4]), "image/gif");

describe("paste payload", () => {
  it("freezes constructed payloads", () => {
    const image = imagePaste([png]);

    expect(Object.isFrozen(textPaste("hello"))).toBe(true);
    expect(Object.isFrozen(image)).toBe(true);
    expect(Object.isFrozen(image.items)).toBe(true);
  });

  it("copies the item list of an image paste", () => {
    const items = [png];
    const image = imagePaste(items);
    items.push(gif);

    expect(image.items).toHaveLength(1);
  });

  it("rejects file image pastes with mismatched lists", () => {
    expect(() => fileImagePaste(["/tmp/a.png", "/tmp/b.png"], ["image/png"])).toThrow(RangeError);
  });

  it("maps every payload kind to its paste type", () => {
    expect(payloadType(textPaste("a"))).toBe("text");
    expect(payloadType(imagePaste([png]))).toBe("image");
    expect(payloadType(fileImagePaste(["/tmp/a.png"], ["image/png"]))).toBe("image");
    expect(payloadType(UNSUPPORTED_PASTE)).toBeNull();
  });

  it("reports mime types, image counts and gif presence", () => {
    const image = imagePaste([png, gif]);

    expect(payloadMimeTypes(image)).toEqual(["image/png", "image/gif"]);
    expect(payloadMimeTypes(textPaste("a"))).toEqual(["text/plain"]);
    expect(imageCount(image)).toBe(2);
    expect(imageCount(fileImagePaste(["/tmp/a.png"], ["image/png"]))).toBe(1);
    expect(imageCount(textPaste("a"))).toBe(0);
    expect(hasGif(image)).toBe(true);
    expect(hasGif(imagePaste([png]))).toBe(false);
  });

  it("compares payloads by value and keeps item order significant", () => {
    const samePng = clipboardItem(Uint8Array.from([1, 2, 3]), "image/png");
    const otherPng = clipboardItem(Uint8Array.from([1, 2, 4]), "image/png");

    expect(payloadEquals(imagePaste([png, gif]), imagePaste([samePng, gif]))).toBe(true);
    expect(payloadEquals(imagePaste([png, gif]), imagePaste([gif, png]))).toBe(false);
    expect(payloadEquals(imagePaste([png]), imagePaste([otherPng]))).toBe(false);
    expect(payloadEquals(textPaste("a"), textPaste("a"))).toBe(true);
    expect(payloadEquals(textPaste("a"), UNSUPPORTED_PASTE)).toBe(false);
    expect(payloadEquals(UNSUPPORTED_PASTE, UNSUPPORTED_PASTE)).toBe(true);
  });

  it("accepts everything without a filter", () => {
    const filter = toPasteFilter(undefined);

    expect(filter).toBeUndefined();
    expect(acceptsPayload(filter, textPaste("a"))).toBe(true);
    expect(acceptsPayload(filter, imagePaste([png]))).toBe(true);
  });

  it("accepts only unsupported content with an empty filter", () => {
    const filter = toPasteFilter([]);

    expect(acceptsPayload(filter, textPaste("a"))).toBe(false);
    expect(acceptsPayload(filter, imagePaste([png]))).toBe(false);
    expect(acceptsPayload(filter, UNSUPPORTED_PASTE)).toBe(true);
  });

  it("treats file-backed images as images when filtering", () => {
    const filter = toPasteFilter(["image"]);

    expect(acceptsPayload(filter, fileImagePaste(["/tmp/a.png"], ["image/png"]))).toBe(true);
    expect(acceptsPayload(filter, textPaste("a"))).toBe(false);
    expect(acceptsPayload(toPasteFilter(null), textPaste("a"))).toBe(true);
  });
});
