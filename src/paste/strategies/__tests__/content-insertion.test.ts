import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { decodeUtf8 } from "@/paste/classifier";
import { clipboardItem, type ClipboardContent } from "@/paste/payload";
import {
  createContentInsertionStrategy,
  createNativeInsertedContentSource,
  type InsertedContent,
  type InsertedContentHandler,
  type InsertedContentSource,
} from "@/paste/strategies/content-insertion";
import type { PasteSignal } from "@/paste/strategies/types";
import { FakePasteTransport, flushAsync } from "@/test/fake-transport";

const encoder = new TextEncoder();

function createManualSource() {
  const handlers = new Map<number, InsertedContentHandler>();
  const source: InsertedContentSource = {
    subscribe(viewId, handler) {
      handlers.set(viewId, handler);
      return () => {
        handlers.delete(viewId);
      };
    },
  };
  const insert = (viewId: number, contents: InsertedContent[]) => handlers.get(viewId)?.(contents);
  return { source, insert, handlers };
}

async function contentOf(signal: PasteSignal | undefined): Promise<ClipboardContent> {
  if (!signal) {
    throw new Error("expected a paste signal");
  }
  return signal.content;
}

describe("createContentInsertionStrategy", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses inline bytes directly", async () => {
    const { source, insert } = createManualSource();
    const resolveUri = vi.fn(async () => null);
    const strategy = createContentInsertionStrategy(source, resolveUri);
    const signals: PasteSignal[] = [];
    strategy.attach({ element: null, viewId: 5 }, (signal) => signals.push(signal));

    insert(5, [{ mimeType: "image/png", data: Uint8Array.from([1, 2]) }]);
    const content = await contentOf(signals[0]);

    expect(strategy.kind).toBe("content_insertion");
    expect(signals[0]?.kind).toBe("content_insertion");
    expect(content.items.map((item) => [item.mimeType, Array.from(item.data)])).toEqual([["image/png", [1, 2]]]);
    expect(resolveUri).not.toHaveBeenCalled();
  });

  it("resolves uri-only content through the host", async () => {
    const { source, insert } = createManualSource();
    const resolveUri = vi.fn(async (uri: string) =>
      uri === "content://media/1" ? clipboardItem(encoder.encode("from uri"), "text/plain") : null,
    );
    const strategy = createContentInsertionStrategy(source, resolveUri);
    const signals: PasteSignal[] = [];
    strategy.attach({ element: null, viewId: 5 }, (signal) => signals.push(signal));

    insert(5, [{ mimeType: "text/plain", uri: "content://media/1" }]);
    const content = await contentOf(signals[0]);

    expect(content.items).toHaveLength(1);
    expect(decodeUtf8(content.items[0].data)).toBe("from uri");
    expect(resolveUri).toHaveBeenCalledWith("content://media/1", "text/plain");
  });

  it("keeps the declared mime type when the host returns none", async () => {
    const { source, insert } = createManualSource();
    const strategy = createContentInsertionStrategy(source, async () => clipboardItem(Uint8Array.from([9]), ""));
    const signals: PasteSignal[] = [];
    strategy.attach({ element: null, viewId: 5 }, (signal) => signals.push(signal));

    insert(5, [{ mimeType: "image/gif", uri: "content://media/2" }]);
    const content = await contentOf(signals[0]);

    expect(content.items.map((item) => item.mimeType)).toEqual(["image/gif"]);
  });

  it("drops items whose uri cannot be read", async () => {
    const { source, insert } = createManualSource();
    const strategy = createContentInsertionStrategy(source, async () => {
      throw new Error("permission revoked");
    });
    const signals: PasteSignal[] = [];
    strategy.attach({ element: null, viewId: 5 }, (signal) => signals.push(signal));

    insert(5, [
      { mimeType: "image/png", uri: "content://media/3" },
      { mimeType: "image/jpeg", data: Uint8Array.from([4]) },
    ]);
    const content = await contentOf(signals[0]);

    expect(content.items.map((item) => item.mimeType)).toEqual(["image/jpeg"]);
  });

  it("ignores empty insertions and stops after detach", () => {
    const { source, insert, handlers } = createManualSource();
    const strategy = createContentInsertionStrategy(source, async () => null);
    const onPaste = vi.fn();
    const detach = strategy.attach({ element: null, viewId: 5 }, onPaste);

    insert(5, []);
    detach();

    expect(onPaste).not.toHaveBeenCalled();
    expect(handlers.size).toBe(0);
  });
});

describe("createNativeInsertedContentSource", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("routes host insertions to the addressed view", async () => {
    const transport = new FakePasteTransport();
    const source = createNativeInsertedContentSource(transport);
    const seven: (readonly InsertedContent[])[] = [];
    const eight: (readonly InsertedContent[])[] = [];
    source.subscribe(7, (contents) => seven.push(contents));
    source.subscribe(8, (contents) => eight.push(contents));
    await flushAsync();

    transport.emitContentInserted({ viewId: 7, mimeType: "image/png", data: [1], uri: null });
    transport.emitContentInserted({ viewId: null, mimeType: "text/plain", data: null, uri: "content://clip/1" });

    expect(transport.contentInsertedListenerCount).toBe(1);
    expect(seven).toHaveLength(2);
    expect(seven[0][0].mimeType).toBe("image/png");
    expect(Array.from(seven[0][0].data ?? [])).toEqual([1]);
    expect(seven[1][0]).toEqual({ mimeType: "text/plain", uri: "content://clip/1" });
    expect(eight).toHaveLength(1);
  });

  it("ignores malformed insertions", async () => {
    const transport = new FakePasteTransport();
    const source = createNativeInsertedContentSource(transport);
    const handler = vi.fn();
    source.subscribe(7, handler);
    await flushAsync();

    transport.emitContentInserted({ viewId: 7, mimeType: "", data: [1], uri: null });
    transport.emitContentInserted({ viewId: 7, mimeType: "image/png", data: null, uri: null });

    expect(handler).not.toHaveBeenCalled();
  });

  it("falls back to the uri when inline bytes are malformed", async () => {
    const transport = new FakePasteTransport();
    const source = createNativeInsertedContentSource(transport);
    const handler = vi.fn();
    source.subscribe(7, handler);
    await flushAsync();

    transport.emitContentInserted({ viewId: 7, mimeType: "image/png", data: [300], uri: "content://clip/9" });

    expect(handler).toHaveBeenCalledWith([{ mimeType: "image/png", uri: "content://clip/9" }]);
  });

  it("stops listening to the host when the last view unsubscribes", async () => {
    const transport = new FakePasteTransport();
    const source = createNativeInsertedContentSource(transport);
    const first = source.subscribe(7, vi.fn());
    const second = source.subscribe(8, vi.fn());
    await flushAsync();

    first();
    expect(transport.contentInsertedListenerCount).toBe(1);
    second();
    expect(transport.contentInsertedListenerCount).toBe(0);
  });
});
