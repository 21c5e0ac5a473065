import type { ContentInsertedEventDto } from "@/contracts";
import { toClipboardItem } from "@/paste/clipboard-content";
import { clipboardItem, type ClipboardContent, type ClipboardItem } from "@/paste/payload";
import type { PasteStrategy } from "@/paste/strategies/types";
import { CleanupStack } from "@/services/cleanup-stack";
import { logDebug, logWarn } from "@/services/logger";
import type { PasteTransport } from "@/services/paste-transport";
import { runRecoverable, runRecoverableOr } from "@/services/recoverable";

export interface InsertedContent {
  mimeType: string;
  data?: Uint8Array;
  uri?: string;
}

export type InsertedContentHandler = (contents: readonly InsertedContent[]) => void;

export interface InsertedContentSource {
  subscribe: (viewId: number, handler: InsertedContentHandler) => () => void;
}

export type ContentUriResolver = (uri: string, declaredMimeType: string) => Promise<ClipboardItem | null>;

async function resolveInsertedItem(content: InsertedContent, resolveUri: ContentUriResolver): Promise<ClipboardItem | null> {
  if (content.data) {
    return clipboardItem(content.data, content.mimeType);
  }

  const uri = content.uri;
  if (!uri) {
    return null;
  }

  const item = await runRecoverableOr(() => resolveUri(uri, content.mimeType), null, {
    scope: "paste-strategy",
    action: "content_uri_read",
    metadata: { uri, mimeType: content.mimeType },
  });
  if (!item) {
    return null;
  }
  // 宿主返回的 mime 为空时沿用插入事件声明的类型
  return item.mimeType ? item : clipboardItem(item.data, content.mimeType);
}

async function resolveInsertedContent(
  contents: readonly InsertedContent[],
  resolveUri: ContentUriResolver,
): Promise<ClipboardContent> {
  const resolved = await Promise.all(contents.map((content) => resolveInsertedItem(content, resolveUri)));
  const items = resolved.filter((item): item is ClipboardItem => item !== null);
  return Object.freeze({ items: Object.freeze(items) });
}

export function createContentInsertionStrategy(
  source: InsertedContentSource,
  resolveUri: ContentUriResolver,
): PasteStrategy {
  return {
    kind: "content_insertion",
    attach(target, onPaste) {
      const { viewId } = target;
      let attached = true;

      const unsubscribe = source.subscribe(viewId, (contents) => {
        if (!attached || contents.length === 0) {
          return;
        }

        logDebug("paste-strategy", "content_inserted", {
          viewId,
          count: contents.length,
          mimeTypes: contents.map((content) => content.mimeType),
        });
        onPaste({
          kind: "content_insertion",
          content: resolveInsertedContent(contents, resolveUri),
        });
      });

      return () => {
        attached = false;
        unsubscribe();
      };
    },
  };
}

function toInsertedContent(event: ContentInsertedEventDto): InsertedContent | null {
  if (typeof event.mimeType !== "string" || event.mimeType.length === 0) {
    return null;
  }

  const item = event.data ? toClipboardItem({ data: event.data, mimeType: event.mimeType }) : null;
  if (item) {
    return { mimeType: item.mimeType, data: item.data };
  }

  if (typeof event.uri === "string" && event.uri.length > 0) {
    return { mimeType: event.mimeType.toLowerCase(), uri: event.uri };
  }

  return null;
}

export function createNativeInsertedContentSource(
  transport: Pick<PasteTransport, "listenContentInserted">,
): InsertedContentSource {
  const handlers = new Map<number, Set<InsertedContentHandler>>();
  let stack: CleanupStack | null = null;

  const dispatch = (event: ContentInsertedEventDto) => {
    const content = toInsertedContent(event);
    if (!content) {
      logWarn("paste-strategy", "content_inserted_malformed", { mimeType: event.mimeType });
      return;
    }

    const targets: Set<InsertedContentHandler>[] = [];
    if (event.viewId === null) {
      targets.push(...handlers.values());
    } else {
      const entry = handlers.get(event.viewId);
      if (entry) {
        targets.push(entry);
      }
    }
    targets.forEach((entry) => {
      [...entry].forEach((handler) => handler([content]));
    });
  };

  const ensureListening = () => {
    if (stack) {
      return;
    }

    const current = new CleanupStack("content-inserted");
    stack = current;
    void runRecoverable(() => transport.listenContentInserted(dispatch), {
      scope: "paste-strategy",
      action: "content_inserted_listen",
    }).then((result) => {
      if (result.ok) {
        current.add(result.data, "listen");
      }
    });
  };

  const stopListening = () => {
    stack?.flush();
    stack = null;
  };

  return {
    subscribe(viewId, handler) {
      const entry = handlers.get(viewId) ?? new Set<InsertedContentHandler>();
      entry.add(handler);
      handlers.set(viewId, entry);
      ensureListening();

      return () => {
        const current = handlers.get(viewId);
        if (!current) {
          return;
        }
        current.delete(handler);
        if (current.size === 0) {
          handlers.delete(viewId);
        }
        if (handlers.size === 0) {
          stopListening();
        }
      };
    },
  };
}
