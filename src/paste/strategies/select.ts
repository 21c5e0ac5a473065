import type { ClipboardReader } from "@/paste/clipboard-reader";
import {
  createContentInsertionStrategy,
  type ContentUriResolver,
  type InsertedContentSource,
} from "@/paste/strategies/content-insertion";
import { createManualTriggerStrategy } from "@/paste/strategies/manual-trigger";
import { createReplacementInterceptionStrategy } from "@/paste/strategies/replacement-interception";
import type { PasteStrategy } from "@/paste/strategies/types";

export type PastePlatform = "ios" | "android" | "macos" | "windows" | "linux" | "unknown";

export interface PasteStrategyDeps {
  reader: Pick<ClipboardReader, "read">;
  insertedContentSource: () => InsertedContentSource;
  resolveUri: ContentUriResolver;
}

export function detectPastePlatform(userAgent: string | null | undefined): PastePlatform {
  const normalized = (userAgent ?? "").toLowerCase();
  if (!normalized) {
    return "unknown";
  }

  if (normalized.includes("android")) {
    return "android";
  }
  if (/iphone|ipad|ipod/.test(normalized)) {
    return "ios";
  }
  if (normalized.includes("mac os x") || normalized.includes("macintosh")) {
    return "macos";
  }
  if (normalized.includes("windows")) {
    return "windows";
  }
  if (normalized.includes("linux") || normalized.includes("x11")) {
    return "linux";
  }
  return "unknown";
}

export function selectPasteStrategy(platform: PastePlatform, deps: PasteStrategyDeps): PasteStrategy {
  switch (platform) {
    case "ios":
    case "android":
      return createContentInsertionStrategy(deps.insertedContentSource(), deps.resolveUri);
    case "macos":
    case "windows":
    case "linux":
      return createReplacementInterceptionStrategy(deps.reader);
    case "unknown":
      return createManualTriggerStrategy(deps.reader);
  }
}
