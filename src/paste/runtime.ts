import { toClipboardItem } from "@/paste/clipboard-content";
import { createClipboardReader, withPlainTextFallback, type ClipboardReader } from "@/paste/clipboard-reader";
import { PasteChannel } from "@/paste/paste-channel";
import { createNativeInsertedContentSource } from "@/paste/strategies/content-insertion";
import { detectPastePlatform, selectPasteStrategy, type PastePlatform } from "@/paste/strategies/select";
import type { PasteStrategy } from "@/paste/strategies/types";
import { createTempFileWriter, type TempFileWriter } from "@/paste/temp-files";
import { logInfo } from "@/services/logger";
import { createTauriPasteTransport, type PasteTransport } from "@/services/paste-transport";

export interface PasteRuntime {
  platform: PastePlatform;
  transport: PasteTransport;
  reader: ClipboardReader;
  channel: PasteChannel;
  strategy: PasteStrategy;
  tempFiles: TempFileWriter;
  getPlatformVersionString: () => Promise<string | null>;
  clearTemporaryArtifacts: () => Promise<boolean>;
}

export interface CreatePasteRuntimeOptions {
  platform?: PastePlatform;
  transport?: PasteTransport;
  duplicateWindowMs?: number;
}

function resolveUserAgent(): string | null {
  return typeof navigator === "undefined" ? null : navigator.userAgent;
}

export function createPasteRuntime(options: CreatePasteRuntimeOptions = {}): PasteRuntime {
  const transport = options.transport ?? createTauriPasteTransport();
  const platform = options.platform ?? detectPastePlatform(resolveUserAgent());
  const reader = createClipboardReader(transport);
  const channel = new PasteChannel({
    transport,
    reader,
    duplicateWindowMs: options.duplicateWindowMs,
  });
  const strategy = selectPasteStrategy(platform, {
    reader: withPlainTextFallback(reader),
    insertedContentSource: () => createNativeInsertedContentSource(transport),
    resolveUri: async (uri, declaredMimeType) => {
      const item = await transport.readContentUri(uri);
      return toClipboardItem({ data: item.data, mimeType: item.mimeType.trim() || declaredMimeType });
    },
  });

  logInfo("paste-runtime", "created", { platform, strategy: strategy.kind });

  return {
    platform,
    transport,
    reader,
    channel,
    strategy,
    tempFiles: createTempFileWriter(transport),
    getPlatformVersionString: () => channel.getPlatformVersionString(),
    clearTemporaryArtifacts: () => channel.clearTemporaryArtifacts(),
  };
}
