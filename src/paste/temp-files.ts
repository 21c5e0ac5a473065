import type { ClipboardItem } from "@/paste/payload";
import type { PasteTransport } from "@/services/paste-transport";

export const TEMP_FILE_PREFIX = "paste_";

export interface WrittenImages {
  uris: string[];
  mimeTypes: string[];
}

export interface TempFileWriter {
  writeImages: (items: readonly ClipboardItem[]) => Promise<WrittenImages>;
  clear: () => Promise<void>;
}

const EXTENSION_BY_MIME_TYPE: Record<string, string> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/jpg": "jpg",
  "image/gif": "gif",
  "image/webp": "webp",
};

export function extensionForMimeType(mimeType: string): string {
  return EXTENSION_BY_MIME_TYPE[mimeType.toLowerCase()] ?? "png";
}

export function buildTempFileName(timestamp: number, index: number, mimeType: string): string {
  return `${TEMP_FILE_PREFIX}${timestamp}_${index}.${extensionForMimeType(mimeType)}`;
}

export function createTempFileWriter(
  transport: Pick<PasteTransport, "writeTempFile" | "clearTempFiles">,
  now: () => number = Date.now,
): TempFileWriter {
  return {
    async writeImages(items) {
      const timestamp = now();
      const uris: string[] = [];
      const mimeTypes: string[] = [];

      for (const [index, item] of items.entries()) {
        const uri = await transport.writeTempFile({
          fileName: buildTempFileName(timestamp, index, item.mimeType),
          data: Array.from(item.data),
        });
        uris.push(uri);
        mimeTypes.push(item.mimeType);
      }

      return { uris, mimeTypes };
    },
    clear() {
      return transport.clearTempFiles();
    },
  };
}
