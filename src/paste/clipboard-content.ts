import type { ClipboardContentDto, ClipboardItemDto } from "@/contracts";
import { clipboardItem, EMPTY_CLIPBOARD_CONTENT, type ClipboardContent, type ClipboardItem } from "@/paste/payload";

function isByte(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 255;
}

export function toClipboardItem(dto: unknown): ClipboardItem | null {
  if (typeof dto !== "object" || dto === null) {
    return null;
  }

  const mimeType: unknown = "mimeType" in dto ? dto.mimeType : undefined;
  const data: unknown = "data" in dto ? dto.data : undefined;
  if (typeof mimeType !== "string" || mimeType.trim().length === 0) {
    return null;
  }

  if (data instanceof Uint8Array) {
    return clipboardItem(Uint8Array.from(data), mimeType.trim().toLowerCase());
  }

  if (!Array.isArray(data) || !data.every(isByte)) {
    return null;
  }

  return clipboardItem(Uint8Array.from(data), mimeType.trim().toLowerCase());
}

export function toClipboardContent(dto: ClipboardContentDto | null | undefined): ClipboardContent {
  if (!dto || !Array.isArray(dto.items) || dto.items.length === 0) {
    return EMPTY_CLIPBOARD_CONTENT;
  }

  const items = dto.items.flatMap((item) => {
    const converted = toClipboardItem(item);
    return converted ? [converted] : [];
  });
  return Object.freeze({ items: Object.freeze(items) });
}

export function toClipboardItemDto(item: ClipboardItem): ClipboardItemDto {
  return {
    data: Array.from(item.data),
    mimeType: item.mimeType,
  };
}
