import {
  imagePaste,
  textPaste,
  UNSUPPORTED_PASTE,
  type ClipboardContent,
  type ClipboardItem,
  type PastePayload,
} from "@/paste/payload";

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export function isImageMimeType(mimeType: string): boolean {
  return mimeType.startsWith("image/");
}

export function isTextMimeType(mimeType: string): boolean {
  return mimeType.startsWith("text/");
}

export function decodeUtf8(data: Uint8Array): string | null {
  try {
    return utf8Decoder.decode(data);
  } catch {
    return null;
  }
}

export function classifyClipboardContent(content: ClipboardContent): PastePayload {
  const imageItems: ClipboardItem[] = [];
  const textItems: ClipboardItem[] = [];

  for (const item of content.items) {
    if (isImageMimeType(item.mimeType)) {
      // 空字节的图片视为缺失，不参与优先级判定
      if (item.data.length > 0) {
        imageItems.push(item);
      }
      continue;
    }
    if (isTextMimeType(item.mimeType)) {
      textItems.push(item);
    }
  }

  if (imageItems.length > 0) {
    return imagePaste(imageItems);
  }

  if (textItems.length > 0) {
    const text = decodeUtf8(textItems[0].data);
    if (text !== null) {
      return textPaste(text);
    }
  }

  return UNSUPPORTED_PASTE;
}
