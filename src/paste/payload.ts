export type PasteType = "text" | "image";

export interface ClipboardItem {
  readonly data: Uint8Array;
  readonly mimeType: string;
}

export interface ClipboardContent {
  readonly items: readonly ClipboardItem[];
}

export interface TextPaste {
  readonly kind: "text";
  readonly text: string;
}

export interface ImagePaste {
  readonly kind: "image";
  readonly items: readonly ClipboardItem[];
}

export interface FileImagePaste {
  readonly kind: "file_image";
  readonly uris: readonly string[];
  readonly mimeTypes: readonly string[];
}

export interface UnsupportedPaste {
  readonly kind: "unsupported";
}

export type PastePayload = TextPaste | ImagePaste | FileImagePaste | UnsupportedPaste;

export type PastePayloadKind = PastePayload["kind"];

export type PasteFilter = ReadonlySet<PasteType> | undefined;

export const EMPTY_CLIPBOARD_CONTENT: ClipboardContent = Object.freeze({ items: Object.freeze([]) });

export const UNSUPPORTED_PASTE: UnsupportedPaste = Object.freeze({ kind: "unsupported" });

export function clipboardItem(data: Uint8Array, mimeType: string): ClipboardItem {
  return Object.freeze({ data, mimeType });
}

export function textPaste(text: string): TextPaste {
  return Object.freeze({ kind: "text", text });
}

export function imagePaste(items: readonly ClipboardItem[]): ImagePaste {
  return Object.freeze({ kind: "image", items: Object.freeze([...items]) });
}

export function fileImagePaste(uris: readonly string[], mimeTypes: readonly string[]): FileImagePaste {
  if (uris.length !== mimeTypes.length) {
    throw new RangeError(`file image paste expects parallel lists, got ${uris.length} uris and ${mimeTypes.length} mime types`);
  }
  return Object.freeze({
    kind: "file_image",
    uris: Object.freeze([...uris]),
    mimeTypes: Object.freeze([...mimeTypes]),
  });
}

export function assertNever(value: never): never {
  throw new Error(`unexpected paste payload: ${JSON.stringify(value)}`);
}

export interface PastePayloadHandlers<R> {
  text: (payload: TextPaste) => R;
  image: (payload: ImagePaste) => R;
  file_image: (payload: FileImagePaste) => R;
  unsupported: (payload: UnsupportedPaste) => R;
}

export function matchPastePayload<R>(payload: PastePayload, handlers: PastePayloadHandlers<R>): R {
  switch (payload.kind) {
    case "text":
      return handlers.text(payload);
    case "image":
      return handlers.image(payload);
    case "file_image":
      return handlers.file_image(payload);
    case "unsupported":
      return handlers.unsupported(payload);
    default:
      return assertNever(payload);
  }
}

export function payloadType(payload: PastePayload): PasteType | null {
  return matchPastePayload<PasteType | null>(payload, {
    text: () => "text",
    image: () => "image",
    file_image: () => "image",
    unsupported: () => null,
  });
}

export function payloadMimeTypes(payload: PastePayload): string[] {
  return matchPastePayload(payload, {
    text: () => ["text/plain"],
    image: (image) => image.items.map((item) => item.mimeType),
    file_image: (fileImage) => [...fileImage.mimeTypes],
    unsupported: () => [],
  });
}

export function imageCount(payload: PastePayload): number {
  return matchPastePayload(payload, {
    text: () => 0,
    image: (image) => image.items.length,
    file_image: (fileImage) => fileImage.uris.length,
    unsupported: () => 0,
  });
}

export function hasGif(payload: PastePayload): boolean {
  return payloadMimeTypes(payload).some((mimeType) => mimeType === "image/gif");
}

function bytesEqual(left: Uint8Array, right: Uint8Array): boolean {
  if (left.length !== right.length) {
    return false;
  }
  for (let index = 0; index < left.length; index += 1) {
    if (left[index] !== right[index]) {
      return false;
    }
  }
  return true;
}

function listEqual<T>(left: readonly T[], right: readonly T[], equals: (a: T, b: T) => boolean): boolean {
  if (left.length !== right.length) {
    return false;
  }
  return left.every((item, index) => equals(item, right[index]));
}

export function clipboardItemEquals(left: ClipboardItem, right: ClipboardItem): boolean {
  return left.mimeType === right.mimeType && bytesEqual(left.data, right.data);
}

export function payloadEquals(left: PastePayload, right: PastePayload): boolean {
  if (left === right) {
    return true;
  }

  switch (left.kind) {
    case "text":
      return right.kind === "text" && left.text === right.text;
    case "image":
      return right.kind === "image" && listEqual(left.items, right.items, clipboardItemEquals);
    case "file_image":
      return (
        right.kind === "file_image" &&
        listEqual(left.uris, right.uris, (a, b) => a === b) &&
        listEqual(left.mimeTypes, right.mimeTypes, (a, b) => a === b)
      );
    case "unsupported":
      return right.kind === "unsupported";
    default:
      return assertNever(left);
  }
}

export function acceptsPayload(filter: PasteFilter, payload: PastePayload): boolean {
  const type = payloadType(payload);
  if (type === null) {
    return true;
  }
  if (filter === undefined) {
    return true;
  }
  return filter.has(type);
}

export function toPasteFilter(acceptedTypes: Iterable<PasteType> | null | undefined): PasteFilter {
  if (acceptedTypes === null || acceptedTypes === undefined) {
    return undefined;
  }
  return new Set(acceptedTypes);
}
