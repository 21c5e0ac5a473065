export { classifyClipboardContent, decodeUtf8, isImageMimeType, isTextMimeType } from "@/paste/classifier";
export { toClipboardContent, toClipboardItem, toClipboardItemDto } from "@/paste/clipboard-content";
export { createClipboardReader, withPlainTextFallback } from "@/paste/clipboard-reader";
export type { ClipboardReader } from "@/paste/clipboard-reader";
export { PasteChannel } from "@/paste/paste-channel";
export type { PasteChannelOptions, PasteEvent, PasteEventSource, PasteListener, PublishMeta } from "@/paste/paste-channel";
export {
  acceptsPayload,
  clipboardItem,
  EMPTY_CLIPBOARD_CONTENT,
  fileImagePaste,
  hasGif,
  imageCount,
  imagePaste,
  matchPastePayload,
  payloadEquals,
  payloadMimeTypes,
  payloadType,
  textPaste,
  toPasteFilter,
  UNSUPPORTED_PASTE,
} from "@/paste/payload";
export type {
  ClipboardContent,
  ClipboardItem,
  FileImagePaste,
  ImagePaste,
  PasteFilter,
  PastePayload,
  PastePayloadHandlers,
  PastePayloadKind,
  PasteType,
  TextPaste,
  UnsupportedPaste,
} from "@/paste/payload";
export { PasteWrapper } from "@/paste/paste-wrapper";
export type { PasteCallback, PasteDelivery, PasteWrapperOptions, PasteWrapperPolicy, PasteWrapperState } from "@/paste/paste-wrapper";
export { createPasteRuntime } from "@/paste/runtime";
export type { CreatePasteRuntimeOptions, PasteRuntime } from "@/paste/runtime";
export {
  createContentInsertionStrategy,
  createNativeInsertedContentSource,
} from "@/paste/strategies/content-insertion";
export type { ContentUriResolver, InsertedContent, InsertedContentSource } from "@/paste/strategies/content-insertion";
export { createManualTriggerStrategy, isPasteShortcut } from "@/paste/strategies/manual-trigger";
export { createReplacementInterceptionStrategy } from "@/paste/strategies/replacement-interception";
export { detectPastePlatform, selectPasteStrategy } from "@/paste/strategies/select";
export type { PastePlatform, PasteStrategyDeps } from "@/paste/strategies/select";
export type { PasteSignal, PasteStrategy, PasteStrategyKind, PasteTarget } from "@/paste/strategies/types";
export { buildTempFileName, createTempFileWriter, extensionForMimeType, TEMP_FILE_PREFIX } from "@/paste/temp-files";
export type { TempFileWriter, WrittenImages } from "@/paste/temp-files";
export { insertTextAtSelection } from "@/paste/text-insertion";
