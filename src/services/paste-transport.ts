import { listen, type UnlistenFn } from "@tauri-apps/api/event";

import type {
  ClipboardContentDto,
  ClipboardItemDto,
  ContentInsertedEventDto,
  PasteDetectedEventDto,
  WriteTempFileInputDto,
} from "@/contracts";
import { invokeWithLog } from "@/services/invoke";
import { safeUnlisten } from "@/services/tauri-event";

export const PASTE_PLUGIN_COMMANDS = {
  getClipboardContent: "plugin:paste-input|get_clipboard_content",
  getPlatformVersion: "plugin:paste-input|get_platform_version",
  clearTempFiles: "plugin:paste-input|clear_temp_files",
  writeTempFile: "plugin:paste-input|write_temp_file",
  readContentUri: "plugin:paste-input|read_content_uri",
} as const;

export const PASTE_PLUGIN_EVENTS = {
  pasteDetected: "paste-input://paste-detected",
  contentInserted: "paste-input://content-inserted",
} as const;

export interface PasteTransport {
  getClipboardContent: () => Promise<ClipboardContentDto>;
  getPlatformVersion: () => Promise<string>;
  clearTempFiles: () => Promise<void>;
  writeTempFile: (input: WriteTempFileInputDto) => Promise<string>;
  readContentUri: (uri: string) => Promise<ClipboardItemDto>;
  readPlainText: () => Promise<string>;
  listenPasteDetected: (handler: (event: PasteDetectedEventDto) => void) => Promise<UnlistenFn>;
  listenContentInserted: (handler: (event: ContentInsertedEventDto) => void) => Promise<UnlistenFn>;
}

async function readPlainTextFromWebview(): Promise<string> {
  if (typeof navigator === "undefined" || !navigator.clipboard || typeof navigator.clipboard.readText !== "function") {
    throw new Error("navigator.clipboard.readText is not available");
  }
  return navigator.clipboard.readText();
}

export function createTauriPasteTransport(): PasteTransport {
  return {
    getClipboardContent() {
      return invokeWithLog<ClipboardContentDto>(PASTE_PLUGIN_COMMANDS.getClipboardContent);
    },
    getPlatformVersion() {
      return invokeWithLog<string>(PASTE_PLUGIN_COMMANDS.getPlatformVersion, undefined, { silent: true });
    },
    async clearTempFiles() {
      await invokeWithLog<void>(PASTE_PLUGIN_COMMANDS.clearTempFiles);
    },
    writeTempFile(input) {
      return invokeWithLog<string>(PASTE_PLUGIN_COMMANDS.writeTempFile, { input });
    },
    readContentUri(uri) {
      return invokeWithLog<ClipboardItemDto>(PASTE_PLUGIN_COMMANDS.readContentUri, { uri });
    },
    readPlainText() {
      return readPlainTextFromWebview();
    },
    async listenPasteDetected(handler) {
      const unlisten = await listen<PasteDetectedEventDto>(PASTE_PLUGIN_EVENTS.pasteDetected, (event) => {
        handler(event.payload);
      });
      return () => safeUnlisten(unlisten, PASTE_PLUGIN_EVENTS.pasteDetected);
    },
    async listenContentInserted(handler) {
      const unlisten = await listen<ContentInsertedEventDto>(PASTE_PLUGIN_EVENTS.contentInserted, (event) => {
        handler(event.payload);
      });
      return () => safeUnlisten(unlisten, PASTE_PLUGIN_EVENTS.contentInserted);
    },
  };
}
