import { toClipboardContent } from "@/paste/clipboard-content";
import { clipboardItem, EMPTY_CLIPBOARD_CONTENT, type ClipboardContent } from "@/paste/payload";
import type { PasteTransport } from "@/services/paste-transport";
import { runRecoverable, runRecoverableOr, type RecoverableResult } from "@/services/recoverable";

export interface ClipboardReader {
  read: () => Promise<ClipboardContent>;
  tryRead: () => Promise<RecoverableResult<ClipboardContent>>;
  readPlainText: () => Promise<string | null>;
}

export function createClipboardReader(transport: Pick<PasteTransport, "getClipboardContent" | "readPlainText">): ClipboardReader {
  const tryRead = () =>
    runRecoverable(async () => toClipboardContent(await transport.getClipboardContent()), {
      scope: "clipboard-reader",
      action: "clipboard_read",
      message: "clipboard read failed",
    });

  return {
    tryRead,
    async read() {
      const result = await tryRead();
      return result.ok ? result.data : EMPTY_CLIPBOARD_CONTENT;
    },
    async readPlainText() {
      const text = await runRecoverableOr(() => transport.readPlainText(), "", {
        scope: "clipboard-reader",
        action: "plain_text_read",
      });
      return text.length === 0 ? null : text;
    },
  };
}

const utf8Encoder = new TextEncoder();

export function withPlainTextFallback(reader: ClipboardReader): Pick<ClipboardReader, "read"> {
  return {
    async read() {
      const result = await reader.tryRead();
      if (result.ok) {
        return result.data;
      }

      const text = await reader.readPlainText();
      if (text === null) {
        return EMPTY_CLIPBOARD_CONTENT;
      }
      return Object.freeze({ items: Object.freeze([clipboardItem(utf8Encoder.encode(text), "text/plain")]) });
    },
  };
}
