import { create } from "zustand";

import type { PastedAttachment } from "@/components/paste/types";
import { matchPastePayload, type PastePayload, type PastePayloadKind } from "@/paste/payload";
import { runRecoverable } from "@/services/recoverable";

export interface ChatMessage {
  id: string;
  text: string;
  attachments: PastedAttachment[];
  sentAt: number;
}

export interface LastPasteSummary {
  kind: PastePayloadKind;
  count: number;
  at: number;
}

interface ChatInputState {
  draft: string;
  attachments: PastedAttachment[];
  messages: ChatMessage[];
  lastPaste: LastPasteSummary | null;
  error: string | null;
}

interface ChatInputActions {
  setDraft: (draft: string) => void;
  applyPaste: (payload: PastePayload) => void;
  removeAttachment: (id: string) => void;
  clearAttachments: (clearTemporaryArtifacts?: () => Promise<boolean>) => Promise<void>;
  sendMessage: () => ChatMessage | null;
  reset: () => void;
}

type ChatInputStore = ChatInputState & ChatInputActions;

let nextId = 1;

function createId(prefix: string): string {
  const id = `${prefix}-${nextId}`;
  nextId += 1;
  return id;
}

export function attachmentsFromPayload(payload: PastePayload, now: number): PastedAttachment[] {
  return matchPastePayload<PastedAttachment[]>(payload, {
    text: () => [],
    image: (image) =>
      image.items.map((item) => ({
        id: createId("attachment"),
        mimeType: item.mimeType,
        source: "bytes",
        data: item.data,
        uri: null,
        createdAt: now,
      })),
    file_image: (fileImage) =>
      fileImage.uris.map((uri, index) => ({
        id: createId("attachment"),
        mimeType: fileImage.mimeTypes[index] ?? "image/png",
        source: "file",
        data: null,
        uri,
        createdAt: now,
      })),
    unsupported: () => [],
  });
}

function pasteCount(payload: PastePayload): number {
  return matchPastePayload(payload, {
    text: (text) => text.text.length,
    image: (image) => image.items.length,
    file_image: (fileImage) => fileImage.uris.length,
    unsupported: () => 0,
  });
}

const initialState: ChatInputState = {
  draft: "",
  attachments: [],
  messages: [],
  lastPaste: null,
  error: null,
};

export const useChatInputStore = create<ChatInputStore>((set, get) => ({
  ...initialState,
  setDraft(draft) {
    set({ draft });
  },
  applyPaste(payload) {
    const now = Date.now();
    const added = attachmentsFromPayload(payload, now);
    set((state) => ({
      attachments: added.length > 0 ? [...state.attachments, ...added] : state.attachments,
      lastPaste: { kind: payload.kind, count: pasteCount(payload), at: now },
    }));
  },
  removeAttachment(id) {
    set((state) => ({ attachments: state.attachments.filter((attachment) => attachment.id !== id) }));
  },
  async clearAttachments(clearTemporaryArtifacts) {
    const hadFiles = get().attachments.some((attachment) => attachment.source === "file");
    set({ attachments: [], error: null });
    if (!hadFiles || !clearTemporaryArtifacts) {
      return;
    }

    const result = await runRecoverable(
      async () => {
        const cleared = await clearTemporaryArtifacts();
        if (!cleared) {
          throw new Error("clear temporary files failed");
        }
      },
      { scope: "chat-input-store", action: "clear_attachments" },
    );
    if (!result.ok) {
      set({ error: result.message });
    }
  },
  sendMessage() {
    const { draft, attachments } = get();
    const text = draft.trim();
    if (!text && attachments.length === 0) {
      return null;
    }

    const message: ChatMessage = {
      id: createId("message"),
      text,
      attachments,
      sentAt: Date.now(),
    };
    set((state) => ({
      draft: "",
      attachments: [],
      messages: [...state.messages, message],
    }));
    return message;
  },
  reset() {
    set(initialState);
  },
}));
