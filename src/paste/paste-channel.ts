import type { PasteDetectedEventDto } from "@/contracts";
import { classifyClipboardContent } from "@/paste/classifier";
import { toClipboardContent } from "@/paste/clipboard-content";
import type { ClipboardReader } from "@/paste/clipboard-reader";
import {
  payloadEquals,
  textPaste,
  UNSUPPORTED_PASTE,
  type ClipboardContent,
  type PastePayload,
} from "@/paste/payload";
import type { PasteStrategyKind } from "@/paste/strategies/types";
import { CleanupStack } from "@/services/cleanup-stack";
import { logDebug, logInfo } from "@/services/logger";
import type { PasteTransport } from "@/services/paste-transport";
import { runRecoverable, runRecoverableOr, runRecoverableSync } from "@/services/recoverable";

export type PasteEventSource = "native" | PasteStrategyKind;

export interface PasteEvent {
  payload: PastePayload;
  viewId: number | null;
  source: PasteEventSource;
}

export type PasteListener = (event: PasteEvent) => void;

export interface PublishMeta {
  viewId: number | null;
  source: PasteEventSource;
}

export interface PasteChannelOptions {
  transport: Pick<PasteTransport, "listenPasteDetected" | "getPlatformVersion" | "clearTempFiles">;
  reader: ClipboardReader;
  duplicateWindowMs?: number;
  now?: () => number;
}

interface RecentEmission {
  event: PasteEvent;
  at: number;
}

const DEFAULT_DUPLICATE_WINDOW_MS = 120;
const MAX_RECENT_EMISSIONS = 8;

function sameAudience(left: number | null, right: number | null): boolean {
  return left === null || right === null || left === right;
}

export class PasteChannel {
  private readonly transport: PasteChannelOptions["transport"];
  private readonly reader: ClipboardReader;
  private readonly duplicateWindowMs: number;
  private readonly now: () => number;
  private readonly listeners = new Set<PasteListener>();
  private readonly views = new Set<number>();
  private recent: RecentEmission[] = [];
  private stack: CleanupStack | null = null;
  private generation = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: PasteChannelOptions) {
    this.transport = options.transport;
    this.reader = options.reader;
    this.duplicateWindowMs = options.duplicateWindowMs ?? DEFAULT_DUPLICATE_WINDOW_MS;
    this.now = options.now ?? Date.now;
  }

  get initialized(): boolean {
    return this.stack !== null;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  initialize(): void {
    if (this.stack) {
      return;
    }

    this.generation += 1;
    const generation = this.generation;
    const stack = new CleanupStack("paste-channel");
    this.stack = stack;

    void runRecoverable(
      () => this.transport.listenPasteDetected((event) => this.handleNativeEvent(event, generation)),
      { scope: "paste-channel", action: "paste_detected_listen" },
    ).then((result) => {
      if (result.ok) {
        stack.add(result.data, "paste-detected");
      }
    });
    logInfo("paste-channel", "initialized", { generation });
  }

  dispose(): void {
    if (!this.stack) {
      return;
    }

    this.generation += 1;
    const stack = this.stack;
    this.stack = null;
    this.recent = [];
    // 旧代的读取可能永不返回，新代从空队列开始
    this.tail = Promise.resolve();
    stack.flush();
    logInfo("paste-channel", "disposed", { generation: this.generation });
  }

  onPaste(listener: PasteListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  registerView(viewId: number): void {
    this.views.add(viewId);
  }

  unregisterView(viewId: number): void {
    this.views.delete(viewId);
  }

  isViewRegistered(viewId: number): boolean {
    return this.views.has(viewId);
  }

  publish(content: ClipboardContent | Promise<ClipboardContent>, meta: PublishMeta): Promise<boolean> {
    if (!this.stack) {
      logDebug("paste-channel", "publish_dropped_uninitialized", { ...meta });
      return Promise.resolve(false);
    }
    return this.enqueue(content, meta);
  }

  drain(): Promise<void> {
    return this.tail;
  }

  async getCurrentPayload(): Promise<PastePayload> {
    const result = await this.reader.tryRead();
    if (result.ok) {
      return classifyClipboardContent(result.data);
    }

    const text = await this.reader.readPlainText();
    return text === null ? UNSUPPORTED_PASTE : textPaste(text);
  }

  getPlatformVersionString(): Promise<string | null> {
    return runRecoverableOr(() => this.transport.getPlatformVersion(), null, {
      scope: "paste-channel",
      action: "platform_version",
      silent: true,
    });
  }

  clearTemporaryArtifacts(): Promise<boolean> {
    return runRecoverableOr(
      async () => {
        await this.transport.clearTempFiles();
        return true;
      },
      false,
      { scope: "paste-channel", action: "clear_temp_files" },
    );
  }

  private handleNativeEvent(event: PasteDetectedEventDto, generation: number): void {
    if (generation !== this.generation || !this.stack) {
      return;
    }

    const viewId = typeof event.viewId === "number" ? event.viewId : null;
    void this.enqueue(toClipboardContent(event.content), { viewId, source: "native" });
  }

  private enqueue(content: ClipboardContent | Promise<ClipboardContent>, meta: PublishMeta): Promise<boolean> {
    const generation = this.generation;
    // 以检测时刻而不是读取完成时刻参与去重
    const detectedAt = this.now();
    const pending = runRecoverableOr(async () => classifyClipboardContent(await content), UNSUPPORTED_PASTE, {
      scope: "paste-channel",
      action: "paste_content_resolve",
      metadata: { ...meta },
    });

    const emitted = this.tail.then(async () => {
      const payload = await pending;
      if (generation !== this.generation || !this.stack) {
        logDebug("paste-channel", "paste_dropped_disposed", { ...meta });
        return false;
      }
      return this.emit({ payload, viewId: meta.viewId, source: meta.source }, detectedAt);
    });
    this.tail = emitted.then(() => undefined);
    return emitted;
  }

  private isDuplicate(event: PasteEvent, at: number): boolean {
    return this.recent.some(
      (entry) =>
        at - entry.at <= this.duplicateWindowMs &&
        entry.event.source !== event.source &&
        sameAudience(entry.event.viewId, event.viewId) &&
        payloadEquals(entry.event.payload, event.payload),
    );
  }

  private emit(event: PasteEvent, at: number): boolean {
    if (event.viewId !== null && !this.views.has(event.viewId)) {
      logDebug("paste-channel", "paste_dropped_unregistered_view", { viewId: event.viewId, source: event.source });
      return false;
    }

    if (this.isDuplicate(event, at)) {
      logDebug("paste-channel", "paste_dropped_duplicate", { viewId: event.viewId, source: event.source });
      return false;
    }
    this.recent = [...this.recent, { event, at }].slice(-MAX_RECENT_EMISSIONS);

    logDebug("paste-channel", "paste_emitted", {
      viewId: event.viewId,
      source: event.source,
      kind: event.payload.kind,
      listeners: this.listeners.size,
    });

    [...this.listeners].forEach((listener) => {
      if (!this.listeners.has(listener)) {
        return;
      }
      runRecoverableSync(() => listener(event), {
        scope: "paste-channel",
        action: "paste_listener",
        metadata: { viewId: event.viewId },
      });
    });
    return true;
  }
}
