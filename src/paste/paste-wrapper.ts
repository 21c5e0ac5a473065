import type { PasteChannel, PasteEvent } from "@/paste/paste-channel";
import {
  acceptsPayload,
  fileImagePaste,
  toPasteFilter,
  UNSUPPORTED_PASTE,
  type PasteFilter,
  type PastePayload,
  type PasteType,
} from "@/paste/payload";
import type { PasteStrategy } from "@/paste/strategies/types";
import type { TempFileWriter } from "@/paste/temp-files";
import { insertTextAtSelection } from "@/paste/text-insertion";
import { CleanupStack } from "@/services/cleanup-stack";
import { logDebug, logWarn } from "@/services/logger";
import { runRecoverable, runRecoverableSync } from "@/services/recoverable";

export type PasteDelivery = "raw" | "file";

export type PasteWrapperState = "unmounted" | "disabled" | "enabled" | "disposed";

export type PasteCallback = (payload: PastePayload) => void;

export interface PasteWrapperPolicy {
  onPaste: PasteCallback;
  acceptedTypes?: Iterable<PasteType> | null;
  delivery?: PasteDelivery;
}

export interface PasteWrapperOptions extends PasteWrapperPolicy {
  channel: PasteChannel;
  strategy?: PasteStrategy | null;
  tempFiles?: TempFileWriter | null;
  enabled?: boolean;
}

let nextViewId = 1;

function allocateViewId(): number {
  const viewId = nextViewId;
  nextViewId += 1;
  return viewId;
}

export class PasteWrapper {
  readonly viewId: number;
  private readonly channel: PasteChannel;
  private readonly strategy: PasteStrategy | null;
  private readonly tempFiles: TempFileWriter | null;
  private onPasteCallback: PasteCallback;
  private filter: PasteFilter;
  private delivery: PasteDelivery;
  private wantEnabled: boolean;
  private currentState: PasteWrapperState = "unmounted";
  private element: HTMLElement | null = null;
  private session: CleanupStack | null = null;
  private sessionId = 0;
  private pendingDeliveries = 0;
  private deliveryTail: Promise<void> = Promise.resolve();

  constructor(options: PasteWrapperOptions) {
    this.viewId = allocateViewId();
    this.channel = options.channel;
    this.strategy = options.strategy ?? null;
    this.tempFiles = options.tempFiles ?? null;
    this.onPasteCallback = options.onPaste;
    this.filter = toPasteFilter(options.acceptedTypes);
    this.delivery = options.delivery ?? "raw";
    this.wantEnabled = options.enabled ?? true;
  }

  get state(): PasteWrapperState {
    return this.currentState;
  }

  mount(element: HTMLElement | null = null): void {
    if (this.currentState !== "unmounted") {
      return;
    }

    this.element = element;
    if (this.wantEnabled) {
      this.enable();
      return;
    }
    this.currentState = "disabled";
  }

  setEnabled(enabled: boolean): void {
    if (this.currentState === "disposed") {
      return;
    }

    this.wantEnabled = enabled;
    if (enabled && this.currentState === "disabled") {
      this.enable();
      return;
    }
    if (!enabled && this.currentState === "enabled") {
      this.teardown();
      this.currentState = "disabled";
    }
  }

  update(policy: Partial<PasteWrapperPolicy>): void {
    if (this.currentState === "disposed") {
      return;
    }

    if (policy.onPaste) {
      this.onPasteCallback = policy.onPaste;
    }
    if ("acceptedTypes" in policy) {
      this.filter = toPasteFilter(policy.acceptedTypes);
    }
    if (policy.delivery) {
      this.delivery = policy.delivery;
    }
  }

  dispose(): void {
    if (this.currentState === "disposed") {
      return;
    }

    this.teardown();
    this.currentState = "disposed";
    this.element = null;
    logDebug("paste-wrapper", "disposed", { viewId: this.viewId });
  }

  async pasteFromMenu(): Promise<PastePayload> {
    if (this.currentState !== "enabled") {
      return UNSUPPORTED_PASTE;
    }

    const sessionId = this.sessionId;
    const payload = await this.channel.getCurrentPayload();
    if (!this.isLive(sessionId)) {
      return UNSUPPORTED_PASTE;
    }

    if (payload.kind === "text") {
      insertTextAtSelection(this.element, payload.text);
    }
    this.deliver(payload, sessionId);
    return payload;
  }

  whenDelivered(): Promise<void> {
    return this.deliveryTail;
  }

  private enable(): void {
    this.channel.initialize();
    this.channel.registerView(this.viewId);

    this.sessionId += 1;
    const sessionId = this.sessionId;
    const stack = new CleanupStack(`paste-wrapper:${this.viewId}`);
    this.session = stack;

    stack.add(() => this.channel.unregisterView(this.viewId), "register");
    stack.add(
      this.channel.onPaste((event) => this.handleEvent(event, sessionId)),
      "subscribe",
    );

    if (this.strategy) {
      stack.add(
        this.strategy.attach({ element: this.element, viewId: this.viewId }, (signal) => {
          void this.channel.publish(signal.content, { viewId: this.viewId, source: signal.kind });
        }),
        "strategy",
      );
    }

    this.currentState = "enabled";
    logDebug("paste-wrapper", "enabled", { viewId: this.viewId, strategy: this.strategy?.kind ?? "none" });
  }

  private teardown(): void {
    this.sessionId += 1;
    this.session?.flush();
    this.session = null;
  }

  private isLive(sessionId: number): boolean {
    return this.currentState === "enabled" && sessionId === this.sessionId;
  }

  private handleEvent(event: PasteEvent, sessionId: number): void {
    if (event.viewId !== null && event.viewId !== this.viewId) {
      return;
    }
    // 挂了策略的视图只认策略信号，宿主的 paste-detected 对它是同一次粘贴的重复上报
    if (this.strategy && event.source === "native") {
      logDebug("paste-wrapper", "paste_native_shadowed", { viewId: this.viewId, strategy: this.strategy.kind });
      return;
    }
    this.deliver(event.payload, sessionId);
  }

  private deliver(payload: PastePayload, sessionId: number): void {
    if (!acceptsPayload(this.filter, payload)) {
      logDebug("paste-wrapper", "paste_filtered", { viewId: this.viewId, kind: payload.kind });
      return;
    }

    const needsConversion = payload.kind === "image" && this.delivery === "file";
    if (!needsConversion && this.pendingDeliveries === 0) {
      this.invokeCallback(payload, sessionId);
      return;
    }

    // 有转换在途时排队，保证同一实例按检测顺序交付
    this.pendingDeliveries += 1;
    const converted = needsConversion ? this.convertToFiles(payload) : Promise.resolve(payload);
    this.deliveryTail = this.deliveryTail.then(async () => {
      const resolved = await converted;
      this.pendingDeliveries -= 1;
      this.invokeCallback(resolved, sessionId);
    });
  }

  private async convertToFiles(payload: PastePayload): Promise<PastePayload> {
    if (payload.kind !== "image") {
      return payload;
    }

    const items = payload.items;
    const tempFiles = this.tempFiles;
    if (!tempFiles) {
      logWarn("paste-wrapper", "temp_file_writer_missing", { viewId: this.viewId });
      return UNSUPPORTED_PASTE;
    }

    const result = await runRecoverable(
      async () => {
        const written = await tempFiles.writeImages(items);
        return fileImagePaste(written.uris, written.mimeTypes);
      },
      {
        scope: "paste-wrapper",
        action: "temp_file_write",
        metadata: { viewId: this.viewId, count: items.length },
      },
    );
    if (!result.ok || result.data.uris.length === 0) {
      return UNSUPPORTED_PASTE;
    }
    return result.data;
  }

  private invokeCallback(payload: PastePayload, sessionId: number): void {
    if (!this.isLive(sessionId)) {
      logDebug("paste-wrapper", "paste_dropped_inactive", { viewId: this.viewId, kind: payload.kind });
      return;
    }

    const callback = this.onPasteCallback;
    runRecoverableSync(() => callback(payload), {
      scope: "paste-wrapper",
      action: "paste_callback",
      metadata: { viewId: this.viewId, kind: payload.kind },
    });
  }
}
