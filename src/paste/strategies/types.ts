import type { ClipboardContent } from "@/paste/payload";

export type PasteStrategyKind = "replacement_interception" | "content_insertion" | "manual_trigger";

export interface PasteSignal {
  kind: PasteStrategyKind;
  content: Promise<ClipboardContent>;
}

export interface PasteTarget {
  element: HTMLElement | null;
  viewId: number;
}

export type PasteSignalHandler = (signal: PasteSignal) => void;

export interface PasteStrategy {
  readonly kind: PasteStrategyKind;
  attach: (target: PasteTarget, onPaste: PasteSignalHandler) => () => void;
}
