import type { ClipboardReader } from "@/paste/clipboard-reader";
import { createEventGuard } from "@/paste/strategies/event-guard";
import type { PasteStrategy } from "@/paste/strategies/types";
import { logDebug } from "@/services/logger";

export function isPasteShortcut(event: KeyboardEvent): boolean {
  if (event.repeat || event.altKey) {
    return false;
  }

  const key = event.key.toLowerCase();
  if ((event.ctrlKey || event.metaKey) && !event.shiftKey && key === "v") {
    return true;
  }

  return event.shiftKey && !event.ctrlKey && !event.metaKey && key === "insert";
}

export function createManualTriggerStrategy(reader: Pick<ClipboardReader, "read">): PasteStrategy {
  const guard = createEventGuard();

  return {
    kind: "manual_trigger",
    attach(target, onPaste) {
      const { element, viewId } = target;
      if (!element) {
        return () => {};
      }

      let attached = true;
      const handleKeyDown = (event: KeyboardEvent) => {
        if (!attached || !isPasteShortcut(event) || !guard.claim(event)) {
          return;
        }

        logDebug("paste-strategy", "paste_shortcut_detected", { viewId });
        onPaste({
          kind: "manual_trigger",
          content: reader.read(),
        });
      };

      element.addEventListener("keydown", handleKeyDown);
      return () => {
        attached = false;
        element.removeEventListener("keydown", handleKeyDown);
      };
    },
  };
}
