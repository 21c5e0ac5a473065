import type { ClipboardReader } from "@/paste/clipboard-reader";
import { createEventGuard } from "@/paste/strategies/event-guard";
import type { PasteStrategy } from "@/paste/strategies/types";
import { logDebug } from "@/services/logger";

export function createReplacementInterceptionStrategy(reader: Pick<ClipboardReader, "read">): PasteStrategy {
  const guard = createEventGuard();

  return {
    kind: "replacement_interception",
    attach(target, onPaste) {
      const { element, viewId } = target;
      if (!element) {
        return () => {};
      }

      let attached = true;
      const handlePaste = (event: Event) => {
        if (!attached || !guard.claim(event)) {
          return;
        }

        logDebug("paste-strategy", "paste_command_intercepted", { viewId });
        onPaste({
          kind: "replacement_interception",
          content: reader.read(),
        });
        // 不调用 preventDefault，保留输入框自身的粘贴行为
      };

      element.addEventListener("paste", handlePaste);
      return () => {
        attached = false;
        element.removeEventListener("paste", handlePaste);
      };
    },
  };
}
