import { logWarn } from "@/services/logger";
import { isPromiseLike } from "@/services/cleanup-stack";
import { normalizeErrorMessage } from "@/services/recoverable";

type MaybePromise<T> = T | Promise<T>;
type MaybeUnlisten = (() => MaybePromise<void>) | null | undefined;

function reportUnlistenFailure(scope: string | undefined, error: unknown) {
  logWarn("tauri-event", "unlisten_failed", {
    scope: scope ?? "unknown",
    error: normalizeErrorMessage(error),
  });
}

export function safeUnlisten(unlisten: MaybeUnlisten, scope?: string): void {
  if (!unlisten) {
    return;
  }

  try {
    const result = unlisten();
    if (isPromiseLike(result)) {
      result.then(undefined, (error: unknown) => {
        reportUnlistenFailure(scope, error);
      });
    }
  } catch (error) {
    reportUnlistenFailure(scope, error);
  }
}
