import { useEffect, type DependencyList } from "react";

import { CleanupStack } from "@/services/cleanup-stack";
import { logWarn } from "@/services/logger";
import { normalizeErrorMessage } from "@/services/recoverable";

export interface AsyncEffectContext {
  stack: CleanupStack;
  isDisposed: () => boolean;
}

interface UseAsyncEffectOptions {
  scope?: string;
  onError?: (error: unknown) => void;
}

export function useAsyncEffect(
  effect: (context: AsyncEffectContext) => Promise<void> | void,
  deps: DependencyList,
  options?: UseAsyncEffectOptions,
): void {
  const { scope, onError } = options ?? {};

  useEffect(() => {
    const stack = new CleanupStack(scope);
    let disposed = false;

    Promise.resolve(effect({ stack, isDisposed: () => disposed })).catch((error: unknown) => {
      if (onError) {
        onError(error);
        return;
      }
      logWarn("async-effect", "setup_failed", { scope: scope ?? "unknown", error: normalizeErrorMessage(error) });
    });

    return () => {
      disposed = true;
      stack.flush();
    };
  }, deps);
}
