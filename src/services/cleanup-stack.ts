import { logWarn } from "@/services/logger";
import { normalizeErrorMessage } from "@/services/recoverable";

type MaybePromise<T> = T | Promise<T>;

export type CleanupFn = () => MaybePromise<void>;

interface CleanupEntry {
  fn: CleanupFn;
  scope?: string;
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}

function reportCleanupFailure(scope: string | undefined, error: unknown) {
  logWarn("cleanup-stack", "cleanup_failed", {
    scope: scope ?? "unknown",
    error: normalizeErrorMessage(error),
  });
}

function runCleanup(entry: CleanupEntry, baseScope?: string): void {
  const scope = baseScope && entry.scope ? `${baseScope}:${entry.scope}` : entry.scope ?? baseScope;

  try {
    const result = entry.fn();
    if (isPromiseLike(result)) {
      result.then(undefined, (error: unknown) => {
        reportCleanupFailure(scope, error);
      });
    }
  } catch (error) {
    reportCleanupFailure(scope, error);
  }
}

export class CleanupStack {
  private readonly entries: CleanupEntry[] = [];
  private flushed = false;

  constructor(private readonly scope?: string) {}

  get isFlushed(): boolean {
    return this.flushed;
  }

  add(fn: CleanupFn | null | undefined, scope?: string): void {
    if (!fn) {
      return;
    }

    const entry: CleanupEntry = { fn, scope };
    if (this.flushed) {
      runCleanup(entry, this.scope);
      return;
    }

    this.entries.push(entry);
  }

  flush(): void {
    if (this.flushed) {
      return;
    }
    this.flushed = true;

    while (this.entries.length > 0) {
      const entry = this.entries.pop();
      if (!entry) {
        continue;
      }
      runCleanup(entry, this.scope);
    }
  }
}
