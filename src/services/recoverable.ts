import { logWarn } from "@/services/logger";

export type RecoverableResult<T> = { ok: true; data: T } | { ok: false; message: string; code?: string };

export interface RecoverableContext {
  scope: string;
  action: string;
  message?: string;
  metadata?: Record<string, unknown>;
  silent?: boolean;
}

function readHostErrorField(error: unknown, field: "message" | "code"): string | undefined {
  if (typeof error !== "object" || error === null || error instanceof Error) {
    return undefined;
  }

  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" && value.trim().length > 0 ? value : undefined;
}

/**
 * 插件命令失败时宿主会以字符串或 `{ code, message }` 对象 reject，两者都归一成一条消息。
 */
export function normalizeErrorMessage(error: unknown, fallback?: string): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string" && error.trim().length > 0) {
    return error;
  }

  return readHostErrorField(error, "message") ?? fallback ?? "unknown error";
}

function toFailure(error: unknown, context: RecoverableContext): { ok: false; message: string; code?: string } {
  const message = normalizeErrorMessage(error, context.message);
  const code = readHostErrorField(error, "code");

  if (!context.silent) {
    logWarn(context.scope, `${context.action}_recoverable_failed`, {
      ...(context.metadata ?? {}),
      error: message,
      ...(code ? { code } : {}),
      rawError: error instanceof Error ? error.name : typeof error,
    });
  }

  return code ? { ok: false, message, code } : { ok: false, message };
}

export async function runRecoverable<T>(
  task: () => Promise<T>,
  context: RecoverableContext,
): Promise<RecoverableResult<T>> {
  try {
    return { ok: true, data: await task() };
  } catch (error) {
    return toFailure(error, context);
  }
}

export function runRecoverableSync<T>(task: () => T, context: RecoverableContext): RecoverableResult<T> {
  try {
    return { ok: true, data: task() };
  } catch (error) {
    return toFailure(error, context);
  }
}

// 失败即降级：剪贴板读取、诊断查询这类路径只关心结果或兜底值
export async function runRecoverableOr<T, F>(
  task: () => Promise<T>,
  fallback: F,
  context: RecoverableContext,
): Promise<T | F> {
  const result = await runRecoverable(task, context);
  return result.ok ? result.data : fallback;
}
