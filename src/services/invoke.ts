import { invoke } from "@tauri-apps/api/core";
import { getCurrentWindow } from "@tauri-apps/api/window";

import type { InvokeErrorPayloadDto } from "@/contracts";
import { logDebug, logError } from "@/services/logger";

interface InvokeWithLogOptions {
  silent?: boolean;
}

function createRequestId(): string {
  if (typeof crypto !== "undefined" && typeof crypto.randomUUID === "function") {
    return crypto.randomUUID();
  }

  return `req-${Date.now()}-${Math.random().toString(16).slice(2)}`;
}

function resolveWindowLabel(): string {
  try {
    return getCurrentWindow().label;
  } catch {
    return "unknown";
  }
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readStringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === "string");
}

function toErrorPayloadFromRecord(record: Record<string, unknown>): InvokeErrorPayloadDto {
  const context = Array.isArray(record.context)
    ? record.context.flatMap((item) =>
        isObjectRecord(item) && typeof item.key === "string" && typeof item.value === "string"
          ? [{ key: item.key, value: item.value }]
          : [],
      )
    : undefined;

  return {
    code: typeof record.code === "string" ? record.code : undefined,
    message: typeof record.message === "string" ? record.message : undefined,
    causes: readStringArray(record.causes),
    context,
    requestId: typeof record.requestId === "string" ? record.requestId : undefined,
  };
}

function tryParseJsonRecord(value: string): Record<string, unknown> | null {
  const normalized = value.trim();
  if (!normalized.startsWith("{") || !normalized.endsWith("}")) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(normalized);
    return isObjectRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function toInvokeErrorPayload(value: unknown): InvokeErrorPayloadDto | null {
  if (value instanceof Error) {
    const fromMessage = tryParseJsonRecord(value.message);
    if (fromMessage) {
      return toErrorPayloadFromRecord(fromMessage);
    }

    if (isObjectRecord(value.cause)) {
      return toErrorPayloadFromRecord(value.cause);
    }

    return null;
  }

  if (isObjectRecord(value)) {
    return toErrorPayloadFromRecord(value);
  }

  if (typeof value === "string") {
    const parsed = tryParseJsonRecord(value);
    if (parsed) {
      return toErrorPayloadFromRecord(parsed);
    }
  }

  return null;
}

function resolveErrorMessage(error: unknown, payload: InvokeErrorPayloadDto | null): string {
  if (payload?.message && payload.message.trim().length > 0) {
    return payload.message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

function now(): number {
  return typeof performance !== "undefined" ? performance.now() : Date.now();
}

export async function invokeWithLog<T>(
  command: string,
  payload?: Record<string, unknown>,
  options?: InvokeWithLogOptions,
): Promise<T> {
  const requestId = createRequestId();
  const windowLabel = resolveWindowLabel();
  const startedAt = now();

  const requestPayload: Record<string, unknown> = {
    ...(payload ?? {}),
    requestId,
    windowLabel,
  };

  try {
    const result = await invoke<T>(command, requestPayload);

    if (!options?.silent) {
      logDebug(
        "invoke",
        "command_end",
        {
          command,
          requestId,
          windowLabel,
          ok: true,
          durationMs: Math.round(now() - startedAt),
        },
        requestId,
      );
    }

    return result;
  } catch (error) {
    const errorPayload = toInvokeErrorPayload(error);
    const message = resolveErrorMessage(error, errorPayload);
    logError(
      "invoke",
      "command_failed",
      {
        command,
        requestId,
        windowLabel,
        durationMs: Math.round(now() - startedAt),
        error: message,
        errorCode: errorPayload?.code ?? "unknown_error",
        errorCauses: errorPayload?.causes ?? [],
        errorContext: errorPayload?.context ?? [],
      },
      requestId,
    );
    throw error;
  }
}
