import { useCallback, useEffect, useRef, useState, type RefObject } from "react";

import { usePasteRuntime } from "@/components/paste/PasteRuntimeProvider";
import { UNSUPPORTED_PASTE, type PastePayload, type PasteType } from "@/paste/payload";
import { PasteWrapper, type PasteCallback, type PasteDelivery } from "@/paste/paste-wrapper";

export interface UsePasteWrapperOptions {
  onPaste: PasteCallback;
  acceptedTypes?: readonly PasteType[] | null;
  enabled?: boolean;
  delivery?: PasteDelivery;
}

export interface UsePasteWrapperResult {
  viewId: number | null;
  pasteFromMenu: () => Promise<PastePayload>;
}

function acceptedTypesKey(acceptedTypes: readonly PasteType[] | null | undefined): string {
  if (!acceptedTypes) {
    return "*";
  }
  return [...acceptedTypes].sort().join(",");
}

export function usePasteWrapper(
  ref: RefObject<HTMLElement | null>,
  options: UsePasteWrapperOptions,
): UsePasteWrapperResult {
  const { onPaste, acceptedTypes, enabled = true, delivery = "raw" } = options;
  const runtime = usePasteRuntime();
  const wrapperRef = useRef<PasteWrapper | null>(null);
  const onPasteRef = useRef(onPaste);
  const acceptedTypesRef = useRef(acceptedTypes);
  const enabledRef = useRef(enabled);
  const [viewId, setViewId] = useState<number | null>(null);
  const typesKey = acceptedTypesKey(acceptedTypes);

  onPasteRef.current = onPaste;
  acceptedTypesRef.current = acceptedTypes;
  enabledRef.current = enabled;

  useEffect(() => {
    const wrapper = new PasteWrapper({
      channel: runtime.channel,
      strategy: runtime.strategy,
      tempFiles: runtime.tempFiles,
      onPaste: (payload) => onPasteRef.current(payload),
      acceptedTypes: acceptedTypesRef.current,
      enabled: enabledRef.current,
    });
    wrapperRef.current = wrapper;
    wrapper.mount(ref.current);
    setViewId(wrapper.viewId);

    return () => {
      wrapper.dispose();
      if (wrapperRef.current === wrapper) {
        wrapperRef.current = null;
      }
    };
  }, [ref, runtime]);

  useEffect(() => {
    wrapperRef.current?.update({
      acceptedTypes: acceptedTypesRef.current ?? undefined,
      delivery,
    });
  }, [typesKey, delivery, viewId]);

  useEffect(() => {
    wrapperRef.current?.setEnabled(enabled);
  }, [enabled, viewId]);

  const pasteFromMenu = useCallback(async () => {
    const wrapper = wrapperRef.current;
    if (!wrapper) {
      return UNSUPPORTED_PASTE;
    }
    return wrapper.pasteFromMenu();
  }, []);

  return { viewId, pasteFromMenu };
}
