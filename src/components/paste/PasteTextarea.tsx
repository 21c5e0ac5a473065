import { forwardRef, useImperativeHandle, useRef } from "react";

import { Textarea, type TextareaProps } from "@/components/ui/textarea";
import { usePasteWrapper, type UsePasteWrapperOptions } from "@/hooks/paste/usePasteWrapper";
import type { PastePayload } from "@/paste/payload";

export interface PasteTextareaHandle {
  focus: () => void;
  pasteFromMenu: () => Promise<PastePayload>;
}

export interface PasteTextareaProps extends Omit<TextareaProps, "onPaste"> {
  onPastePayload: UsePasteWrapperOptions["onPaste"];
  acceptedTypes?: UsePasteWrapperOptions["acceptedTypes"];
  pasteEnabled?: boolean;
  delivery?: UsePasteWrapperOptions["delivery"];
}

export const PasteTextarea = forwardRef<PasteTextareaHandle, PasteTextareaProps>(function PasteTextarea(props, ref) {
  const { onPastePayload, acceptedTypes, pasteEnabled = true, delivery, ...textareaProps } = props;
  const textareaRef = useRef<HTMLTextAreaElement>(null);
  const { viewId, pasteFromMenu } = usePasteWrapper(textareaRef, {
    onPaste: onPastePayload,
    acceptedTypes,
    enabled: pasteEnabled,
    delivery,
  });

  useImperativeHandle(
    ref,
    () => ({
      focus: () => textareaRef.current?.focus(),
      pasteFromMenu,
    }),
    [pasteFromMenu],
  );

  return (
    <Textarea
      {...textareaProps}
      ref={textareaRef}
      data-paste-view-id={viewId ?? undefined}
      data-paste-enabled={pasteEnabled ? "true" : "false"}
    />
  );
});
