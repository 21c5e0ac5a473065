import { convertFileSrc } from "@tauri-apps/api/core";
import { useEffect, useMemo } from "react";
import { useTranslation } from "react-i18next";

import type { PastedAttachment } from "@/components/paste/types";
import { Button } from "@/components/ui";

interface PastedImageListProps {
  attachments: PastedAttachment[];
  onRemove: (id: string) => void;
}

interface AttachmentPreview {
  id: string;
  url: string | null;
  revoke: (() => void) | null;
  mimeType: string;
}

function createPreview(attachment: PastedAttachment): AttachmentPreview {
  if (attachment.source === "file" && attachment.uri) {
    return { id: attachment.id, url: convertFileSrc(attachment.uri), revoke: null, mimeType: attachment.mimeType };
  }

  if (attachment.data && typeof URL.createObjectURL === "function") {
    const url = URL.createObjectURL(new Blob([Uint8Array.from(attachment.data)], { type: attachment.mimeType }));
    return { id: attachment.id, url, revoke: () => URL.revokeObjectURL(url), mimeType: attachment.mimeType };
  }

  return { id: attachment.id, url: null, revoke: null, mimeType: attachment.mimeType };
}

export default function PastedImageList(props: PastedImageListProps) {
  const { t } = useTranslation("paste");
  const { attachments, onRemove } = props;

  const previews = useMemo(() => attachments.map(createPreview), [attachments]);

  useEffect(() => {
    return () => {
      previews.forEach((preview) => preview.revoke?.());
    };
  }, [previews]);

  if (previews.length === 0) {
    return null;
  }

  return (
    <ul className="m-0 flex list-none gap-2 overflow-x-auto p-0" aria-label={t("attachments.label", { count: previews.length })}>
      {previews.map((preview) => (
        <li
          key={preview.id}
          className="relative h-16 w-16 shrink-0 overflow-hidden rounded-md border border-border-muted bg-surface"
          data-mime-type={preview.mimeType}
        >
          {preview.url ? (
            <img src={preview.url} alt={t("attachments.imageAlt")} className="h-full w-full object-cover" />
          ) : (
            <span className="flex h-full items-center justify-center text-xs text-text-muted">{preview.mimeType}</span>
          )}
          <Button
            size="xs"
            variant="ghost"
            iconOnly
            className="absolute right-0.5 top-0.5 h-5 w-5"
            aria-label={t("attachments.remove")}
            onClick={() => onRemove(preview.id)}
          >
            <span className="btn-icon i-noto:cross-mark" aria-hidden="true" />
          </Button>
        </li>
      ))}
    </ul>
  );
}
