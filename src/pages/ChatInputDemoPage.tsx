import dayjs from "dayjs";
import { useCallback, useMemo, useRef, useState, type KeyboardEvent } from "react";
import { useTranslation } from "react-i18next";

import PastedImageList from "@/components/paste/PastedImageList";
import { usePasteRuntime } from "@/components/paste/PasteRuntimeProvider";
import { PasteTextarea, type PasteTextareaHandle } from "@/components/paste/PasteTextarea";
import { Button, SwitchField } from "@/components/ui";
import { useAsyncEffect } from "@/hooks/useAsyncEffect";
import { SUPPORTED_LOCALES } from "@/i18n/constants";
import { useLocaleStore } from "@/i18n/store";
import type { PasteType } from "@/paste/payload";
import { useChatInputStore, type LastPasteSummary } from "@/stores/chat-input.store";

function resolveAcceptedTypes(acceptText: boolean, acceptImages: boolean): PasteType[] | null {
  if (acceptText && acceptImages) {
    return null;
  }

  const types: PasteType[] = [];
  if (acceptText) {
    types.push("text");
  }
  if (acceptImages) {
    types.push("image");
  }
  return types;
}

function LastPasteLine(props: { summary: LastPasteSummary | null }) {
  const { t } = useTranslation("paste");
  const { summary } = props;

  if (!summary) {
    return <span>{t("status.none")}</span>;
  }

  return (
    <span>
      {t(`status.${summary.kind}`, { count: summary.count })}
      <span className="ml-2 text-text-muted">{dayjs(summary.at).format("HH:mm:ss")}</span>
    </span>
  );
}

export default function ChatInputDemoPage() {
  const { t } = useTranslation("paste");
  const { t: tCommon } = useTranslation("common");
  const runtime = usePasteRuntime();
  const composerRef = useRef<PasteTextareaHandle>(null);

  const [pasteEnabled, setPasteEnabled] = useState(true);
  const [acceptText, setAcceptText] = useState(true);
  const [acceptImages, setAcceptImages] = useState(true);
  const [fileDelivery, setFileDelivery] = useState(false);
  const [platformVersion, setPlatformVersion] = useState<string | null>(null);

  const draft = useChatInputStore((state) => state.draft);
  const attachments = useChatInputStore((state) => state.attachments);
  const messages = useChatInputStore((state) => state.messages);
  const lastPaste = useChatInputStore((state) => state.lastPaste);
  const error = useChatInputStore((state) => state.error);
  const setDraft = useChatInputStore((state) => state.setDraft);
  const applyPaste = useChatInputStore((state) => state.applyPaste);
  const removeAttachment = useChatInputStore((state) => state.removeAttachment);
  const clearAttachments = useChatInputStore((state) => state.clearAttachments);
  const sendMessage = useChatInputStore((state) => state.sendMessage);

  const localePreference = useLocaleStore((state) => state.preference);
  const setLocalePreference = useLocaleStore((state) => state.setPreference);

  const acceptedTypes = useMemo(() => resolveAcceptedTypes(acceptText, acceptImages), [acceptText, acceptImages]);

  useAsyncEffect(
    async ({ isDisposed }) => {
      const version = await runtime.getPlatformVersionString();
      if (!isDisposed()) {
        setPlatformVersion(version);
      }
    },
    [runtime],
    { scope: "chat-input-demo" },
  );

  const handleClearAttachments = useCallback(() => {
    void clearAttachments(runtime.clearTemporaryArtifacts);
  }, [clearAttachments, runtime]);

  const handleComposerKeyDown = (event: KeyboardEvent<HTMLTextAreaElement>) => {
    if (event.key !== "Enter" || event.shiftKey || event.nativeEvent.isComposing) {
      return;
    }
    event.preventDefault();
    sendMessage();
  };

  return (
    <main className="ui-page flex flex-col gap-4 p-4">
      <header className="flex flex-wrap items-start justify-between gap-3">
        <div className="flex flex-col gap-1">
          <h1 className="ui-section-title m-0">{t("title")}</h1>
          <p className="m-0 text-sm text-text-secondary">{t("subtitle")}</p>
          <p className="m-0 text-xs text-text-muted">
            {t("platform", { platform: runtime.platform, strategy: runtime.strategy.kind, version: platformVersion ?? "--" })}
          </p>
        </div>
        <div className="flex items-center gap-1" role="group" aria-label={tCommon("language.label")}>
          {(["system", ...SUPPORTED_LOCALES] as const).map((preference) => (
            <Button
              key={preference}
              size="xs"
              variant={localePreference === preference ? "primary" : "ghost"}
              onClick={() => setLocalePreference(preference)}
            >
              {tCommon(`language.${preference}`)}
            </Button>
          ))}
        </div>
      </header>

      <section className="ui-card flex flex-wrap gap-4 p-3">
        <SwitchField label={t("settings.enabled")} checked={pasteEnabled} onCheckedChange={setPasteEnabled} />
        <SwitchField label={t("settings.acceptText")} checked={acceptText} onCheckedChange={setAcceptText} />
        <SwitchField label={t("settings.acceptImages")} checked={acceptImages} onCheckedChange={setAcceptImages} />
        <SwitchField
          label={t("settings.fileDelivery")}
          description={t("settings.fileDeliveryHint")}
          checked={fileDelivery}
          onCheckedChange={setFileDelivery}
        />
      </section>

      <section className="ui-card flex min-h-[200px] flex-1 flex-col gap-2 overflow-y-auto p-3" aria-live="polite">
        {messages.length === 0 ? (
          <p className="m-0 text-sm text-text-muted">{t("messages.empty")}</p>
        ) : (
          messages.map((message) => (
            <article key={message.id} className="flex flex-col gap-1 rounded-md bg-surface-soft p-2">
              <div className="text-xs text-text-muted">{dayjs(message.sentAt).format("YYYY-MM-DD HH:mm:ss")}</div>
              {message.text ? <p className="m-0 whitespace-pre-wrap text-sm">{message.text}</p> : null}
              {message.attachments.length > 0 ? (
                <div className="text-xs text-text-secondary">
                  {t("attachments.label", { count: message.attachments.length })}
                </div>
              ) : null}
            </article>
          ))
        )}
      </section>

      <section className="ui-card flex flex-col gap-2 p-3">
        <div className="flex items-center justify-between gap-2 text-xs text-text-secondary">
          <LastPasteLine summary={lastPaste} />
          {attachments.length > 0 ? (
            <Button size="xs" variant="ghost" onClick={handleClearAttachments}>
              {t("attachments.clear")}
            </Button>
          ) : null}
        </div>
        <PastedImageList attachments={attachments} onRemove={removeAttachment} />
        {error ? <div className="text-xs text-danger">{error}</div> : null}
        <PasteTextarea
          ref={composerRef}
          variant="composer"
          rows={2}
          value={draft}
          placeholder={t("composer.placeholder")}
          onChange={(event) => setDraft(event.currentTarget.value)}
          onKeyDown={handleComposerKeyDown}
          onPastePayload={applyPaste}
          acceptedTypes={acceptedTypes}
          pasteEnabled={pasteEnabled}
          delivery={fileDelivery ? "file" : "raw"}
        />
        <div className="flex justify-end gap-2">
          <Button size="sm" variant="secondary" onClick={() => void composerRef.current?.pasteFromMenu()}>
            <span className="btn-icon i-noto:clipboard" aria-hidden="true" />
            {t("composer.pasteFromMenu")}
          </Button>
          <Button size="sm" variant="primary" onClick={() => sendMessage()}>
            {t("composer.send")}
          </Button>
        </div>
      </section>
    </main>
  );
}
