import { getCurrentWindow } from "@tauri-apps/api/window";
import { useEffect, useLayoutEffect } from "react";

import { PasteRuntimeProvider } from "@/components/paste/PasteRuntimeProvider";
import { useLocaleStore } from "@/i18n/store";
import ChatInputDemoPage from "@/pages/ChatInputDemoPage";
import type { PasteRuntime } from "@/paste/runtime";
import { runRecoverableSync } from "@/services/recoverable";

function LocaleBootstrap() {
  const initLocale = useLocaleStore((state) => state.init);

  useEffect(() => {
    initLocale();
  }, [initLocale]);

  return null;
}

function WindowLabelBootstrap() {
  useLayoutEffect(() => {
    const result = runRecoverableSync(() => getCurrentWindow().label, {
      scope: "app",
      action: "window_label",
      silent: true,
    });
    const label = result.ok ? result.data : "browser";
    document.documentElement.setAttribute("data-window-label", label);
    document.body.setAttribute("data-window-label", label);
  }, []);

  return null;
}

interface AppProps {
  runtime: PasteRuntime;
}

export default function App(props: AppProps) {
  return (
    <PasteRuntimeProvider runtime={props.runtime}>
      <WindowLabelBootstrap />
      <LocaleBootstrap />
      <ChatInputDemoPage />
    </PasteRuntimeProvider>
  );
}
