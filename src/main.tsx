import React from "react";
import ReactDOM from "react-dom/client";
import App from "@/App";
import "@/i18n";
import { createPasteRuntime } from "@/paste/runtime";
import { logError } from "@/services/logger";
import "uno.css";
import "@/styles/theme.css";

declare global {
  interface Window {
    __pasteInputGlobalErrorHandlersInstalled?: boolean;
  }
}

if (typeof window !== "undefined" && !window.__pasteInputGlobalErrorHandlersInstalled) {
  window.addEventListener("error", (event) => {
    logError("window.onerror", "unhandled_error", {
      message: event.message,
      filename: event.filename,
      lineno: event.lineno,
      colno: event.colno,
      stack: event.error instanceof Error ? event.error.stack : undefined,
    });
  });

  window.addEventListener("unhandledrejection", (event) => {
    const reason: unknown = event.reason;
    const message = reason instanceof Error ? reason.message : String(reason);
    logError("window.unhandledrejection", "unhandled_promise_rejection", {
      message,
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });

  window.__pasteInputGlobalErrorHandlersInstalled = true;
}

const rootElement = document.getElementById("root");
if (!rootElement) {
  throw new Error("missing #root element");
}

const runtime = createPasteRuntime();

ReactDOM.createRoot(rootElement).render(
  <React.StrictMode>
    <App runtime={runtime} />
  </React.StrictMode>,
);
