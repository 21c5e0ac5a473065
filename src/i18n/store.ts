import { create } from "zustand";

import i18n from "@/i18n";
import { LOCALE_STORAGE_KEY } from "@/i18n/constants";
import {
  applyLocaleToDocument,
  getStoredLocalePreference,
  resolveLocale,
  setStoredLocalePreference,
} from "@/i18n/runtime";
import type { AppLocale, LocalePreference, LocaleState } from "@/i18n/types";
import { logWarn } from "@/services/logger";
import { normalizeErrorMessage } from "@/services/recoverable";

interface LocaleActions {
  init: () => void;
  syncFromStorage: () => void;
  setPreference: (preference: LocalePreference) => void;
}

type LocaleStore = LocaleState & LocaleActions;

let storageListener: ((event: StorageEvent) => void) | null = null;

function applyLanguage(locale: AppLocale) {
  applyLocaleToDocument(locale);
  i18n.changeLanguage(locale).catch((error: unknown) => {
    logWarn("locale", "change_language_failed", { locale, error: normalizeErrorMessage(error) });
  });
}

function setupStorageListener() {
  if (typeof window === "undefined" || storageListener) {
    return;
  }

  storageListener = (event) => {
    if (event.storageArea !== window.localStorage) {
      return;
    }
    if (event.key !== null && event.key !== LOCALE_STORAGE_KEY) {
      return;
    }
    useLocaleStore.getState().syncFromStorage();
  };

  window.addEventListener("storage", storageListener);
}

export const useLocaleStore = create<LocaleStore>((set, get) => ({
  preference: "system",
  resolved: resolveLocale("system"),
  initialized: false,
  init() {
    if (get().initialized) {
      return;
    }

    get().syncFromStorage();
    setupStorageListener();
  },
  syncFromStorage() {
    const preference = getStoredLocalePreference();
    const resolved = resolveLocale(preference);
    const current = get();
    if (current.initialized && current.preference === preference && current.resolved === resolved) {
      return;
    }

    set({ preference, resolved, initialized: true });
    applyLanguage(resolved);
  },
  setPreference(preference) {
    setStoredLocalePreference(preference);
    const resolved = resolveLocale(preference);
    set({ preference, resolved, initialized: true });
    applyLanguage(resolved);
  },
}));
