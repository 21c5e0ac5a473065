import type { AppLocale, LocalePreference } from "@/i18n/types";

export const SUPPORTED_LOCALES: AppLocale[] = ["en-US", "zh-CN"];

export const LOCALE_STORAGE_KEY = "paste-input.locale.preference";

export const DEFAULT_LOCALE_PREFERENCE: LocalePreference = "system";

export const FALLBACK_LOCALE: AppLocale = "en-US";

export const I18N_NAMESPACES = ["common", "paste"] as const;
