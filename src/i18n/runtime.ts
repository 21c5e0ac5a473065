import { DEFAULT_LOCALE_PREFERENCE, FALLBACK_LOCALE, LOCALE_STORAGE_KEY, SUPPORTED_LOCALES } from "@/i18n/constants";
import type { AppLocale, LocalePreference } from "@/i18n/types";
import { logWarn } from "@/services/logger";
import { normalizeErrorMessage } from "@/services/recoverable";

function isAppLocale(value: string): value is AppLocale {
  return SUPPORTED_LOCALES.some((locale) => locale === value);
}

export function normalizeLocale(value: string | null | undefined): AppLocale | null {
  if (!value) {
    return null;
  }

  const normalized = value.trim().replace(/_/g, "-");
  const language = normalized.split("-")[0]?.toLowerCase() ?? "";
  if (!/^[a-z]{2}$/.test(language)) {
    return null;
  }

  // 仅支持两种界面语言，地区码只用于精确匹配
  const exact = SUPPORTED_LOCALES.find((locale) => locale.toLowerCase() === normalized.toLowerCase());
  if (exact) {
    return exact;
  }
  if (language === "zh") {
    return "zh-CN";
  }
  if (language === "en") {
    return "en-US";
  }
  return null;
}

function isLocalePreference(value: string | null): value is LocalePreference {
  return value === "system" || (value !== null && isAppLocale(value));
}

export function detectSystemLocale(languages?: readonly string[]): AppLocale {
  const candidates =
    languages ??
    (typeof navigator === "undefined"
      ? []
      : [...(Array.isArray(navigator.languages) ? navigator.languages : []), navigator.language]);

  for (const candidate of candidates) {
    const normalized = normalizeLocale(candidate);
    if (normalized) {
      return normalized;
    }
  }

  return FALLBACK_LOCALE;
}

export function resolveLocale(preference: LocalePreference): AppLocale {
  if (preference === "system") {
    return detectSystemLocale();
  }
  return preference;
}

export function getStoredLocalePreference(): LocalePreference {
  if (typeof window === "undefined") {
    return DEFAULT_LOCALE_PREFERENCE;
  }

  let stored: string | null = null;
  try {
    stored = window.localStorage.getItem(LOCALE_STORAGE_KEY);
  } catch (error) {
    logWarn("locale", "storage_read_failed", { error: normalizeErrorMessage(error) });
  }

  return isLocalePreference(stored) ? stored : DEFAULT_LOCALE_PREFERENCE;
}

export function setStoredLocalePreference(preference: LocalePreference) {
  if (typeof window === "undefined") {
    return;
  }

  try {
    window.localStorage.setItem(LOCALE_STORAGE_KEY, preference);
  } catch (error) {
    logWarn("locale", "storage_write_failed", { preference, error: normalizeErrorMessage(error) });
  }
}

export function applyLocaleToDocument(locale: AppLocale) {
  if (typeof document === "undefined") {
    return;
  }

  document.documentElement.lang = locale;
  document.documentElement.setAttribute("data-locale", locale);
}
