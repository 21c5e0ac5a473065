export type AppLocale = "en-US" | "zh-CN";

export type LocalePreference = "system" | AppLocale;

export interface LocaleState {
  preference: LocalePreference;
  resolved: AppLocale;
  initialized: boolean;
}
