import { createInstance } from "i18next";
import ICU from "i18next-icu";
import { initReactI18next } from "react-i18next";

import { FALLBACK_LOCALE, I18N_NAMESPACES } from "@/i18n/constants";
import { applyLocaleToDocument, getStoredLocalePreference, resolveLocale } from "@/i18n/runtime";
import commonEnUS from "../../i18n/source/en-US/common.json";
import pasteEnUS from "../../i18n/source/en-US/paste.json";
import commonZhCN from "../../i18n/source/zh-CN/common.json";
import pasteZhCN from "../../i18n/source/zh-CN/paste.json";

const resources = {
  "en-US": {
    common: commonEnUS,
    paste: pasteEnUS,
  },
  "zh-CN": {
    common: commonZhCN,
    paste: pasteZhCN,
  },
} as const;

const initialLocale = resolveLocale(getStoredLocalePreference());

const i18n = createInstance();

void i18n
  .use(ICU)
  .use(initReactI18next)
  .init({
    resources,
    lng: initialLocale,
    fallbackLng: FALLBACK_LOCALE,
    defaultNS: "common",
    ns: [...I18N_NAMESPACES],
    interpolation: {
      escapeValue: false,
    },
  });

applyLocaleToDocument(initialLocale);

export default i18n;
