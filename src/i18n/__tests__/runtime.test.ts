import { describe, expect, it } from "vitest";

import { detectSystemLocale, normalizeLocale, resolveLocale } from "@/i18n/runtime";

describe("locale runtime", () => {
  it("maps language tags onto the supported locales", () => {
    expect(normalizeLocale("EN-us")).toBe("en-US");
    expect(normalizeLocale("en-GB")).toBe("en-US");
    expect(normalizeLocale("zh_TW")).toBe("zh-CN");
    expect(normalizeLocale("zh")).toBe("zh-CN");
    expect(normalizeLocale("fr-FR")).toBeNull();
    expect(normalizeLocale("")).toBeNull();
    expect(normalizeLocale(null)).toBeNull();
  });

  it("picks the first supported system language", () => {
    expect(detectSystemLocale(["fr-FR", "zh-Hans-CN", "en-US"])).toBe("zh-CN");
    expect(detectSystemLocale(["de-DE"])).toBe("en-US");
    expect(detectSystemLocale([])).toBe("en-US");
  });

  it("uses an explicit preference as is", () => {
    expect(resolveLocale("zh-CN")).toBe("zh-CN");
  });
});
