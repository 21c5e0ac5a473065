import {
  defineConfig,
  presetIcons,
  presetWind4,
  transformerDirectives,
  transformerVariantGroup,
} from "unocss";

import { icons as notoEmoji } from "@iconify-json/noto";

export default defineConfig({
  presets: [
    presetWind4(),
    presetIcons({
      collections: {
        noto: () => notoEmoji,
      },
    }),
  ],
  transformers: [
    transformerDirectives(),
    transformerVariantGroup(),
  ],
  theme: {
    colors: {
      app: "var(--color-bg-app)",
      elevated: "var(--color-bg-elevated)",
      surface: "var(--color-surface-card)",
      "surface-soft": "var(--color-surface-soft)",
      "border-muted": "var(--color-border-muted)",
      "border-strong": "var(--color-border-strong)",
      "text-primary": "var(--color-text-primary)",
      "text-secondary": "var(--color-text-secondary)",
      "text-muted": "var(--color-text-muted)",
      accent: "var(--color-accent)",
      "accent-soft": "var(--color-accent-soft)",
      "accent-contrast": "var(--color-accent-contrast)",
      danger: "var(--color-danger)",
      info: "var(--color-info)",
    },
    borderRadius: {
      sm: "var(--radius-sm)",
      md: "var(--radius-md)",
      lg: "var(--radius-lg)",
      xl: "var(--radius-xl)",
    },
  },
  preflights: [
    {
      getCSS: () => `
html,
body,
#root {
  height: 100%;
}

*,
*::before,
*::after {
  box-sizing: border-box;
}

body {
  margin: 0;
  background: var(--color-bg-app);
  color: var(--color-text-primary);
  transition:
    background-color 180ms ease,
    color 180ms ease;
}

a {
  color: inherit;
}

button,
input,
select,
textarea {
  font: inherit;
  color: inherit;
}

::selection {
  background: var(--color-accent-soft);
  color: var(--color-text-primary);
}
`,
    },
  ],
  shortcuts: {
    // 只放跨组件复用的样式，页面私有布局直接写 utility class
    "ui-page": "min-h-screen bg-app text-text-primary",
    "ui-card": "rounded-2xl border border-border-muted bg-surface",
    "ui-section-title": "text-xl font-semibold text-text-primary",
    "btn-icon": "inline-block h-[1.05em] w-[1.05em] shrink-0 align-[-0.14em]",
  },
});
