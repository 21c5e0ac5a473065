export type UiSize = "xs" | "sm" | "md";

export type ButtonVariant = "primary" | "secondary" | "danger" | "ghost";
export type TextareaVariant = "default" | "composer";
