export { Button } from "@/components/ui/button";
export type { ButtonProps } from "@/components/ui/button";

export { Textarea } from "@/components/ui/textarea";
export type { TextareaProps } from "@/components/ui/textarea";

export { SwitchField } from "@/components/ui/switch";
export type { SwitchFieldProps } from "@/components/ui/switch";

export type { ButtonVariant, TextareaVariant, UiSize } from "@/components/ui/types";
