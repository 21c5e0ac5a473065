import { forwardRef, type TextareaHTMLAttributes } from "react";

import type { TextareaVariant } from "@/components/ui/types";
import { cx } from "@/components/ui/utils";

export interface TextareaProps extends TextareaHTMLAttributes<HTMLTextAreaElement> {
  variant?: TextareaVariant;
  invalid?: boolean;
}

const variantClassMap: Record<TextareaVariant, string> = {
  default:
    "w-full resize-y rounded-md border border-border-muted bg-surface px-3 py-2 text-sm text-text-primary outline-none transition-colors placeholder:text-text-muted focus:border-accent",
  composer:
    "min-h-[44px] max-h-[160px] w-full resize-none rounded-xl border border-border-muted bg-surface px-3 py-2.5 text-sm leading-5 text-text-primary outline-none transition-colors placeholder:text-text-muted focus:border-accent",
};

export const Textarea = forwardRef<HTMLTextAreaElement, TextareaProps>(function Textarea(props, ref) {
  const { variant = "default", invalid = false, className, disabled, ...rest } = props;
  const textareaClassName = cx(
    variantClassMap[variant],
    invalid ? "border-danger focus:border-danger" : null,
    disabled ? "cursor-not-allowed opacity-60" : null,
    className,
  );

  return <textarea {...rest} ref={ref} disabled={disabled} className={textareaClassName} />;
});
