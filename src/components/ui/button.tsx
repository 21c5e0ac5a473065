import { forwardRef, type ButtonHTMLAttributes, type ReactNode } from "react";

import type { ButtonVariant, UiSize } from "@/components/ui/types";
import { cx } from "@/components/ui/utils";

export interface ButtonProps extends Omit<ButtonHTMLAttributes<HTMLButtonElement>, "children"> {
  children: ReactNode;
  variant?: ButtonVariant;
  size?: UiSize;
  block?: boolean;
  iconOnly?: boolean;
}

const sizeClassMap: Record<UiSize, string> = {
  xs: "rounded-sm px-2.5 py-1.5 text-xs",
  sm: "rounded-md px-3 py-1.5 text-sm",
  md: "rounded-xl px-4 py-2 text-sm font-medium",
};

const variantClassMap: Record<ButtonVariant, string> = {
  primary: "border-transparent bg-accent text-accent-contrast hover:opacity-90",
  secondary: "border-border-strong bg-surface text-text-primary hover:border-accent hover:bg-surface-soft",
  danger: "border-border-strong bg-surface text-danger hover:border-danger hover:bg-surface-soft",
  ghost: "border-transparent bg-transparent text-text-secondary hover:bg-surface-soft hover:text-text-primary",
};

export const Button = forwardRef<HTMLButtonElement, ButtonProps>(function Button(props, ref) {
  const {
    variant = "secondary",
    size = "md",
    block = false,
    iconOnly = false,
    disabled = false,
    type,
    className,
    ...rest
  } = props;

  const buttonClassName = cx(
    "inline-flex items-center justify-center gap-1.5 border no-underline transition-colors duration-[140ms]",
    "outline-none focus-visible:ring-2 focus-visible:ring-accent/55 focus-visible:ring-offset-1",
    sizeClassMap[size],
    variantClassMap[variant],
    iconOnly ? "h-8 w-8 px-0 py-0" : null,
    block ? "w-full" : null,
    disabled ? "cursor-not-allowed opacity-60 pointer-events-none" : "cursor-pointer",
    className,
  );

  return <button {...rest} ref={ref} type={type ?? "button"} disabled={disabled} className={buttonClassName} />;
});
