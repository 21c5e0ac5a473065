import { useId, type InputHTMLAttributes, type ReactNode } from "react";

import { cx } from "@/components/ui/utils";

export interface SwitchFieldProps extends Omit<InputHTMLAttributes<HTMLInputElement>, "type" | "size" | "onChange"> {
  label: ReactNode;
  description?: ReactNode;
  onCheckedChange: (checked: boolean) => void;
}

export function SwitchField(props: SwitchFieldProps) {
  const { label, description, onCheckedChange, id, disabled, className, ...rest } = props;
  const generatedId = useId();
  const switchId = id ?? generatedId;

  return (
    <div className={cx("inline-flex items-start gap-2 text-sm text-text-secondary", className)}>
      <span className={cx("relative inline-flex h-5 w-9 shrink-0 align-middle", disabled ? "opacity-70" : null)}>
        <input
          {...rest}
          id={switchId}
          type="checkbox"
          role="switch"
          disabled={disabled}
          onChange={(event) => onCheckedChange(event.currentTarget.checked)}
          className="peer absolute inset-0 z-10 m-0 h-full w-full cursor-pointer opacity-0 disabled:cursor-not-allowed"
        />
        <span
          aria-hidden="true"
          className="pointer-events-none absolute inset-0 rounded-full border border-border-strong bg-surface transition-colors duration-180 peer-checked:border-accent peer-checked:bg-accent"
        />
        <span
          aria-hidden="true"
          className="pointer-events-none absolute left-0.5 top-0.5 h-4 w-4 rounded-full bg-text-primary transition-transform duration-180 peer-checked:translate-x-4 peer-checked:bg-accent-contrast"
        />
      </span>
      <label htmlFor={switchId} className={cx("inline-flex min-w-0 flex-col gap-0.5", disabled ? "cursor-not-allowed" : "cursor-pointer")}>
        <span className="leading-5">{label}</span>
        {description ? <span className="text-xs leading-5 text-text-muted">{description}</span> : null}
      </label>
    </div>
  );
}
