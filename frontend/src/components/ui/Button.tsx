// src/components/ui/Button.tsx
import React from "react";
import { Loader2 } from "lucide-react";
import { cn } from "../../utils/cn";

type Props = React.ButtonHTMLAttributes<HTMLButtonElement> & {
  variant?: "primary" | "secondary" | "danger" | "ghost";
  size?: "sm" | "md";
  leftIcon?: React.ReactNode;
  /** крутилка вместо иконки + disabled */
  loading?: boolean;
};

const VARIANTS: Record<NonNullable<Props["variant"]>, string> = {
  primary:
    "border-orange-300/30 bg-[linear-gradient(135deg,rgba(255,122,0,0.35),rgba(255,169,77,0.18))] hover:bg-orange-500/30 text-white shadow-[0_18px_60px_rgba(255,122,0,0.18)]",
  secondary: "border-white/12 bg-white/[0.03] hover:bg-white/[0.06] text-white/85",
  danger: "border-red-300/25 bg-red-500/10 hover:bg-red-500/20 text-red-100",
  ghost: "border-transparent bg-transparent hover:bg-white/[0.05] text-white/70",
};

export default function Button({
  variant = "secondary",
  size = "md",
  leftIcon,
  loading = false,
  className,
  disabled,
  children,
  type = "button",
  ...rest
}: Props) {
  return (
    <button
      type={type}
      disabled={disabled || loading}
      className={cn(
        "group relative inline-flex items-center justify-center gap-2 overflow-hidden rounded-2xl border transition select-none",
        "disabled:opacity-40 disabled:pointer-events-none",
        "focus:outline-none focus-visible:ring-2 focus-visible:ring-orange-300/35",
        size === "sm" ? "px-3 py-1.5 text-xs" : "px-4 py-2.5 text-sm",
        VARIANTS[variant],
        className
      )}
      {...rest}
    >
      {/* блик при наведении */}
      <span
        aria-hidden="true"
        className="pointer-events-none absolute -left-1/2 top-0 h-full w-[60%] rotate-[12deg] translate-x-[-30%] bg-[linear-gradient(90deg,transparent,rgba(255,255,255,0.10),transparent)] transition-transform duration-[900ms] ease-out group-hover:translate-x-[260%]"
      />
      <span className="relative flex items-center gap-2">
        {loading ? <Loader2 className="h-4 w-4 animate-spin" /> : leftIcon}
        {children}
      </span>
    </button>
  );
}
