// src/components/ui/ProgressBar.tsx
import React from "react";
import { cn } from "../../utils/cn";

type Props = {
  /** 0..100 */
  value: number;
  heightClassName?: string;
  showLabel?: boolean;
  label?: string;
  /** красная заливка для упавших задач */
  tone?: "normal" | "danger" | "success";
  className?: string;
};

const FILL: Record<NonNullable<Props["tone"]>, string> = {
  normal: "bg-[linear-gradient(90deg,rgba(255,122,24,0.55),rgba(255,210,120,0.45))]",
  danger: "bg-red-500/55",
  success: "bg-emerald-400/55",
};

export default function ProgressBar({ value, heightClassName = "h-3", showLabel = false, label, tone = "normal", className }: Props) {
  const v = Number.isFinite(value) ? Math.max(0, Math.min(100, value)) : 0;

  return (
    <div className={cn("w-full", className)}>
      {label || showLabel ? (
        <div className="mb-2 flex items-center justify-between gap-3 text-xs">
          <span className="truncate font-medium text-white/70">{label}</span>
          {showLabel ? <span className="tabular-nums text-white/55">{Math.round(v)}%</span> : null}
        </div>
      ) : null}

      <div
        role="progressbar"
        aria-valuemin={0}
        aria-valuemax={100}
        aria-valuenow={Math.round(v)}
        className={cn("relative w-full overflow-hidden rounded-full border border-white/10 bg-[#0b101b]/60", heightClassName)}
      >
        <div className={cn("absolute inset-y-0 left-0 transition-[width] duration-300 ease-out", FILL[tone])} style={{ width: `${v}%` }}>
          {tone === "normal" && v < 100 ? (
            <div
              className="absolute -left-1/2 top-0 h-full w-[60%] bg-[linear-gradient(90deg,transparent,rgba(255,255,255,0.14),transparent)]"
              style={{ animation: "pb_sheen 1.8s linear infinite" }}
            />
          ) : null}
        </div>
      </div>
    </div>
  );
}
