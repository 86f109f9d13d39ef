// src/components/StatusBadge.tsx
import React from "react";
import { CheckCircle2, Clock, Loader2, XCircle } from "lucide-react";
import type { TaskStatus } from "../types";
import { cn } from "../utils/cn";
import { STATUS_LABELS } from "../utils/format";

const STYLE: Record<TaskStatus, { cls: string; Icon: typeof Clock; spin?: boolean }> = {
  queued: { cls: "border-white/15 bg-white/[0.04] text-white/70", Icon: Clock },
  processing: { cls: "border-orange-300/30 bg-orange-500/15 text-orange-100", Icon: Loader2, spin: true },
  completed: { cls: "border-emerald-300/30 bg-emerald-500/15 text-emerald-100", Icon: CheckCircle2 },
  failed: { cls: "border-red-300/30 bg-red-500/15 text-red-100", Icon: XCircle },
};

export default function StatusBadge({ status, className }: { status: TaskStatus; className?: string }) {
  const { cls, Icon, spin } = STYLE[status];
  return (
    <span className={cn("inline-flex items-center gap-1.5 rounded-full border px-2.5 py-0.5 text-[11px] font-medium", cls, className)}>
      <Icon className={cn("h-3.5 w-3.5", spin && "animate-spin")} />
      {STATUS_LABELS[status]}
    </span>
  );
}
