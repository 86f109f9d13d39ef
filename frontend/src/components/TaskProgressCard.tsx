// src/components/TaskProgressCard.tsx
import React from "react";
import { Wifi, WifiOff } from "lucide-react";
import type { TaskProgressMessage } from "../types";
import { progressPercent } from "../utils/format";
import StatusBadge from "./StatusBadge";
import ProgressBar from "./ui/ProgressBar";

type Props = {
  progress: TaskProgressMessage;
  /** null: сокет не открывали (задача уже завершена) */
  connected?: boolean | null;
};

export default function TaskProgressCard({ progress, connected = null }: Props) {
  const pct = progressPercent(progress);
  const tone = progress.status === "failed" ? "danger" : progress.status === "completed" ? "success" : "normal";

  return (
    <div className="rounded-3xl border border-white/10 bg-white/[0.02] p-4">
      <div className="flex items-center justify-between gap-3">
        <div className="flex items-center gap-2">
          <div className="text-sm font-semibold text-white/85">Прогресс</div>
          <StatusBadge status={progress.status} />
        </div>
        <div className="flex items-center gap-2 text-xs tabular-nums text-white/55">
          {connected === null ? null : connected ? (
            <Wifi className="h-3.5 w-3.5 text-emerald-300" aria-label="онлайн" />
          ) : (
            <WifiOff className="h-3.5 w-3.5 text-white/40" aria-label="нет связи" />
          )}
          <span data-testid="progress-counter">
            {progress.processed_files + progress.failed_files}/{progress.total_files}
          </span>
        </div>
      </div>

      <div className="mt-3">
        <ProgressBar value={pct} tone={tone} />
      </div>

      <div className="mt-2 flex flex-wrap gap-x-4 gap-y-1 text-xs text-white/55 tabular-nums">
        <span>Обработано: {progress.processed_files}</span>
        <span>Ошибок: {progress.failed_files}</span>
        <span>Дефектов: {progress.defects_found}</span>
      </div>
      {progress.message ? <div className="mt-2 text-xs text-white/65">{progress.message}</div> : null}
    </div>
  );
}
