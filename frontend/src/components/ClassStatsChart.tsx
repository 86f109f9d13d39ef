// src/components/ClassStatsChart.tsx
import React from "react";
import { motion } from "framer-motion";
import { classColor, classNameRu, isDefectClass } from "../constants/defects";
import type { TaskMetadata } from "../types";

type Props = { stats: TaskMetadata["class_stats_percent"] };

export default function ClassStatsChart({ stats }: Props) {
  const rows = Object.entries(stats).sort((a, b) => b[1].count - a[1].count);

  if (rows.length === 0) {
    return <div className="text-sm text-white/50">Объекты не обнаружены</div>;
  }

  return (
    <ul className="space-y-3">
      {rows.map(([cls, { count, percentage }]) => (
        <li key={cls} data-testid="class-row">
          <div className="mb-1 flex items-center justify-between gap-3 text-xs">
            <span className={isDefectClass(cls) ? "text-red-200" : "text-white/75"}>{classNameRu(cls)}</span>
            <span className="tabular-nums text-white/55">
              {count} · {percentage.toFixed(2)}%
            </span>
          </div>
          <div className="h-2 overflow-hidden rounded-full bg-white/[0.06]">
            <motion.div
              className="h-full rounded-full"
              style={{ background: classColor(cls) }}
              initial={{ width: 0 }}
              animate={{ width: `${Math.min(100, percentage)}%` }}
              transition={{ duration: 0.5, ease: "easeOut" }}
            />
          </div>
        </li>
      ))}
    </ul>
  );
}
