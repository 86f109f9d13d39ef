// src/components/DetectionList.tsx
import React, { useMemo } from "react";
import { AlertTriangle, CheckCircle2 } from "lucide-react";
import { classColor, classNameRu, isDefectClass, normalizeSeverity, SEVERITY_LABELS } from "../constants/defects";
import type { Detection } from "../types";
import { cn } from "../utils/cn";
import { formatPercent } from "../utils/format";

type Props = {
  detections: Detection[];
  /** классы, скрытые фильтром */
  hidden: ReadonlySet<string>;
  onToggleClass: (cls: string) => void;
  selectedIndex?: number | null;
  onSelect?: (index: number) => void;
};

/** Количество детекций по классам, по убыванию. */
export function countByClass(detections: Detection[]): Array<{ cls: string; label: string; count: number }> {
  const map = new Map<string, { label: string; count: number }>();
  for (const d of detections) {
    const cur = map.get(d.class);
    if (cur) cur.count += 1;
    else map.set(d.class, { label: classNameRu(d.class, d.class_ru), count: 1 });
  }
  return [...map.entries()].map(([cls, v]) => ({ cls, ...v })).sort((a, b) => b.count - a.count || a.cls.localeCompare(b.cls));
}

export default function DetectionList({ detections, hidden, onToggleClass, selectedIndex = null, onSelect }: Props) {
  const classes = useMemo(() => countByClass(detections), [detections]);

  const visible = detections
    .map((d, index) => ({ d, index }))
    .filter(({ d }) => !hidden.has(d.class))
    .sort((a, b) => Number(isDefectClass(b.d.class)) - Number(isDefectClass(a.d.class)) || b.d.confidence - a.d.confidence);

  return (
    <div>
      <div className="flex flex-wrap gap-2" role="group" aria-label="Фильтр по классам">
        {classes.map(({ cls, label, count }) => {
          const on = !hidden.has(cls);
          return (
            <button
              key={cls}
              type="button"
              aria-pressed={on}
              onClick={() => onToggleClass(cls)}
              className={cn("fx-chip", on ? "fx-chip-active" : "opacity-50")}
            >
              <span className="h-2 w-2 rounded-full" style={{ background: classColor(cls) }} />
              {label}
              <span className="tabular-nums text-white/50">{count}</span>
            </button>
          );
        })}
      </div>

      {visible.length === 0 ? (
        <div className="mt-4 text-sm text-white/50">{detections.length ? "Все классы скрыты фильтром" : "Объекты не найдены"}</div>
      ) : (
        <ul className="mt-4 space-y-2">
          {visible.map(({ d, index }) => {
            const defect = isDefectClass(d.class);
            const severity = normalizeSeverity(d.defect_summary?.severity);
            return (
              <li key={index}>
                <button
                  type="button"
                  onClick={() => onSelect?.(index)}
                  className={cn(
                    "fx-soft-hover flex w-full items-center gap-3 rounded-2xl border px-3 py-2 text-left",
                    defect ? "border-red-300/25 bg-red-500/[0.07]" : "border-white/10 bg-white/[0.02]",
                    selectedIndex === index && "ring-1 ring-orange-300/50"
                  )}
                >
                  {defect ? (
                    <AlertTriangle className="h-4 w-4 shrink-0 text-red-300" />
                  ) : (
                    <CheckCircle2 className="h-4 w-4 shrink-0 text-emerald-300" />
                  )}
                  <div className="min-w-0 flex-1">
                    <div className="truncate text-sm text-white/85">{classNameRu(d.class, d.class_ru)}</div>
                    {defect && d.defect_summary ? (
                      <div className="truncate text-[11px] text-white/50">
                        {d.defect_summary.type}
                        {severity !== "none" ? ` · ${SEVERITY_LABELS[severity]}` : ""}
                      </div>
                    ) : null}
                  </div>
                  <span className="text-xs tabular-nums text-white/60">{formatPercent(d.confidence)}</span>
                </button>
              </li>
            );
          })}
        </ul>
      )}
    </div>
  );
}
