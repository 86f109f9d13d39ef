// src/pages/ModelPage.tsx
import React, { useCallback, useEffect, useState } from "react";
import { AlertTriangle, CheckCircle2, Cpu, RefreshCw } from "lucide-react";
import Button from "../components/ui/Button";
import { toast } from "../components/ui/ToastCenter";
import { api } from "../api/api";
import { classColor, classNameRu, isDefectClass } from "../constants/defects";
import type { ModelHealth, ModelInfo } from "../types";
import { cn } from "../utils/cn";

const REFRESH_MS = 30_000;

const METRIC_LABELS: Record<string, string> = {
  precision: "Precision",
  recall: "Recall",
  mAP50: "mAP@0.5",
  "mAP50-95": "mAP@0.5:0.95",
};

function fmtMetric(v: number | null | undefined) {
  if (v === null || v === undefined || !Number.isFinite(v)) return "—";
  return v.toFixed(3);
}

function fmtTimeHHMMSS(d: Date) {
  return [d.getHours(), d.getMinutes(), d.getSeconds()].map((n) => String(n).padStart(2, "0")).join(":");
}

export default function ModelPage() {
  const [health, setHealth] = useState<ModelHealth | null>(null);
  const [info, setInfo] = useState<ModelInfo | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [loading, setLoading] = useState(false);
  const [checkedAt, setCheckedAt] = useState<Date | null>(null);

  const refresh = useCallback(async (opts?: { silent?: boolean }) => {
    if (!opts?.silent) setLoading(true);
    try {
      // health отвечает и когда модель лежит, info в этом случае падает
      const h = await api.health();
      setHealth(h);
      try {
        setInfo(await api.modelInfo());
        setError(null);
      } catch (e: unknown) {
        setError(e instanceof Error ? e.message : "Не удалось получить информацию о модели");
      }
      setCheckedAt(new Date());
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : "BFF недоступен";
      setError(msg);
      if (!opts?.silent) toast.error(msg);
    } finally {
      if (!opts?.silent) setLoading(false);
    }
  }, []);

  useEffect(() => {
    void refresh();
    const t = window.setInterval(() => void refresh({ silent: true }), REFRESH_MS);
    return () => window.clearInterval(t);
  }, [refresh]);

  const healthy = health?.status === "healthy";
  // единственная зависимость BFF: сервис модели
  const modelDep = Object.values(health?.dependencies ?? {})[0];

  return (
    <div className="mx-auto max-w-[1100px] space-y-5">
      <div className="fx-card fx-border-run p-6">
        <div className="flex flex-wrap items-start gap-4">
          <Cpu className="h-8 w-8 text-orange-200" />
          <div>
            <div className="text-2xl font-semibold">Модель</div>
            <div className="mt-1 text-xs text-white/50">
              Источник: {api.baseUrl}/health • авто-обновление 30с
              {checkedAt ? ` • проверено в ${fmtTimeHHMMSS(checkedAt)}` : ""}
            </div>
          </div>
          <Button className="ml-auto" leftIcon={<RefreshCw className="h-4 w-4" />} loading={loading} onClick={() => void refresh()}>
            Проверить
          </Button>
        </div>
      </div>

      <div className="grid gap-4 md:grid-cols-2">
        <div className="fx-card p-5">
          <div className="text-xs uppercase tracking-wide text-white/45">Состояние</div>
          <div className={cn("mt-2 flex items-center gap-2 text-lg font-semibold", healthy ? "text-emerald-200" : "text-red-200")}>
            {healthy ? <CheckCircle2 className="h-5 w-5" /> : <AlertTriangle className="h-5 w-5" />}
            {health ? (healthy ? "Работает" : "Недоступна") : "—"}
          </div>
          {modelDep && (
            <div className="mt-2 text-sm text-white/65">
              Сервис модели: {modelDep.status}
              {modelDep.model_loaded !== undefined && ` • веса ${modelDep.model_loaded ? "загружены" : "не загружены"}`}
            </div>
          )}
          {health?.error && <div className="mt-2 text-sm text-red-200">{health.error}</div>}
          {error && <div className="mt-2 text-sm text-red-200">{error}</div>}
        </div>

        <div className="fx-card p-5">
          <div className="text-xs uppercase tracking-wide text-white/45">Веса</div>
          {info ? (
            <div className="mt-2 space-y-1 text-sm text-white/75">
              <div className="truncate" title={info.model_path}>
                {info.model_path}
              </div>
              <div>{info.model_exists ? "файл на месте" : "файл не найден"}</div>
              {info.max_resolution !== undefined && <div>макс. разрешение: {info.max_resolution}px</div>}
              {info.supported_formats?.length ? <div>форматы: {info.supported_formats.join(", ")}</div> : null}
              {info.requirements_met && (
                <div className="flex flex-wrap gap-2 pt-1">
                  {Object.entries(info.requirements_met).map(([k, ok]) => (
                    <span key={k} className={cn("fx-chip", ok ? "text-emerald-200" : "text-red-200")}>
                      {k}: {ok ? "да" : "нет"}
                    </span>
                  ))}
                </div>
              )}
            </div>
          ) : (
            <div className="mt-2 text-sm text-white/50">нет данных</div>
          )}
        </div>
      </div>

      {info && (
        <div className="grid gap-4 md:grid-cols-2">
          <div className="fx-card p-5">
            <div className="text-xs uppercase tracking-wide text-white/45">Классы ({info.num_classes})</div>
            <div className="mt-3 space-y-2">
              {info.classes.map((cls) => (
                <div key={cls} className="flex items-center gap-2 text-sm">
                  <span className="h-3 w-3 rounded-full" style={{ background: classColor(cls) }} />
                  <span className="text-white/85">{classNameRu(cls)}</span>
                  <span className="text-xs text-white/40">{cls}</span>
                  {isDefectClass(cls) && <span className="ml-auto text-[11px] text-red-200">дефект</span>}
                </div>
              ))}
            </div>
          </div>

          <div className="fx-card p-5">
            <div className="text-xs uppercase tracking-wide text-white/45">Метрики валидации</div>
            {info.metrics && Object.keys(info.metrics).length ? (
              <div className="mt-3 grid grid-cols-2 gap-3">
                {Object.entries(info.metrics).map(([k, v]) => (
                  <div key={k} className="rounded-2xl border border-white/10 bg-black/20 p-3">
                    <div className="text-[11px] text-white/45">{METRIC_LABELS[k] ?? k}</div>
                    <div className="mt-1 text-lg font-semibold tabular-nums text-white/90">{fmtMetric(v)}</div>
                  </div>
                ))}
              </div>
            ) : (
              <div className="mt-2 text-sm text-white/50">метрики не переданы</div>
            )}
          </div>
        </div>
      )}
    </div>
  );
}
