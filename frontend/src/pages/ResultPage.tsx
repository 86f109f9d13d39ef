// src/pages/ResultPage.tsx
import React, { useMemo, useState } from "react";
import { useNavigate } from "react-router-dom";
import { ArrowLeft, ShieldAlert, ShieldCheck } from "lucide-react";
import DetectionList from "../components/DetectionList";
import ViewerCanvas from "../components/ViewerCanvas";
import Button from "../components/ui/Button";
import { classColor } from "../constants/defects";
import { useAppStore } from "../store/useAppStore";
import type { BBox } from "../types";
import { detectionsToBoxes } from "../utils/bbox";
import { formatDateTime, formatPercent } from "../utils/format";

function Counter({ label, value, danger = false }: { label: string; value: React.ReactNode; danger?: boolean }) {
  return (
    <div className="fx-card p-3">
      <div className="text-[11px] uppercase tracking-wide text-white/45">{label}</div>
      <div className={danger ? "mt-1 text-lg font-semibold text-red-200" : "mt-1 text-lg font-semibold text-white/90"}>{value}</div>
    </div>
  );
}

export default function ResultPage() {
  const nav = useNavigate();
  const result = useAppStore((s) => s.result);

  const [size, setSize] = useState({ w: 0, h: 0 });
  const [hidden, setHidden] = useState<Set<string>>(() => new Set());
  const [selected, setSelected] = useState<number | null>(null);

  const detections = useMemo(() => result?.response.detections ?? [], [result]);

  // индекс детекции = индекс в det_i, чтобы список и холст подсвечивали одно и то же
  const boxes = useMemo(() => {
    const all = detectionsToBoxes(detections, size.w, size.h);
    return all.filter((_, i) => !hidden.has(detections[i].class));
  }, [detections, size, hidden]);

  const classByBoxId = useMemo(() => {
    const m = new Map<string, string>();
    detections.forEach((d, i) => m.set(`det_${i}`, d.class));
    return m;
  }, [detections]);

  function toggleClass(cls: string) {
    setHidden((prev) => {
      const next = new Set(prev);
      if (next.has(cls)) next.delete(cls);
      else next.add(cls);
      return next;
    });
  }

  if (!result) {
    return (
      <div className="mx-auto max-w-[700px] fx-frame fx-glass p-8 text-center">
        <div className="text-lg font-semibold text-white/85">Результата пока нет</div>
        <div className="mt-1 text-sm text-white/55">Загрузите одно фото в режиме «Одно фото», и здесь появится разметка.</div>
        <Button className="mt-4" variant="primary" onClick={() => nav("/upload")}>
          К загрузке
        </Button>
      </div>
    );
  }

  const { response } = result;
  const selectedId = selected === null ? null : `det_${selected}`;
  const colorOf = (b: BBox) => classColor(classByBoxId.get(b.id) ?? "");

  return (
    <div className="mx-auto max-w-[1400px] space-y-4">
      <div className="flex flex-wrap items-center gap-3">
        <Button variant="ghost" leftIcon={<ArrowLeft className="h-4 w-4" />} onClick={() => nav("/upload")}>
          Новое фото
        </Button>
        <div className="min-w-0">
          <div className="truncate text-lg font-semibold text-white/90">{result.fileName}</div>
          <div className="text-xs text-white/45">
            {formatDateTime(new Date(result.analyzedAt).toISOString())} • порог {formatPercent(result.conf)}
          </div>
        </div>
        <div className="ml-auto flex items-center gap-2 text-sm">
          {response.has_defects ? (
            <span className="flex items-center gap-1.5 text-red-200">
              <ShieldAlert className="h-4 w-4" /> Есть дефекты
            </span>
          ) : (
            <span className="flex items-center gap-1.5 text-emerald-200">
              <ShieldCheck className="h-4 w-4" /> Дефекты не обнаружены
            </span>
          )}
        </div>
      </div>

      <div className="grid gap-3 sm:grid-cols-3">
        <Counter label="Объектов" value={response.total_objects} />
        <Counter label="Дефектов" value={response.defects_count} danger={response.defects_count > 0} />
        <Counter label="Классов" value={Object.keys(response.statistics).length} />
      </div>

      <div className="grid gap-4 lg:grid-cols-[1fr_360px]">
        <div className="fx-frame fx-glass h-[70vh] overflow-hidden p-2">
          <ViewerCanvas
            src={result.imageUrl}
            bboxes={boxes}
            selectedId={selectedId}
            onSelect={(id) => setSelected(id ? Number(id.replace("det_", "")) : null)}
            readOnly
            colorOf={colorOf}
            onImageSize={setSize}
          />
        </div>
        <div className="fx-frame fx-glass max-h-[70vh] overflow-auto p-4">
          <DetectionList
            detections={detections}
            hidden={hidden}
            onToggleClass={toggleClass}
            selectedIndex={selected}
            onSelect={setSelected}
          />
        </div>
      </div>
    </div>
  );
}
