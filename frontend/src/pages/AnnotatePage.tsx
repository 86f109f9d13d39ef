// src/pages/AnnotatePage.tsx
import React, { useEffect, useMemo, useState } from "react";
import { useNavigate, useParams } from "react-router-dom";
import { ArrowLeft, Pencil, RotateCcw, Save, Trash2 } from "lucide-react";
import ViewerCanvas from "../components/ViewerCanvas";
import Button from "../components/ui/Button";
import { toast } from "../components/ui/ToastCenter";
import { api } from "../api/api";
import { MODEL_CLASSES, CLASS_NAMES_RU } from "../constants/defects";
import type { BBox, TaskImage } from "../types";
import { boxesToManual, detectionsToBoxes, manualToBoxes } from "../utils/bbox";
import { cn } from "../utils/cn";
import { formatPercent } from "../utils/format";

const HOTKEYS = [
  ["ЛКМ по пустому месту", "новая рамка (в режиме рисования)"],
  ["Alt + перетаскивание", "копия рамки"],
  ["Alt + D", "дублировать выбранную"],
  ["Стрелки, Shift + стрелки", "сдвиг мелкий / крупный"],
  ["Delete", "удалить выбранную"],
  ["Колесо, Shift + ЛКМ", "зум, панорама"],
] as const;

/** Стартовые рамки: ручная разметка, если уже сохраняли, иначе детекции модели. */
function initialBoxes(image: TaskImage, w: number, h: number): BBox[] {
  const manual = image.summary?.manual_annotations;
  if (manual?.length) return manualToBoxes(manual, w, h);
  return detectionsToBoxes(image.summary?.detections ?? [], w, h);
}

export default function AnnotatePage() {
  const nav = useNavigate();
  const { taskId = "", imageId = "" } = useParams();

  const [image, setImage] = useState<TaskImage | null>(null);
  const [missing, setMissing] = useState(false);
  const [size, setSize] = useState<{ w: number; h: number } | null>(null);

  const [boxes, setBoxes] = useState<BBox[]>([]);
  const [seeded, setSeeded] = useState(false);
  const [selectedId, setSelectedId] = useState<string | null>(null);
  const [drawMode, setDrawMode] = useState(true);
  const [defaults, setDefaults] = useState<Pick<BBox, "name" | "isDefect">>({ name: "", isDefect: true });
  const [saving, setSaving] = useState(false);

  useEffect(() => {
    let cancelled = false;
    async function load() {
      try {
        const found = await api.getTaskImage(taskId, imageId);
        if (!cancelled) setImage(found);
      } catch (e: unknown) {
        if (cancelled) return;
        setMissing(true);
        toast.error(e instanceof Error ? e.message : "Не удалось загрузить снимок");
      }
    }
    void load();
    return () => {
      cancelled = true;
    };
  }, [taskId, imageId]);

  // пиксельные координаты переводим в 0..1, только когда известен размер картинки
  useEffect(() => {
    if (!image || !size || seeded) return;
    setBoxes(initialBoxes(image, size.w, size.h));
    setSeeded(true);
  }, [image, size, seeded]);

  const selected = useMemo(() => boxes.find((b) => b.id === selectedId) ?? null, [boxes, selectedId]);

  function patchSelected(patch: Partial<Pick<BBox, "name" | "isDefect">>) {
    if (!selectedId) return;
    setBoxes((prev) => prev.map((b) => (b.id === selectedId ? { ...b, ...patch } : b)));
  }

  function removeSelected() {
    if (!selectedId) return;
    setBoxes((prev) => prev.filter((b) => b.id !== selectedId));
    setSelectedId(null);
  }

  function resetToModel() {
    if (!image || !size) return;
    setBoxes(initialBoxes(image, size.w, size.h));
    setSelectedId(null);
  }

  async function save() {
    if (!size || !boxes.length) return;
    setSaving(true);
    try {
      const res = await api.annotateImage(taskId, imageId, boxesToManual(boxes, size.w, size.h));
      toast.success(res.message || "Разметка сохранена");
      nav(`/tasks/${taskId}`);
    } catch (e: unknown) {
      toast.error(e instanceof Error ? e.message : "Не удалось сохранить разметку");
    } finally {
      setSaving(false);
    }
  }

  if (missing) {
    return (
      <div className="mx-auto max-w-[700px] fx-frame fx-glass p-8 text-center">
        <div className="text-lg font-semibold text-white/85">Изображение не найдено</div>
        <Button className="mt-4" onClick={() => nav(`/tasks/${taskId}`)}>
          К задаче
        </Button>
      </div>
    );
  }

  if (!image) return <div className="mx-auto max-w-[700px] fx-card p-6 text-white/60">Загрузка снимка…</div>;

  return (
    <div className="mx-auto max-w-[1500px] space-y-4">
      <div className="flex flex-wrap items-center gap-3">
        <Button variant="ghost" leftIcon={<ArrowLeft className="h-4 w-4" />} onClick={() => nav(`/tasks/${taskId}`)}>
          К задаче
        </Button>
        <div className="min-w-0 truncate text-lg font-semibold text-white/90">{image.file_name}</div>
        <div className="ml-auto flex items-center gap-2">
          <Button
            variant={drawMode ? "primary" : "secondary"}
            aria-pressed={drawMode}
            leftIcon={<Pencil className="h-4 w-4" />}
            onClick={() => setDrawMode((v) => !v)}
          >
            Рисование
          </Button>
          <Button leftIcon={<RotateCcw className="h-4 w-4" />} onClick={resetToModel} disabled={!size}>
            Сбросить
          </Button>
          <Button
            variant="primary"
            leftIcon={<Save className="h-4 w-4" />}
            loading={saving}
            disabled={!boxes.length || !size}
            onClick={() => void save()}
          >
            Сохранить
          </Button>
        </div>
      </div>

      <div className="grid gap-4 lg:grid-cols-[1fr_340px]">
        <div className="fx-frame fx-glass h-[76vh] overflow-hidden p-2">
          <ViewerCanvas
            src={api.fileUrl(image.original_url)}
            bboxes={boxes}
            selectedId={selectedId}
            onSelect={setSelectedId}
            onBBoxesChange={setBoxes}
            drawMode={drawMode}
            newBoxDefaults={defaults}
            onImageSize={setSize}
          />
        </div>

        <div className="fx-frame fx-glass max-h-[76vh] space-y-4 overflow-auto p-4">
          <datalist id="class-names">
            {MODEL_CLASSES.map((c) => (
              <option key={c} value={CLASS_NAMES_RU[c]} />
            ))}
          </datalist>

          <div>
            <div className="text-xs uppercase tracking-wide text-white/45">Новая рамка</div>
            <input
              list="class-names"
              value={defaults.name}
              onChange={(e) => setDefaults((d) => ({ ...d, name: e.target.value }))}
              placeholder="название объекта"
              className="fx-input mt-2 w-full"
            />
            <label className="mt-2 flex items-center gap-2 text-sm text-white/75">
              <input
                type="checkbox"
                checked={defaults.isDefect}
                onChange={(e) => setDefaults((d) => ({ ...d, isDefect: e.target.checked }))}
              />
              дефект
            </label>
          </div>

          <div className="fx-divider" />

          {selected ? (
            <div>
              <div className="text-xs uppercase tracking-wide text-white/45">Выбранная рамка</div>
              <input
                list="class-names"
                value={selected.name}
                onChange={(e) => patchSelected({ name: e.target.value })}
                className="fx-input mt-2 w-full"
              />
              <label className="mt-2 flex items-center gap-2 text-sm text-white/75">
                <input type="checkbox" checked={selected.isDefect} onChange={(e) => patchSelected({ isDefect: e.target.checked })} />
                дефект
              </label>
              <Button className="mt-3" size="sm" variant="danger" leftIcon={<Trash2 className="h-4 w-4" />} onClick={removeSelected}>
                Удалить рамку
              </Button>
            </div>
          ) : (
            <div className="text-sm text-white/50">Выберите рамку на снимке или в списке.</div>
          )}

          <div className="fx-divider" />

          <div>
            <div className="text-xs uppercase tracking-wide text-white/45">Рамки ({boxes.length})</div>
            <div className="mt-2 space-y-1">
              {boxes.map((b) => (
                <button
                  key={b.id}
                  type="button"
                  onClick={() => setSelectedId(b.id)}
                  className={cn(
                    "flex w-full items-center gap-2 rounded-xl px-2 py-1.5 text-left text-xs",
                    b.id === selectedId ? "bg-white/10 text-white" : "text-white/70 hover:bg-white/[0.05]"
                  )}
                >
                  <span className={cn("h-2 w-2 rounded-full", b.isDefect ? "bg-red-400" : "bg-emerald-400")} />
                  <span className="truncate">{b.name || (b.isDefect ? "дефект" : "объект")}</span>
                  {b.confidence !== undefined && <span className="ml-auto tabular-nums text-white/45">{formatPercent(b.confidence)}</span>}
                </button>
              ))}
            </div>
          </div>

          <div className="fx-divider" />

          <div className="space-y-1 text-[11px] text-white/45">
            {HOTKEYS.map(([k, v]) => (
              <div key={k}>
                <span className="text-white/70">{k}</span> — {v}
              </div>
            ))}
          </div>
        </div>
      </div>
    </div>
  );
}
