// src/pages/UploadPage.tsx
import React, { useEffect, useMemo, useRef, useState } from "react";
import { useNavigate } from "react-router-dom";
import { Image as ImageIcon, Layers, Trash2, UploadCloud, X } from "lucide-react";
import Button from "../components/ui/Button";
import Modal from "../components/ui/Modal";
import ProgressBar from "../components/ui/ProgressBar";
import { toast } from "../components/ui/ToastCenter";
import { api } from "../api/api";
import { MAX_PREVIEW_LIMIT, useAppStore, type UploadMode } from "../store/useAppStore";
import { useTaskProgressStore } from "../store/useTaskProgressStore";
import { cn } from "../utils/cn";
import { checkFiles, MAX_BATCH_BYTES, MAX_BATCH_FILES, SUPPORTED_EXTENSIONS, totalSize } from "../utils/files";
import { formatBytes, formatPercent } from "../utils/format";

type PendingItem = {
  key: string;
  file: File;
  /** превью делаем только для первых файлов, иначе вкладка съест память */
  previewUrl?: string;
};

const PREVIEW_THUMBS = 24;

function fileKey(f: File) {
  return `${f.name}__${f.size}__${f.lastModified}`;
}

const MODES: Array<{ id: UploadMode; title: string; hint: string; Icon: typeof ImageIcon }> = [
  { id: "single", title: "Одно фото", hint: "результат сразу, без сохранения", Icon: ImageIcon },
  { id: "batch", title: "Пакет", hint: "фоновая задача с историей", Icon: Layers },
];

export default function UploadPage() {
  const nav = useNavigate();
  const inputRef = useRef<HTMLInputElement | null>(null);

  const { mode, setMode, conf, setConf, previewLimit, setPreviewLimit, routeName, setRouteName, setResult, setLastTaskId } =
    useAppStore();
  const follow = useTaskProgressStore((s) => s.follow);

  const [pending, setPending] = useState<PendingItem[]>([]);
  const [drag, setDrag] = useState(false);
  const [busy, setBusy] = useState(false);
  const [uploadPct, setUploadPct] = useState(0);

  // objectURL живут, пока элемент в списке
  const pendingRef = useRef<PendingItem[]>([]);
  pendingRef.current = pending;
  useEffect(() => {
    return () => {
      for (const it of pendingRef.current) if (it.previewUrl) URL.revokeObjectURL(it.previewUrl);
    };
  }, []);

  const files = useMemo(() => pending.map((p) => p.file), [pending]);
  const bytes = totalSize(files);
  const overLimit = mode === "batch" && bytes > MAX_BATCH_BYTES;

  function addFiles(list: File[]) {
    if (!list.length) return;

    const { accepted, rejected } = checkFiles(list, mode);
    if (rejected.length) {
      const first = rejected[0];
      const more = rejected.length > 1 ? ` и ещё ${rejected.length - 1}` : "";
      toast.warn(`${first.name}: ${first.reason}${more}`);
    }
    if (!accepted.length) return;

    setPending((prev) => {
      if (mode === "single") {
        for (const it of prev) if (it.previewUrl) URL.revokeObjectURL(it.previewUrl);
        const f = accepted[0];
        return [{ key: fileKey(f), file: f, previewUrl: URL.createObjectURL(f) }];
      }

      const keys = new Set(prev.map((p) => p.key));
      const next = [...prev];
      for (const f of accepted) {
        const key = fileKey(f);
        if (keys.has(key)) continue;
        keys.add(key);
        next.push({ key, file: f, previewUrl: next.length < PREVIEW_THUMBS ? URL.createObjectURL(f) : undefined });
      }
      if (next.length > MAX_BATCH_FILES) toast.warn(`Лимит пакета: ${MAX_BATCH_FILES} файлов. Лишние не добавлены.`);
      return next.slice(0, MAX_BATCH_FILES);
    });
  }

  function removeOne(key: string) {
    setPending((prev) => {
      const it = prev.find((p) => p.key === key);
      if (it?.previewUrl) URL.revokeObjectURL(it.previewUrl);
      return prev.filter((p) => p.key !== key);
    });
  }

  function clearAll() {
    setPending((prev) => {
      for (const it of prev) if (it.previewUrl) URL.revokeObjectURL(it.previewUrl);
      return [];
    });
  }

  function switchMode(next: UploadMode) {
    if (next === mode) return;
    clearAll();
    setMode(next);
  }

  async function runSingle() {
    const item = pending[0];
    if (!item) return;

    setBusy(true);
    try {
      const response = await api.predict(item.file, conf);
      // objectURL переезжает в стор, из списка его не отзываем
      const imageUrl = item.previewUrl ?? URL.createObjectURL(item.file);
      setPending([]);
      setResult({ fileName: item.file.name, imageUrl, response, conf, analyzedAt: Date.now() });
      toast.success(response.has_defects ? `Найдено дефектов: ${response.defects_count}` : "Дефекты не обнаружены");
      nav("/result");
    } catch (e: unknown) {
      toast.error(e instanceof Error ? e.message : "Ошибка анализа");
    } finally {
      setBusy(false);
    }
  }

  async function runBatch() {
    if (!files.length) return;

    setBusy(true);
    setUploadPct(0);
    try {
      const accepted = await api.predictBatch(files, { conf, previewLimit, routeName }, setUploadPct);
      setLastTaskId(accepted.task_id);
      follow(accepted.task_id);
      clearAll();
      toast.success(`Задача создана: ${files.length} файлов в очереди`);
      nav(`/tasks/${accepted.task_id}`);
    } catch (e: unknown) {
      toast.error(e instanceof Error ? e.message : "Ошибка загрузки");
    } finally {
      setBusy(false);
      setUploadPct(0);
    }
  }

  function onDrop(e: React.DragEvent) {
    e.preventDefault();
    setDrag(false);
    addFiles(Array.from(e.dataTransfer.files));
  }

  return (
    <div className="mx-auto max-w-[1100px] space-y-5">
      <div className="fx-frame fx-glass p-5">
        <div className="text-xl font-semibold text-white/90">Загрузка снимков</div>
        <div className="mt-1 text-sm text-white/55">
          Модель ищет на фото ЛЭП изоляторы, траверсы и виброгасители и отмечает поврежденные или отсутствующие изоляторы.
        </div>

        <div className="mt-4 grid gap-3 sm:grid-cols-2">
          {MODES.map(({ id, title, hint, Icon }) => (
            <button
              key={id}
              type="button"
              onClick={() => switchMode(id)}
              aria-pressed={mode === id}
              className={cn("fx-card flex items-center gap-3 p-4 text-left", mode === id && "fx-chip-active")}
            >
              <Icon className="h-5 w-5 text-orange-200" />
              <div>
                <div className="text-sm font-semibold text-white/85">{title}</div>
                <div className="text-xs text-white/50">{hint}</div>
              </div>
            </button>
          ))}
        </div>
      </div>

      <div
        onDragOver={(e) => {
          e.preventDefault();
          setDrag(true);
        }}
        onDragLeave={() => setDrag(false)}
        onDrop={onDrop}
        className={cn("fx-frame fx-glass p-8 text-center transition", drag && "fx-border-run")}
      >
        <UploadCloud className="mx-auto h-10 w-10 text-white/60" />
        <div className="mt-3 text-sm text-white/75">
          {mode === "single" ? "Перетащи снимок сюда" : "Перетащи снимки сюда"} или{" "}
          <button type="button" className="text-orange-200 underline" onClick={() => inputRef.current?.click()}>
            выбери на диске
          </button>
        </div>
        <div className="mt-1 text-xs text-white/45">
          {SUPPORTED_EXTENSIONS.join(", ")} •{" "}
          {mode === "single" ? "до 50 МБ" : `до ${MAX_BATCH_FILES} файлов, всего до ${formatBytes(MAX_BATCH_BYTES)}`} • архивы не
          принимаются
        </div>
        <input
          ref={inputRef}
          type="file"
          className="hidden"
          multiple={mode === "batch"}
          accept={SUPPORTED_EXTENSIONS.join(",")}
          onChange={(e) => {
            addFiles(Array.from(e.target.files ?? []));
            e.target.value = "";
          }}
        />
      </div>

      {pending.length > 0 && (
        <div className="fx-frame fx-glass p-5">
          <div className="flex items-center gap-3">
            <div className="text-sm text-white/80">
              Выбрано: {pending.length} • {formatBytes(bytes)}
            </div>
            <Button size="sm" variant="ghost" className="ml-auto" leftIcon={<Trash2 className="h-4 w-4" />} onClick={clearAll}>
              Очистить
            </Button>
          </div>
          {overLimit && <div className="mt-2 text-xs text-red-200">Общий размер больше {formatBytes(MAX_BATCH_BYTES)}</div>}

          <div className="mt-3 grid grid-cols-3 gap-2 sm:grid-cols-6">
            {pending.slice(0, PREVIEW_THUMBS).map((it) => (
              <div key={it.key} className="group relative overflow-hidden rounded-2xl border border-white/10 bg-black/30">
                {it.previewUrl ? (
                  <img src={it.previewUrl} alt={it.file.name} className="aspect-square w-full object-cover" draggable={false} />
                ) : (
                  <div className="flex aspect-square items-center justify-center text-[11px] text-white/45">{it.file.name}</div>
                )}
                <button
                  type="button"
                  onClick={() => removeOne(it.key)}
                  className="absolute right-1 top-1 rounded-full bg-black/60 p-1 opacity-0 transition group-hover:opacity-100"
                  title="Убрать"
                >
                  <X className="h-3.5 w-3.5 text-white/80" />
                </button>
              </div>
            ))}
          </div>
          {pending.length > PREVIEW_THUMBS && (
            <div className="mt-2 text-xs text-white/45">и ещё {pending.length - PREVIEW_THUMBS}</div>
          )}
        </div>
      )}

      <div className="fx-frame fx-glass grid gap-4 p-5 md:grid-cols-3">
        <label className="block">
          <div className="text-xs text-white/55">Порог уверенности: {formatPercent(conf)}</div>
          <input
            type="range"
            min={0.05}
            max={0.95}
            step={0.05}
            value={conf}
            onChange={(e) => setConf(Number(e.target.value))}
            className="mt-2 w-full accent-orange-400"
          />
        </label>

        {mode === "batch" && (
          <>
            <label className="block">
              <div className="text-xs text-white/55">Превью в задаче (до {MAX_PREVIEW_LIMIT})</div>
              <input
                type="number"
                min={1}
                max={MAX_PREVIEW_LIMIT}
                value={previewLimit}
                onChange={(e) => setPreviewLimit(Number(e.target.value))}
                className="fx-input mt-2 w-full"
              />
            </label>
            <label className="block">
              <div className="text-xs text-white/55">Маршрут / участок ЛЭП</div>
              <input
                value={routeName}
                onChange={(e) => setRouteName(e.target.value)}
                placeholder="например, ВЛ 110 кВ, опоры 12–40"
                className="fx-input mt-2 w-full"
              />
            </label>
          </>
        )}
      </div>

      <div className="flex justify-end">
        <Button
          variant="primary"
          loading={busy}
          disabled={!pending.length || overLimit}
          onClick={() => void (mode === "single" ? runSingle() : runBatch())}
        >
          {mode === "single" ? "Анализировать" : "Запустить задачу"}
        </Button>
      </div>

      <Modal open={busy && mode === "batch"} onClose={() => undefined} closeOnBackdrop={false} title="Отправка файлов">
        <ProgressBar value={uploadPct} showLabel label="Загрузка на сервер" />
        <div className="mt-2 text-xs text-white/50">После загрузки анализ продолжится в фоне.</div>
      </Modal>
    </div>
  );
}
