// src/pages/HistoryPage.tsx
import React, { useCallback, useEffect, useMemo, useRef, useState } from "react";
import { useNavigate } from "react-router-dom";
import { RefreshCw, Search, Trash2, Wifi, WifiOff } from "lucide-react";
import StatusBadge from "../components/StatusBadge";
import Button from "../components/ui/Button";
import Modal from "../components/ui/Modal";
import ProgressBar from "../components/ui/ProgressBar";
import { toast } from "../components/ui/ToastCenter";
import { api, historySocketUrl } from "../api/api";
import { openTaskSocket } from "../api/taskSocket";
import { useTaskProgressStore } from "../store/useTaskProgressStore";
import type { TaskListItem, TaskStatus } from "../types";
import { cn } from "../utils/cn";
import { formatDateTime, progressPercent, shortId, STATUS_LABELS } from "../utils/format";
import { filterHistory, patchHistory, type HistorySort } from "../utils/history";

const HISTORY_LIMIT = 100;

const STATUS_FILTERS: Array<TaskStatus | "all"> = ["all", "queued", "processing", "completed", "failed"];

const SORTS: Array<{ id: HistorySort; label: string }> = [
  { id: "newest", label: "Сначала новые" },
  { id: "oldest", label: "Сначала старые" },
  { id: "defects", label: "Больше дефектов" },
];

export default function HistoryPage() {
  const nav = useNavigate();
  const forget = useTaskProgressStore((s) => s.forget);

  const [items, setItems] = useState<TaskListItem[]>([]);
  const [loading, setLoading] = useState(false);
  const [live, setLive] = useState(false);

  const [status, setStatus] = useState<TaskStatus | "all">("all");
  const [query, setQuery] = useState("");
  const [sort, setSort] = useState<HistorySort>("newest");

  const [toDelete, setToDelete] = useState<TaskListItem | null>(null);
  const [deleting, setDeleting] = useState(false);

  const inflightRef = useRef(false);
  // сокет живёт дольше одного рендера, актуальный список берём отсюда
  const itemsRef = useRef<TaskListItem[]>([]);
  itemsRef.current = items;

  const reload = useCallback(async (opts?: { silent?: boolean }) => {
    if (inflightRef.current) return;
    inflightRef.current = true;
    if (!opts?.silent) setLoading(true);
    try {
      setItems(await api.history(HISTORY_LIMIT));
    } catch (e: unknown) {
      if (!opts?.silent) toast.error(e instanceof Error ? e.message : "Не удалось загрузить историю");
    } finally {
      inflightRef.current = false;
      if (!opts?.silent) setLoading(false);
    }
  }, []);

  useEffect(() => {
    void reload();
  }, [reload]);

  // живые обновления: знакомую задачу патчим, по незнакомой перечитываем список
  useEffect(() => {
    const handle = openTaskSocket(historySocketUrl(), {
      onMessage: (msg) => {
        const next = patchHistory(itemsRef.current, msg);
        if (!next) {
          void reload({ silent: true });
          return;
        }
        itemsRef.current = next;
        setItems(next);
      },
      onStateChange: setLive,
    });
    return () => handle.close();
  }, [reload]);

  const rows = useMemo(() => filterHistory(items, { status, query, sort }), [items, status, query, sort]);

  async function confirmDelete() {
    if (!toDelete) return;
    setDeleting(true);
    try {
      await api.deleteTask(toDelete.id);
      setItems((prev) => prev.filter((t) => t.id !== toDelete.id));
      forget(toDelete.id);
      toast.success(`Задача ${shortId(toDelete.id)} удалена`);
      setToDelete(null);
    } catch (e: unknown) {
      console.error("deleteTask failed:", e);
      toast.error("Не удалось удалить задачу");
    } finally {
      setDeleting(false);
    }
  }

  return (
    <div className="mx-auto max-w-[1200px] space-y-5">
      <div className="fx-card fx-border-run p-6">
        <div className="flex flex-wrap items-start justify-between gap-4">
          <div>
            <div className="text-3xl font-semibold">История</div>
            <div className="mt-2 flex items-center gap-2 text-xs tabular-nums text-white/55">
              Задач: {items.length}
              <span className={cn("inline-flex items-center gap-1", live ? "text-emerald-200" : "text-white/40")}>
                {live ? <Wifi className="h-3.5 w-3.5" /> : <WifiOff className="h-3.5 w-3.5" />}
                {live ? "онлайн" : "нет связи"}
              </span>
            </div>
          </div>
          <Button
            variant="secondary"
            leftIcon={<RefreshCw className="h-4 w-4" />}
            onClick={() => void reload()}
            loading={loading}
          >
            Обновить
          </Button>
        </div>

        <div className="mt-5 flex flex-wrap items-center gap-2">
          {STATUS_FILTERS.map((s) => (
            <button
              key={s}
              type="button"
              aria-pressed={status === s}
              onClick={() => setStatus(s)}
              className={cn("fx-chip", status === s && "fx-chip-active")}
            >
              {s === "all" ? "Все" : STATUS_LABELS[s]}
            </button>
          ))}

          <div className="relative ml-auto">
            <Search className="pointer-events-none absolute left-3 top-1/2 h-4 w-4 -translate-y-1/2 text-white/40" />
            <input
              value={query}
              onChange={(e) => setQuery(e.target.value)}
              placeholder="маршрут или id"
              className="fx-input w-56 pl-9"
            />
          </div>
          <select value={sort} onChange={(e) => setSort(SORTS.find((x) => x.id === e.target.value)?.id ?? "newest")} className="fx-input">
            {SORTS.map((s) => (
              <option key={s.id} value={s.id}>
                {s.label}
              </option>
            ))}
          </select>
        </div>
      </div>

      {rows.length === 0 ? (
        <div className="fx-card p-6 text-sm text-white/60">{items.length ? "Ничего не найдено" : "Задач пока нет"}</div>
      ) : (
        <div className="space-y-3">
          {rows.map((t) => (
            <div key={t.id} className="fx-card fx-soft-hover p-4">
              <div className="flex flex-wrap items-center gap-3">
                <button type="button" className="min-w-0 text-left" onClick={() => nav(`/tasks/${t.id}`)}>
                  <div className="truncate text-sm font-semibold text-white/90">{t.route_name || `Задача ${shortId(t.id)}`}</div>
                  <div className="text-[11px] tabular-nums text-white/45">
                    {shortId(t.id)} • {formatDateTime(t.created_at)}
                  </div>
                </button>
                <StatusBadge status={t.status} />
                <div className="ml-auto flex items-center gap-4 text-xs tabular-nums text-white/70">
                  <span>
                    файлов {t.processed_files + t.failed_files}/{t.total_files}
                  </span>
                  <span className={t.defects_found ? "text-red-200" : undefined}>дефектов {t.defects_found}</span>
                  <Button size="sm" variant="ghost" title="Удалить задачу" onClick={() => setToDelete(t)}>
                    <Trash2 className="h-4 w-4" />
                  </Button>
                </div>
              </div>
              {(t.status === "queued" || t.status === "processing") && (
                <ProgressBar className="mt-3" heightClassName="h-1.5" value={progressPercent(t)} />
              )}
            </div>
          ))}
        </div>
      )}

      <Modal
        open={toDelete !== null}
        onClose={() => setToDelete(null)}
        title="Удалить задачу?"
        footer={
          <>
            <Button variant="ghost" onClick={() => setToDelete(null)}>
              Отмена
            </Button>
            <Button variant="danger" loading={deleting} onClick={() => void confirmDelete()}>
              Удалить
            </Button>
          </>
        }
      >
        <div className="text-sm text-white/70">
          Задача {toDelete ? shortId(toDelete.id) : ""} и все её снимки с результатами будут удалены без возможности восстановления.
        </div>
      </Modal>
    </div>
  );
}
