// src/pages/TaskPage.tsx
import React, { useCallback, useEffect, useState } from "react";
import { useNavigate, useParams } from "react-router-dom";
import { ArrowLeft, ChevronLeft, ChevronRight, FileDown, PenSquare, Trash2 } from "lucide-react";
import ClassStatsChart from "../components/ClassStatsChart";
import StatusBadge from "../components/StatusBadge";
import TaskProgressCard from "../components/TaskProgressCard";
import Button from "../components/ui/Button";
import Modal from "../components/ui/Modal";
import { toast } from "../components/ui/ToastCenter";
import { api } from "../api/api";
import { useTaskProgressStore } from "../store/useTaskProgressStore";
import type { TaskDetail, TaskImage, TaskProgressMessage } from "../types";
import { downloadBlob } from "../utils/download";
import { formatBytes, formatDateTime, formatPercent, isFinalStatus, shortId } from "../utils/format";
import { buildTaskReportDocx } from "../utils/wordReport";

const PAGE_SIZE = 50;

function progressOf(task: TaskDetail): TaskProgressMessage {
  return {
    task_id: task.id,
    status: task.status,
    processed_files: task.processed_files,
    total_files: task.total_files,
    failed_files: task.failed_files,
    defects_found: task.defects_found,
    message: task.message,
  };
}

type ImageTileProps = {
  image: TaskImage;
  /** пока задача в работе, BFF снимки не удаляет */
  canDelete: boolean;
  onAnnotate: () => void;
  onDelete: () => void;
};

function ImageTile({ image, canDelete, onAnnotate, onDelete }: ImageTileProps) {
  const src = api.fileUrl(image.result_url ?? image.original_url);
  const defects = image.summary?.defects_count ?? 0;

  return (
    <div className="group fx-card fx-soft-hover overflow-hidden">
      <div className="relative border-b border-white/10 bg-black/30">
        <img src={src} alt={image.file_name} loading="lazy" draggable={false} className="h-[150px] w-full object-cover" />
        <StatusBadge status={image.status} className="absolute left-2 top-2" />
        {defects > 0 && (
          <span className="absolute right-2 top-2 rounded-full bg-red-500/80 px-2 py-0.5 text-[11px] font-semibold text-white">
            {defects}
          </span>
        )}
      </div>
      <div className="p-3">
        <div className="truncate text-xs font-medium text-white/85" title={image.file_name}>
          {image.file_name}
        </div>
        <div className="mt-0.5 text-[11px] text-white/45">{formatBytes(image.file_size)}</div>
        {image.error_message && <div className="mt-1 line-clamp-2 text-[11px] text-red-200">{image.error_message}</div>}
        <div className="mt-2 flex items-center gap-1">
          <Button size="sm" variant="secondary" disabled={image.status !== "completed"} onClick={onAnnotate} title="Разметить вручную">
            <PenSquare className="h-3.5 w-3.5" />
          </Button>
          <Button size="sm" variant="ghost" disabled={!canDelete} onClick={onDelete} title="Удалить снимок" className="ml-auto">
            <Trash2 className="h-3.5 w-3.5" />
          </Button>
        </div>
      </div>
    </div>
  );
}

export default function TaskPage() {
  const nav = useNavigate();
  const { taskId = "" } = useParams();

  const follow = useTaskProgressStore((s) => s.follow);
  const forget = useTaskProgressStore((s) => s.forget);
  const live = useTaskProgressStore((s) => s.byTask[taskId]);
  const connected = useTaskProgressStore((s) => s.connected[taskId]);

  const [task, setTask] = useState<TaskDetail | null>(null);
  const [notFound, setNotFound] = useState(false);

  const [page, setPage] = useState(0);
  const [images, setImages] = useState<TaskImage[]>([]);
  const [total, setTotal] = useState(0);

  const [reporting, setReporting] = useState(false);
  const [confirmTask, setConfirmTask] = useState(false);
  const [imageToDelete, setImageToDelete] = useState<TaskImage | null>(null);
  const [busyDelete, setBusyDelete] = useState(false);

  const loadTask = useCallback(async () => {
    try {
      const t = await api.getTask(taskId);
      setTask(t);
      if (!isFinalStatus(t.status)) follow(t.id);
    } catch (e: unknown) {
      setNotFound(true);
      toast.error(e instanceof Error ? e.message : "Задача не найдена");
    }
  }, [taskId, follow]);

  const loadPage = useCallback(
    async (p: number) => {
      try {
        const res = await api.getTaskImages(taskId, { skip: p * PAGE_SIZE, limit: PAGE_SIZE });
        setImages(res.images);
        setTotal(res.total);
      } catch (e: unknown) {
        toast.error(e instanceof Error ? e.message : "Не удалось загрузить снимки");
      }
    },
    [taskId]
  );

  useEffect(() => {
    void loadTask();
  }, [loadTask]);

  useEffect(() => {
    void loadPage(page);
  }, [loadPage, page]);

  // сокет сообщил о завершении, перечитываем статистику и картинки
  const liveStatus = live?.status;
  useEffect(() => {
    if (!liveStatus || !isFinalStatus(liveStatus)) return;
    void loadTask();
    void loadPage(page);
    // страница здесь не повод перечитывать
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [liveStatus]);

  async function downloadReport() {
    if (!task) return;
    setReporting(true);
    try {
      const all = await api.allTaskImages(task.id);
      const blob = await buildTaskReportDocx({ task, images: all });
      downloadBlob(blob, `lineguard_${shortId(task.id)}.docx`);
      toast.success("Отчёт сформирован");
    } catch (e: unknown) {
      toast.error(e instanceof Error ? e.message : "Не удалось сформировать отчёт");
    } finally {
      setReporting(false);
    }
  }

  async function deleteTask() {
    setBusyDelete(true);
    try {
      await api.deleteTask(taskId);
      forget(taskId);
      toast.success("Задача удалена");
      nav("/history");
    } catch (e: unknown) {
      console.error("deleteTask failed:", e);
      toast.error("Не удалось удалить задачу");
    } finally {
      setBusyDelete(false);
      setConfirmTask(false);
    }
  }

  async function deleteImage() {
    if (!imageToDelete) return;
    setBusyDelete(true);
    try {
      await api.deleteTaskImage(taskId, imageToDelete.id);
      toast.success(`Снимок ${imageToDelete.file_name} удалён`);
      setImageToDelete(null);
      await Promise.all([loadTask(), loadPage(page)]);
    } catch (e: unknown) {
      toast.error(e instanceof Error ? e.message : "Не удалось удалить снимок");
    } finally {
      setBusyDelete(false);
    }
  }

  if (notFound) {
    return (
      <div className="mx-auto max-w-[700px] fx-frame fx-glass p-8 text-center">
        <div className="text-lg font-semibold text-white/85">Задача не найдена</div>
        <Button className="mt-4" onClick={() => nav("/history")}>
          К истории
        </Button>
      </div>
    );
  }

  if (!task) {
    return <div className="mx-auto max-w-[700px] fx-card p-6 text-white/60">Загрузка задачи…</div>;
  }

  const progress = live ?? progressOf(task);
  const pages = Math.max(1, Math.ceil(total / PAGE_SIZE));
  const stats = task.metadata?.class_stats_percent ?? {};

  return (
    <div className="mx-auto max-w-[1300px] space-y-5">
      <div className="fx-card fx-border-run p-6">
        <div className="flex flex-wrap items-start gap-4">
          <Button variant="ghost" leftIcon={<ArrowLeft className="h-4 w-4" />} onClick={() => nav("/history")}>
            История
          </Button>
          <div className="min-w-0">
            <div className="flex items-center gap-3">
              <div className="truncate text-2xl font-semibold">{task.route_name || `Задача ${shortId(task.id)}`}</div>
              <StatusBadge status={progress.status} />
            </div>
            <div className="mt-1 text-xs tabular-nums text-white/50">
              {task.id} • создана {formatDateTime(task.created_at)} • завершена {formatDateTime(task.completed_at)} • порог{" "}
              {formatPercent(task.confidence_threshold)} • {formatBytes(task.total_bytes)}
            </div>
          </div>
          <div className="ml-auto flex items-center gap-2">
            <Button
              variant="primary"
              leftIcon={<FileDown className="h-4 w-4" />}
              loading={reporting}
              disabled={!isFinalStatus(progress.status)}
              onClick={() => void downloadReport()}
            >
              Отчёт Word
            </Button>
            <Button variant="danger" leftIcon={<Trash2 className="h-4 w-4" />} onClick={() => setConfirmTask(true)}>
              Удалить
            </Button>
          </div>
        </div>
      </div>

      <div className="grid gap-4 lg:grid-cols-2">
        <TaskProgressCard progress={progress} connected={isFinalStatus(progress.status) ? null : (connected ?? false)} />
        <div className="fx-card p-4">
          <div className="mb-3 text-sm font-semibold text-white/85">Объекты по классам</div>
          <ClassStatsChart stats={stats} />
        </div>
      </div>

      {task.preview_files.length > 0 && (
        <div className="fx-card p-4">
          <div className="mb-3 text-sm font-semibold text-white/85">Превью</div>
          <div className="grid gap-3 sm:grid-cols-3">
            {task.preview_files.map((img) => (
              <a key={img.id} href={api.fileUrl(img.result_url ?? img.original_url)} target="_blank" rel="noreferrer">
                <img
                  src={api.fileUrl(img.result_url ?? img.original_url)}
                  alt={img.file_name}
                  className="h-[220px] w-full rounded-2xl border border-white/10 object-cover"
                  draggable={false}
                />
              </a>
            ))}
          </div>
        </div>
      )}

      <div className="fx-card p-4">
        <div className="mb-3 flex items-center gap-3">
          <div className="text-sm font-semibold text-white/85">Снимки ({total})</div>
          <div className="ml-auto flex items-center gap-2 text-xs tabular-nums text-white/60">
            <Button size="sm" variant="ghost" disabled={page === 0} onClick={() => setPage((p) => p - 1)}>
              <ChevronLeft className="h-4 w-4" />
            </Button>
            {page + 1} / {pages}
            <Button size="sm" variant="ghost" disabled={page + 1 >= pages} onClick={() => setPage((p) => p + 1)}>
              <ChevronRight className="h-4 w-4" />
            </Button>
          </div>
        </div>
        <div className="grid grid-cols-2 gap-3 sm:grid-cols-3 lg:grid-cols-5">
          {images.map((img) => (
            <ImageTile
              key={img.id}
              image={img}
              canDelete={isFinalStatus(progress.status)}
              onAnnotate={() => nav(`/tasks/${task.id}/images/${img.id}/annotate`)}
              onDelete={() => setImageToDelete(img)}
            />
          ))}
        </div>
      </div>

      <Modal
        open={confirmTask}
        onClose={() => setConfirmTask(false)}
        title="Удалить задачу?"
        footer={
          <>
            <Button variant="ghost" onClick={() => setConfirmTask(false)}>
              Отмена
            </Button>
            <Button variant="danger" loading={busyDelete} onClick={() => void deleteTask()}>
              Удалить
            </Button>
          </>
        }
      >
        <div className="text-sm text-white/70">Снимки и результаты задачи будут удалены без возможности восстановления.</div>
      </Modal>

      <Modal
        open={imageToDelete !== null}
        onClose={() => setImageToDelete(null)}
        title="Удалить снимок?"
        footer={
          <>
            <Button variant="ghost" onClick={() => setImageToDelete(null)}>
              Отмена
            </Button>
            <Button variant="danger" loading={busyDelete} onClick={() => void deleteImage()}>
              Удалить
            </Button>
          </>
        }
      >
        <div className="text-sm text-white/70">{imageToDelete?.file_name}</div>
      </Modal>
    </div>
  );
}
