// src/utils/format.ts
import type { TaskProgressMessage, TaskStatus } from "../types";

export const STATUS_LABELS: Record<TaskStatus, string> = {
  queued: "В очереди",
  processing: "Обработка",
  completed: "Завершена",
  failed: "Ошибка",
};

export function isFinalStatus(s: TaskStatus): boolean {
  return s === "completed" || s === "failed";
}

/** Процент обработанных файлов (успешных и упавших), 0..100 */
export function progressPercent(p: Pick<TaskProgressMessage, "processed_files" | "failed_files" | "total_files">): number {
  if (p.total_files <= 0) return 0;
  const done = Math.min(p.total_files, p.processed_files + p.failed_files);
  return Math.round((done / p.total_files) * 100);
}

const UNITS = ["Б", "КБ", "МБ", "ГБ"];

export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return "0 Б";
  let v = bytes;
  let i = 0;
  while (v >= 1024 && i < UNITS.length - 1) {
    v /= 1024;
    i += 1;
  }
  const rounded = i === 0 ? Math.round(v) : Math.round(v * 10) / 10;
  return `${String(rounded).replace(".", ",")} ${UNITS[i]}`;
}

export function formatPercent(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}

function pad(n: number) {
  return String(n).padStart(2, "0");
}

/** ДД.ММ.ГГГГ ЧЧ:ММ в локальном времени; пусто -> «—» */
export function formatDateTime(iso: string | null | undefined): string {
  if (!iso) return "—";
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) return "—";
  return `${pad(d.getDate())}.${pad(d.getMonth() + 1)}.${d.getFullYear()} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

export function shortId(id: string): string {
  return id.slice(0, 8);
}
