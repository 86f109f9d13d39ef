// src/utils/history.ts
import type { TaskListItem, TaskProgressMessage, TaskStatus } from "../types";

export type HistorySort = "newest" | "oldest" | "defects";

export type HistoryFilter = {
  status: TaskStatus | "all";
  query: string;
  sort: HistorySort;
};

function createdMs(t: TaskListItem) {
  const ms = t.created_at ? Date.parse(t.created_at) : NaN;
  return Number.isNaN(ms) ? 0 : ms;
}

export function filterHistory(items: TaskListItem[], f: HistoryFilter): TaskListItem[] {
  const q = f.query.trim().toLowerCase();

  const rows = items.filter((t) => {
    if (f.status !== "all" && t.status !== f.status) return false;
    if (!q) return true;
    return t.id.toLowerCase().includes(q) || (t.route_name ?? "").toLowerCase().includes(q);
  });

  const byDate = (a: TaskListItem, b: TaskListItem) => createdMs(b) - createdMs(a);
  if (f.sort === "oldest") return rows.sort((a, b) => -byDate(a, b));
  if (f.sort === "defects") return rows.sort((a, b) => b.defects_found - a.defects_found || byDate(a, b));
  return rows.sort(byDate);
}

/**
 * Применяет сообщение из /ws/history к списку.
 * null: задачи в списке нет, список надо перечитать.
 * Удалённую задачу просто убираем из списка.
 */
export function patchHistory(items: TaskListItem[], msg: TaskProgressMessage): TaskListItem[] | null {
  if (msg.deleted) return items.filter((t) => t.id !== msg.task_id);

  const idx = items.findIndex((t) => t.id === msg.task_id);
  if (idx < 0) return null;

  const next = [...items];
  next[idx] = {
    ...items[idx],
    status: msg.status,
    processed_files: msg.processed_files,
    total_files: msg.total_files,
    failed_files: msg.failed_files,
    defects_found: msg.defects_found,
  };
  return next;
}
