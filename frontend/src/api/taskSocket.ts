// src/api/taskSocket.ts
import type { TaskProgressMessage, TaskStatus } from "../types";

export const RECONNECT_DELAY_MS = 3000;
const POLICY_VIOLATION = 1008;

const STATUSES: readonly TaskStatus[] = ["queued", "processing", "completed", "failed"];

function isStatus(v: unknown): v is TaskStatus {
  return typeof v === "string" && (STATUSES as readonly string[]).includes(v);
}

function isCount(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v) && v >= 0;
}

/** Сервер кроме прогресса шлёт "pong"; всё, что не похоже на прогресс, отбрасываем. */
export function parseProgressMessage(raw: string): TaskProgressMessage | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!data || typeof data !== "object") return null;

  const d: Record<string, unknown> = { ...data };
  if (typeof d.task_id !== "string" || !isStatus(d.status)) return null;
  if (!isCount(d.processed_files) || !isCount(d.total_files) || !isCount(d.failed_files) || !isCount(d.defects_found)) {
    return null;
  }

  return {
    task_id: d.task_id,
    status: d.status,
    processed_files: d.processed_files,
    total_files: d.total_files,
    failed_files: d.failed_files,
    defects_found: d.defects_found,
    message: typeof d.message === "string" ? d.message : null,
    ...(d.deleted === true ? { deleted: true } : {}),
  };
}

export type SocketHandlers = {
  onMessage: (msg: TaskProgressMessage) => void;
  onStateChange?: (connected: boolean) => void;
  /** сервер отказал (неверный id), больше не переподключаемся */
  onRejected?: () => void;
};

export type SocketHandle = { close: () => void };

export type SocketListeners = {
  open: () => void;
  message: (data: unknown) => void;
  close: (code: number) => void;
};

/** транспорт: в браузере WebSocket, в тестах фейк */
export type SocketFactory = (url: string, listeners: SocketListeners) => SocketHandle;

const browserSocket: SocketFactory = (url, l) => {
  const ws = new WebSocket(url);
  ws.onopen = () => l.open();
  ws.onmessage = (e: MessageEvent) => l.message(e.data);
  ws.onclose = (e: CloseEvent) => l.close(e.code);
  return { close: () => ws.close() };
};

export function openTaskSocket(url: string, handlers: SocketHandlers, createSocket: SocketFactory = browserSocket): SocketHandle {
  let socket: SocketHandle | null = null;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let closed = false;

  const connect = () => {
    if (closed) return;
    socket = createSocket(url, {
      open: () => handlers.onStateChange?.(true),
      message: (data) => {
        if (typeof data !== "string") return;
        const msg = parseProgressMessage(data);
        if (msg) handlers.onMessage(msg);
      },
      close: (code) => {
        socket = null;
        handlers.onStateChange?.(false);
        if (closed) return;
        if (code === POLICY_VIOLATION) {
          closed = true;
          handlers.onRejected?.();
          return;
        }
        timer = setTimeout(connect, RECONNECT_DELAY_MS);
      },
    });
  };

  connect();

  return {
    close: () => {
      closed = true;
      if (timer) clearTimeout(timer);
      timer = null;
      socket?.close();
      socket = null;
    },
  };
}
