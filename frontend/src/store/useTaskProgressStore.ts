// src/store/useTaskProgressStore.ts
import { create } from "zustand";
import { persist, createJSONStorage } from "zustand/middleware";
import { taskSocketUrl } from "../api/api";
import { openTaskSocket, type SocketHandle, type SocketHandlers } from "../api/taskSocket";
import { toast } from "../components/ui/ToastCenter";
import type { TaskProgressMessage } from "../types";
import { isFinalStatus, shortId } from "../utils/format";

type ProgressState = {
  byTask: Record<string, TaskProgressMessage>;
  /** задачи, за которыми следим (монитор держит сокет, пока задача не завершится) */
  followed: string[];
  connected: Record<string, boolean>;

  applyProgress: (msg: TaskProgressMessage) => void;
  follow: (taskId: string) => void;
  unfollow: (taskId: string) => void;
  setConnected: (taskId: string, value: boolean) => void;
  forget: (taskId: string) => void;
  reset: () => void;
};

function finishToast(msg: TaskProgressMessage) {
  const id = shortId(msg.task_id);
  if (msg.status === "completed") {
    const tail = msg.failed_files ? `, ошибок: ${msg.failed_files}` : "";
    toast.success(`✅ Задача ${id} завершена: дефектов ${msg.defects_found}${tail}`);
  } else if (msg.status === "failed") {
    toast.error(`Задача ${id} завершилась с ошибкой${msg.message ? `: ${msg.message}` : ""}`);
  }
}

export const useTaskProgressStore = create<ProgressState>()(
  persist(
    (set, get) => ({
      byTask: {},
      followed: [],
      connected: {},

      applyProgress: (msg) => {
        if (msg.deleted) {
          get().forget(msg.task_id);
          return;
        }
        const prev = get().byTask[msg.task_id];
        // финальный статус не откатываем запоздавшим сообщением
        if (prev && isFinalStatus(prev.status) && !isFinalStatus(msg.status)) return;

        set((s) => ({ byTask: { ...s.byTask, [msg.task_id]: msg } }));

        const becameFinal = isFinalStatus(msg.status) && (!prev || !isFinalStatus(prev.status));
        if (becameFinal && get().followed.includes(msg.task_id)) finishToast(msg);
      },

      follow: (taskId) => {
        if (get().followed.includes(taskId)) return;
        set((s) => ({ followed: [...s.followed, taskId] }));
      },

      unfollow: (taskId) => set((s) => ({ followed: s.followed.filter((id) => id !== taskId) })),

      setConnected: (taskId, value) => set((s) => ({ connected: { ...s.connected, [taskId]: value } })),

      forget: (taskId) =>
        set((s) => {
          const byTask = { ...s.byTask };
          delete byTask[taskId];
          const connected = { ...s.connected };
          delete connected[taskId];
          return { byTask, connected, followed: s.followed.filter((id) => id !== taskId) };
        }),

      reset: () => set({ byTask: {}, followed: [], connected: {} }),
    }),
    {
      name: "lineguard-progress",
      version: 1,
      storage: createJSONStorage(() => sessionStorage),
      partialize: (s) => ({ followed: s.followed }),
      migrate: (persisted) => {
        const raw = persisted && typeof persisted === "object" && "followed" in persisted ? persisted.followed : [];
        const followed = Array.isArray(raw) ? raw.filter((x): x is string => typeof x === "string") : [];
        return { followed };
      },
    }
  )
);

/* ---------- Монитор: сокеты для отслеживаемых задач ---------- */

export type SocketOpener = (taskId: string, handlers: SocketHandlers) => SocketHandle;

const defaultOpener: SocketOpener = (taskId, handlers) => openTaskSocket(taskSocketUrl(taskId), handlers);

let opener: SocketOpener = defaultOpener;
const sockets = new Map<string, SocketHandle>();

function shouldWatch(state: ProgressState, taskId: string): boolean {
  const last = state.byTask[taskId];
  return !last || !isFinalStatus(last.status);
}

export function syncTaskSockets(state: ProgressState = useTaskProgressStore.getState()) {
  const wanted = new Set(state.followed.filter((id) => shouldWatch(state, id)));

  for (const [taskId, handle] of sockets) {
    if (wanted.has(taskId)) continue;
    handle.close();
    sockets.delete(taskId);
  }

  for (const taskId of wanted) {
    if (sockets.has(taskId)) continue;
    const store = useTaskProgressStore.getState();
    sockets.set(
      taskId,
      opener(taskId, {
        onMessage: (msg) => useTaskProgressStore.getState().applyProgress(msg),
        onStateChange: (connected) => store.setConnected(taskId, connected),
        onRejected: () => {
          sockets.delete(taskId);
          useTaskProgressStore.getState().unfollow(taskId);
        },
      })
    );
  }
}

export function activeSocketCount(): number {
  return sockets.size;
}

/** для тестов: подменить открытие сокета и закрыть всё открытое */
export function setSocketOpener(next: SocketOpener | null) {
  for (const handle of sockets.values()) handle.close();
  sockets.clear();
  opener = next ?? defaultOpener;
}

let monitorInit = false;
function initMonitorOnce() {
  if (monitorInit) return;
  monitorInit = true;

  useTaskProgressStore.subscribe((s, prev) => {
    if (s.followed !== prev.followed || s.byTask !== prev.byTask) syncTaskSockets(s);
  });

  // followed уже мог подняться из sessionStorage
  syncTaskSockets();
}
initMonitorOnce();
