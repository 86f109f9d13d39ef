// src/store/useAppStore.ts
import { create } from "zustand";
import { persist, createJSONStorage } from "zustand/middleware";
import type { PredictResponse } from "../types";

export type UploadMode = "single" | "batch";

export type SingleResult = {
  fileName: string;
  /** objectURL исходного файла: живёт только в памяти вкладки */
  imageUrl: string;
  response: PredictResponse;
  conf: number;
  analyzedAt: number;
};

type Settings = {
  conf: number;
  previewLimit: number;
  routeName: string;
  mode: UploadMode;
  lastTaskId?: string;
};

type State = Settings & {
  result: SingleResult | null;

  setConf: (v: number) => void;
  setPreviewLimit: (v: number) => void;
  setRouteName: (v: string) => void;
  setMode: (m: UploadMode) => void;
  setLastTaskId: (id?: string) => void;

  setResult: (r: SingleResult | null) => void;
  resetAll: () => void;
};

/** столько превью BFF разрешает по умолчанию (PREVIEW_LIMIT) */
export const MAX_PREVIEW_LIMIT = 10;

export const DEFAULT_SETTINGS: Settings = {
  conf: 0.35,
  previewLimit: 3,
  routeName: "",
  mode: "batch",
};

const clamp = (v: number, a: number, b: number) => Math.max(a, Math.min(b, v));

function safeNumber(n: unknown, fallback: number) {
  return typeof n === "number" && Number.isFinite(n) ? n : fallback;
}

function safeString(s: unknown, fallback = "") {
  return typeof s === "string" ? s : fallback;
}

function safePreviewLimit(v: unknown) {
  return clamp(Math.round(safeNumber(v, DEFAULT_SETTINGS.previewLimit)), 1, MAX_PREVIEW_LIMIT);
}

function revoke(url: string | undefined) {
  if (url && url.startsWith("blob:")) URL.revokeObjectURL(url);
}

/** Сохранённые настройки могли прийти от старой версии: чистим поля по одному. */
export function sanitizeSettings(persisted: unknown): Settings {
  const p: Record<string, unknown> = persisted && typeof persisted === "object" ? { ...persisted } : {};
  const lastTaskId = safeString(p.lastTaskId);
  return {
    conf: clamp(safeNumber(p.conf, DEFAULT_SETTINGS.conf), 0, 1),
    previewLimit: safePreviewLimit(p.previewLimit),
    routeName: safeString(p.routeName),
    mode: p.mode === "single" ? "single" : "batch",
    lastTaskId: lastTaskId || undefined,
  };
}

export const useAppStore = create<State>()(
  persist(
    (set, get) => ({
      ...DEFAULT_SETTINGS,
      result: null,

      setConf: (v) => set({ conf: clamp(safeNumber(v, DEFAULT_SETTINGS.conf), 0, 1) }),
      setPreviewLimit: (v) => set({ previewLimit: safePreviewLimit(v) }),
      setRouteName: (v) => set({ routeName: v }),
      setMode: (mode) => set({ mode }),
      setLastTaskId: (id) => set({ lastTaskId: id || undefined }),

      setResult: (r) => {
        // старый objectURL больше никто не покажет
        const prev = get().result;
        if (prev && prev.imageUrl !== r?.imageUrl) revoke(prev.imageUrl);
        set({ result: r });
      },

      resetAll: () => {
        revoke(get().result?.imageUrl);
        set({ ...DEFAULT_SETTINGS, lastTaskId: undefined, result: null });
      },
    }),
    {
      name: "lineguard-settings",
      version: 1,
      storage: createJSONStorage(() => sessionStorage),

      // результат с objectURL после перезагрузки бесполезен
      partialize: (s): Settings => ({
        conf: s.conf,
        previewLimit: s.previewLimit,
        routeName: s.routeName,
        mode: s.mode,
        lastTaskId: s.lastTaskId,
      }),

      migrate: (persisted) => sanitizeSettings(persisted),
    }
  )
);
