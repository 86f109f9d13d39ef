// src/api/api.ts
import type {
  AnnotateResult,
  ManualBBox,
  ModelHealth,
  ModelInfo,
  PredictResponse,
  TaskDetail,
  TaskImage,
  TaskImagesPage,
  TaskListItem,
  TaskStatus,
} from "../types";

export type BatchAccepted = { task_id: string; status: TaskStatus };

export type BatchOptions = {
  conf: number;
  previewLimit?: number;
  routeName?: string;
};

export type ImagesQuery = { skip?: number; limit?: number; previewOnly?: boolean };

/**
 * VITE_API_BASE:
 * - http://localhost:8080
 * - http://localhost:8080/api
 * Префикс /api добавляем только если его нет в базе.
 */
export function resolveApiBase(raw: string | undefined) {
  const base = (raw ?? "http://localhost:8080").trim().replace(/\/+$/, "");
  const prefix = base.toLowerCase().endsWith("/api") ? "" : "/api";
  return { base, prefix };
}

const { base: RAW_BASE, prefix: API_PREFIX } = resolveApiBase(import.meta.env.VITE_API_BASE);

/** ws(s)://host[/api] из http(s)-базы */
export function toWsBase(httpBase: string): string {
  return httpBase.replace(/^http(s?):\/\//i, (_m, s: string) => `ws${s}://`);
}

/**
 * BFF отдаёт ссылки вида /api/files/{id}/view.
 * Абсолютные URL и blob: оставляем как есть, остальное клеим к RAW_BASE.
 */
export function joinUrl(pathOrUrl: string, base: string = RAW_BASE, prefix: string = API_PREFIX): string {
  if (!pathOrUrl) return pathOrUrl;
  if (/^(https?:|blob:|data:)/i.test(pathOrUrl)) return pathOrUrl;

  const p = pathOrUrl.startsWith("/") ? pathOrUrl : `/${pathOrUrl}`;
  // база уже с /api, а путь тоже начинается с /api, не дублируем
  if (!prefix && p.toLowerCase().startsWith("/api/")) return `${base}${p.slice(4)}`;
  return `${base}${p}`;
}

function readDetail(body: unknown): string | null {
  if (!body || typeof body !== "object") return null;
  if ("detail" in body && typeof body.detail === "string") return body.detail;
  if ("message" in body && typeof body.message === "string") return body.message;
  return null;
}

export async function parseErrorMessage(res: Response): Promise<string> {
  try {
    const detail = readDetail(await res.json());
    if (detail) return detail;
  } catch {
    // тело не JSON
  }
  return `Ошибка запроса: ${res.status}`;
}

export async function httpJson<T>(path: string, init?: RequestInit): Promise<T> {
  const res = await fetch(`${RAW_BASE}${API_PREFIX}${path}`, init);
  if (!res.ok) throw new Error(await parseErrorMessage(res));
  return (await res.json()) as T;
}

async function httpVoid(path: string, init?: RequestInit): Promise<void> {
  const res = await fetch(`${RAW_BASE}${API_PREFIX}${path}`, init);
  if (!res.ok) throw new Error(await parseErrorMessage(res));
}

function query(params: Record<string, string | number | boolean | undefined>): string {
  const q = new URLSearchParams();
  for (const [k, v] of Object.entries(params)) {
    if (v !== undefined) q.set(k, String(v));
  }
  const s = q.toString();
  return s ? `?${s}` : "";
}

// upload progress есть только у XHR
function postFormWithProgress<T>(path: string, form: FormData, onProgress?: (percent: number) => void): Promise<T> {
  return new Promise((resolve, reject) => {
    const xhr = new XMLHttpRequest();
    xhr.open("POST", `${RAW_BASE}${API_PREFIX}${path}`);
    xhr.responseType = "text";

    xhr.upload.onprogress = (e) => {
      if (e.lengthComputable && onProgress) onProgress(Math.round((e.loaded / e.total) * 100));
    };
    xhr.onerror = () => reject(new Error("Сеть недоступна: не удалось отправить файлы"));
    xhr.onload = () => {
      let body: unknown = null;
      try {
        body = xhr.responseText ? JSON.parse(xhr.responseText) : null;
      } catch {
        body = null;
      }
      if (xhr.status >= 200 && xhr.status < 300) {
        resolve(body as T);
        return;
      }
      reject(new Error(readDetail(body) ?? `Ошибка запроса: ${xhr.status}`));
    };

    xhr.send(form);
  });
}

const enc = encodeURIComponent;
const IMAGES_PAGE_MAX = 500;

export const api = {
  baseUrl: `${RAW_BASE}${API_PREFIX}`,

  health(): Promise<ModelHealth> {
    return httpJson<ModelHealth>("/health");
  },

  modelInfo(): Promise<ModelInfo> {
    return httpJson<ModelInfo>("/model/info");
  },

  predict(file: File, conf: number): Promise<PredictResponse> {
    const fd = new FormData();
    fd.append("file", file);
    return httpJson<PredictResponse>(`/predict${query({ conf })}`, { method: "POST", body: fd });
  },

  predictBatch(files: File[], opts: BatchOptions, onProgress?: (percent: number) => void): Promise<BatchAccepted> {
    if (!files.length) return Promise.reject(new Error("Нет файлов для загрузки"));

    const fd = new FormData();
    for (const f of files) fd.append("files", f);
    fd.append("conf", String(opts.conf));
    if (opts.previewLimit !== undefined) fd.append("preview_limit", String(opts.previewLimit));
    if (opts.routeName?.trim()) fd.append("route_name", opts.routeName.trim());

    return postFormWithProgress<BatchAccepted>("/predict/batch", fd, onProgress);
  },

  history(limit = 20): Promise<TaskListItem[]> {
    return httpJson<TaskListItem[]>(`/analysis/history${query({ limit })}`);
  },

  getTask(taskId: string): Promise<TaskDetail> {
    return httpJson<TaskDetail>(`/analysis/tasks/${enc(taskId)}`);
  },

  getTaskImages(taskId: string, q: ImagesQuery = {}): Promise<TaskImagesPage> {
    return httpJson<TaskImagesPage>(
      `/analysis/tasks/${enc(taskId)}/images${query({ skip: q.skip, limit: q.limit, preview_only: q.previewOnly })}`
    );
  },

  getTaskImage(taskId: string, imageId: string): Promise<TaskImage> {
    return httpJson<TaskImage>(`/analysis/tasks/${enc(taskId)}/images/${enc(imageId)}`);
  },

  /** все снимки задачи, страницами по максимуму BFF (500) */
  async allTaskImages(taskId: string): Promise<TaskImage[]> {
    const out: TaskImage[] = [];
    for (let skip = 0; ; skip += IMAGES_PAGE_MAX) {
      const page = await api.getTaskImages(taskId, { skip, limit: IMAGES_PAGE_MAX });
      out.push(...page.images);
      if (out.length >= page.total || page.images.length === 0) return out;
    }
  },

  deleteTask(taskId: string): Promise<void> {
    return httpVoid(`/analysis/tasks/${enc(taskId)}`, { method: "DELETE" });
  },

  deleteTaskImage(taskId: string, imageId: string): Promise<void> {
    return httpVoid(`/analysis/tasks/${enc(taskId)}/images/${enc(imageId)}`, { method: "DELETE" });
  },

  annotateImage(taskId: string, imageId: string, bboxes: ManualBBox[]): Promise<AnnotateResult> {
    return httpJson<AnnotateResult>(`/analysis/tasks/${enc(taskId)}/images/${enc(imageId)}/annotate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ bboxes }),
    });
  },

  /** ссылка на файл из ответа BFF -> абсолютный URL для <img> */
  fileUrl(path: string): string {
    return joinUrl(path);
  },
};

export function taskSocketUrl(taskId: string): string {
  return `${toWsBase(RAW_BASE)}${API_PREFIX}/ws/tasks/${enc(taskId)}`;
}

export function historySocketUrl(): string {
  return `${toWsBase(RAW_BASE)}${API_PREFIX}/ws/history`;
}
