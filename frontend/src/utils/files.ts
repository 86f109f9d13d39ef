// src/utils/files.ts

export const SUPPORTED_EXTENSIONS = [".jpg", ".jpeg", ".png", ".tif", ".tiff", ".bmp", ".dng", ".raw", ".nef", ".cr2", ".arw"];
const ARCHIVES = [".zip", ".tar", ".tar.gz", ".tgz"];

export const MAX_IMAGE_BYTES = 50 * 1024 * 1024;
export const MAX_BATCH_BYTES = 2 * 1024 * 1024 * 1024;
export const MAX_BATCH_FILES = 500;

export type FileLike = { name: string; size: number };

export type FileCheck = { accepted: FileLike[]; rejected: Array<{ name: string; reason: string }> };

export function extensionOf(name: string): string {
  const lower = name.toLowerCase();
  const dot = lower.lastIndexOf(".");
  return dot >= 0 ? lower.slice(dot) : "";
}

/**
 * Делит выбранные файлы на годные и отклонённые.
 * Лимиты совпадают с дефолтами BFF; окончательная проверка всё равно на сервере.
 */
export function checkFiles<T extends FileLike>(files: T[], mode: "single" | "batch"): { accepted: T[]; rejected: FileCheck["rejected"] } {
  const accepted: T[] = [];
  const rejected: FileCheck["rejected"] = [];

  for (const f of files) {
    const lower = f.name.toLowerCase();
    if (ARCHIVES.some((a) => lower.endsWith(a))) {
      rejected.push({ name: f.name, reason: "архивы не поддерживаются" });
    } else if (!SUPPORTED_EXTENSIONS.includes(extensionOf(f.name))) {
      rejected.push({ name: f.name, reason: "неподдерживаемый формат" });
    } else if (mode === "single" && f.size > MAX_IMAGE_BYTES) {
      rejected.push({ name: f.name, reason: "больше 50 МБ" });
    } else {
      accepted.push(f);
    }
  }

  if (mode === "single" && accepted.length > 1) {
    for (const extra of accepted.splice(1)) rejected.push({ name: extra.name, reason: "в режиме одного фото берётся только первый файл" });
  }
  if (mode === "batch" && accepted.length > MAX_BATCH_FILES) {
    for (const extra of accepted.splice(MAX_BATCH_FILES)) rejected.push({ name: extra.name, reason: `больше ${MAX_BATCH_FILES} файлов` });
  }

  return { accepted, rejected };
}

export function totalSize(files: FileLike[]): number {
  return files.reduce((acc, f) => acc + f.size, 0);
}
