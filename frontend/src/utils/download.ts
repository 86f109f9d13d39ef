// src/utils/download.ts

/** Сохраняет blob через временную ссылку <a download>. */
export function downloadBlob(blob: Blob, filename: string) {
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = filename;
  a.rel = "noopener";
  document.body.appendChild(a);
  a.click();
  a.remove();
  // Chrome успевает начать скачивание только если не отзывать ссылку сразу
  window.setTimeout(() => URL.revokeObjectURL(url), 10_000);
}
