// src/utils/bbox.ts
// Геометрия рамок редактора. Всё в нормализованных координатах 0..1,
// в пиксели переводим только на входе (детекции модели) и на выходе (сохранение).
import { classNameRu, isDefectClass } from "../constants/defects";
import type { BBox, Detection, ManualBBox } from "../types";

export type Point = { x: number; y: number };
export type Rect = { x: number; y: number; w: number; h: number };
export type Handle = "nw" | "ne" | "sw" | "se";

export const MIN_BOX = 0.01;

export function clamp(v: number, a: number, b: number) {
  return Math.max(a, Math.min(b, v));
}

export function clamp01(v: number) {
  return clamp(v, 0, 1);
}

function finite(v: number, fallback: number) {
  return Number.isFinite(v) ? v : fallback;
}

/** Рамка целиком внутри кадра и не меньше MIN_BOX. */
export function clampBox<T extends Rect>(b: T): T {
  const w = clamp(finite(b.w, MIN_BOX), MIN_BOX, 1);
  const h = clamp(finite(b.h, MIN_BOX), MIN_BOX, 1);
  const x = clamp(finite(b.x, 0), 0, 1 - w);
  const y = clamp(finite(b.y, 0), 0, 1 - h);
  return { ...b, x, y, w, h };
}

export function nudgeBox<T extends Rect>(b: T, dx: number, dy: number): T {
  return clampBox({ ...b, x: b.x + dx, y: b.y + dy });
}

export function moveBox<T extends Rect>(start: T, dx: number, dy: number): T {
  return nudgeBox(start, dx, dy);
}

/** Тянем за угол: противоположный угол стоит на месте. */
export function resizeBox<T extends Rect>(start: T, handle: Handle, dx: number, dy: number, minSize = 0.02): T {
  let left = start.x;
  let top = start.y;
  let right = start.x + start.w;
  let bottom = start.y + start.h;

  if (handle === "nw" || handle === "sw") left = clamp(left + dx, 0, right - minSize);
  if (handle === "ne" || handle === "se") right = clamp(right + dx, left + minSize, 1);
  if (handle === "nw" || handle === "ne") top = clamp(top + dy, 0, bottom - minSize);
  if (handle === "sw" || handle === "se") bottom = clamp(bottom + dy, top + minSize, 1);

  return { ...start, x: left, y: top, w: right - left, h: bottom - top };
}

/** Прямоугольник по двум точкам протяжки (в любом направлении). */
export function rectFromPoints(a: Point, b: Point): Rect {
  const x1 = clamp01(Math.min(a.x, b.x));
  const y1 = clamp01(Math.min(a.y, b.y));
  const x2 = clamp01(Math.max(a.x, b.x));
  const y2 = clamp01(Math.max(a.y, b.y));
  return { x: x1, y: y1, w: x2 - x1, h: y2 - y1 };
}

export function cloneBox(b: BBox, id: string, offset = 0.01): BBox {
  return clampBox({ ...b, id, x: b.x + offset, y: b.y + offset, confidence: undefined });
}

let seq = 0;
export function newBoxId(prefix = "bbox"): string {
  seq += 1;
  return `${prefix}_${Date.now().toString(36)}_${seq}`;
}

/* ---------- пиксели <-> 0..1 ---------- */

export function detectionsToBoxes(detections: Detection[], naturalW: number, naturalH: number): BBox[] {
  if (naturalW <= 0 || naturalH <= 0) return [];
  return detections.map((d, i) => {
    const [x1, y1, x2, y2] = d.bbox;
    const left = Math.min(x1, x2);
    const top = Math.min(y1, y2);
    return clampBox({
      id: `det_${i}`,
      x: left / naturalW,
      y: top / naturalH,
      w: Math.abs(x2 - x1) / naturalW,
      h: Math.abs(y2 - y1) / naturalH,
      name: classNameRu(d.class, d.class_ru),
      isDefect: isDefectClass(d.class),
      confidence: d.confidence,
    });
  });
}

export function manualToBoxes(items: ManualBBox[], naturalW: number, naturalH: number): BBox[] {
  if (naturalW <= 0 || naturalH <= 0) return [];
  return items.map((m, i) =>
    clampBox({
      id: `manual_${i}`,
      x: m.x / naturalW,
      y: m.y / naturalH,
      w: m.width / naturalW,
      h: m.height / naturalH,
      name: m.name ?? "",
      isDefect: m.is_defect,
    })
  );
}

/** Для сохранения: целые пиксели, рамка не выходит за кадр, ширина/высота ≥ 1. */
export function boxesToManual(boxes: BBox[], naturalW: number, naturalH: number): ManualBBox[] {
  return boxes.map((b) => {
    const x = clamp(Math.round(b.x * naturalW), 0, Math.max(0, naturalW - 1));
    const y = clamp(Math.round(b.y * naturalH), 0, Math.max(0, naturalH - 1));
    const width = clamp(Math.round(b.w * naturalW), 1, naturalW - x);
    const height = clamp(Math.round(b.h * naturalH), 1, naturalH - y);
    const name = b.name.trim();
    return { x, y, width, height, ...(name ? { name } : {}), is_defect: b.isDefect };
  });
}

/* ---------- раскладка подписей без наложений ---------- */

export type LabelItem = Rect & { id: string; text: string };

export function rectsOverlap(a: Rect, b: Rect) {
  return !(a.x + a.w <= b.x || b.x + b.w <= a.x || a.y + a.h <= b.y || b.y + b.h <= a.y);
}

export type LabelMetrics = {
  /** размеры подписи и отступы уже в долях кадра */
  width: (text: string) => number;
  height: number;
  gap: number;
  pad: number;
};

export function boxLabel(b: BBox): string {
  const name = b.name || (b.isDefect ? "дефект" : "объект");
  return b.confidence === undefined ? name : `${name} • ${Math.round(b.confidence * 100)}%`;
}

/**
 * Подпись над рамкой (или под ней у верхнего края);
 * при пересечении сдвигаем вниз, а если упёрлись в низ кадра, то вверх.
 */
export function layoutLabels(boxes: BBox[], m: LabelMetrics): LabelItem[] {
  const items: LabelItem[] = boxes.map((b) => {
    const text = boxLabel(b);
    const w = Math.min(m.width(text), 1 - 2 * m.pad);
    const h = m.height;
    const x = clamp(b.x + b.w / 2 - w / 2, m.pad, 1 - w - m.pad);
    const preferBelow = b.y < h + m.gap;
    const y = clamp(preferBelow ? b.y + b.h + m.gap : b.y - h - m.gap, m.pad, 1 - h - m.pad);
    return { id: b.id, text, x, y, w, h };
  });

  const maxY = 1 - m.height - m.pad;
  const placed: LabelItem[] = [];

  for (const it of [...items].sort((a, b) => a.y - b.y)) {
    let cand = { ...it };
    for (let guard = 0; guard < 70; guard++) {
      const hit = placed.find((p) => rectsOverlap(cand, p));
      if (!hit) break;
      cand.y = hit.y + hit.h + m.gap;
      if (cand.y > maxY) break;
    }

    if (cand.y > maxY) {
      cand = { ...it };
      for (let guard = 0; guard < 70; guard++) {
        const hit = placed.find((p) => rectsOverlap(cand, p));
        if (!hit) break;
        cand.y = hit.y - cand.h - m.gap;
        if (cand.y < m.pad) break;
      }
      cand.y = clamp(cand.y, m.pad, maxY);
    }

    placed.push(cand);
  }

  return placed;
}
