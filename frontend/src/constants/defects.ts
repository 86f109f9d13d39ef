// src/constants/defects.ts
import type { Severity } from "../types";

// Классы модели YOLOv8. Порядок = порядок в легенде.
export const MODEL_CLASSES = [
  "vibration_damper",
  "festoon_insulators",
  "traverse",
  "bad_insulator",
  "damaged_insulator",
  "polymer_insulators",
] as const;

export type ModelClass = (typeof MODEL_CLASSES)[number];

export const CLASS_NAMES_RU: Record<ModelClass, string> = {
  vibration_damper: "Виброгаситель",
  festoon_insulators: "Гирлянда изоляторов",
  traverse: "Траверса",
  bad_insulator: "Изолятор отсутствует",
  damaged_insulator: "Поврежденный изолятор",
  polymer_insulators: "Полимерные изоляторы",
};

export const CLASS_COLORS: Record<ModelClass, string> = {
  vibration_damper: "#3B82F6",
  festoon_insulators: "#10B981",
  traverse: "#8B5CF6",
  bad_insulator: "#EF4444",
  damaged_insulator: "#F59E0B",
  polymer_insulators: "#06B6D4",
};

const FALLBACK_COLOR = "#9CA3AF";

export const DEFECT_CLASSES: ReadonlySet<string> = new Set(["bad_insulator", "damaged_insulator"]);

function isModelClass(cls: string): cls is ModelClass {
  return (MODEL_CLASSES as readonly string[]).includes(cls);
}

export function isDefectClass(cls: string): boolean {
  return DEFECT_CLASSES.has(cls);
}

export function classNameRu(cls: string, fromServer?: string): string {
  if (fromServer) return fromServer;
  return isModelClass(cls) ? CLASS_NAMES_RU[cls] : cls;
}

export function classColor(cls: string): string {
  return isModelClass(cls) ? CLASS_COLORS[cls] : FALLBACK_COLOR;
}

export const SEVERITY_LABELS: Record<Severity, string> = {
  critical: "критическая",
  high: "тяжелая",
  medium: "средняя",
  low: "низкая",
  none: "нет",
};

/** Серьёзность с модели бывает и по-русски. */
export function normalizeSeverity(raw: string | null | undefined): Severity {
  const s = (raw ?? "").trim().toLowerCase();
  if (s === "critical" || s === "критическая") return "critical";
  if (s === "high" || s === "тяжелая" || s === "высокая") return "high";
  if (s === "medium" || s === "средняя") return "medium";
  if (s === "low" || s === "низкая") return "low";
  return "none";
}
