// src/utils/wordReport.ts
import {
  AlignmentType,
  BorderStyle,
  Document,
  Packer,
  PageOrientation,
  Paragraph,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from "docx";
import { classNameRu, isDefectClass, normalizeSeverity, SEVERITY_LABELS } from "../constants/defects";
import type { Severity, TaskDetail, TaskImage } from "../types";
import { formatDateTime, formatPercent, STATUS_LABELS } from "./format";

export type ReportInput = {
  task: TaskDetail;
  images: TaskImage[];
  generatedAt?: Date;
};

type Cell = string | string[];

const SEVERITY_ORDER: Severity[] = ["critical", "high", "medium", "low", "none"];

/* ---------- данные таблиц (без docx, чтобы их можно было проверить) ---------- */

export function summaryRows(task: TaskDetail): Array<[string, string]> {
  return [
    ["Маршрут", task.route_name || "—"],
    ["Статус", STATUS_LABELS[task.status]],
    ["Файлов всего", String(task.total_files)],
    ["Обработано", String(task.processed_files)],
    ["С ошибкой", String(task.failed_files)],
    ["Найдено дефектов", String(task.defects_found)],
    ["Порог уверенности", formatPercent(task.confidence_threshold)],
    ["Создана", formatDateTime(task.created_at)],
    ["Завершена", formatDateTime(task.completed_at)],
  ];
}

export function classStatRows(task: TaskDetail): Array<[string, string, string]> {
  const stats = task.metadata?.class_stats_percent ?? {};
  return Object.entries(stats)
    .sort((a, b) => b[1].count - a[1].count)
    .map(([cls, s]) => [classNameRu(cls), String(s.count), `${s.percentage.toFixed(2)}%`]);
}

/** Самая серьёзная оценка среди дефектных детекций изображения. */
export function worstSeverity(image: TaskImage): Severity {
  let worst: Severity = "none";
  for (const d of image.summary?.detections ?? []) {
    if (!isDefectClass(d.class)) continue;
    const s = normalizeSeverity(d.defect_summary?.severity);
    if (SEVERITY_ORDER.indexOf(s) < SEVERITY_ORDER.indexOf(worst)) worst = s;
  }
  return worst;
}

export function defectImageRows(images: TaskImage[]): Array<[string, string[], string]> {
  return images
    .filter((img) => img.status === "completed" && (img.summary?.defects_count ?? 0) > 0)
    .map((img) => {
      const found = (img.summary?.detections ?? [])
        .filter((d) => isDefectClass(d.class))
        .map((d) => `${classNameRu(d.class, d.class_ru)} (${formatPercent(d.confidence)})`);
      return [img.file_name, found, SEVERITY_LABELS[worstSeverity(img)]];
    });
}

/* ---------- docx ---------- */

const border = { style: BorderStyle.SINGLE, size: 1, color: "666666" };
const borders = { top: border, bottom: border, left: border, right: border };

function cell(value: Cell, opts: { bold?: boolean; widthPct?: number } = {}) {
  const lines = Array.isArray(value) ? (value.length ? value : ["—"]) : [value];
  return new TableCell({
    borders,
    width: opts.widthPct ? { size: opts.widthPct, type: WidthType.PERCENTAGE } : undefined,
    children: lines.map((text) => new Paragraph({ children: [new TextRun({ text, bold: opts.bold })] })),
  });
}

function table(header: string[], rows: Cell[][], widths: number[]) {
  return new Table({
    width: { size: 100, type: WidthType.PERCENTAGE },
    rows: [
      new TableRow({ tableHeader: true, children: header.map((h, i) => cell(h, { bold: true, widthPct: widths[i] })) }),
      ...rows.map((r) => new TableRow({ children: r.map((v, i) => cell(v, { widthPct: widths[i] })) })),
    ],
  });
}

function heading(text: string) {
  return new Paragraph({ spacing: { before: 240, after: 120 }, children: [new TextRun({ text, bold: true, size: 24 })] });
}

export function buildTaskReportDocument({ task, images, generatedAt = new Date() }: ReportInput): Document {
  const stamp = `${generatedAt.toLocaleDateString("ru-RU")} ${generatedAt.toLocaleTimeString("ru-RU")}`;

  const stats = classStatRows(task);
  const defects = defectImageRows(images);

  return new Document({
    creator: "LineGuard",
    title: `Отчёт по задаче ${task.id}`,
    sections: [
      {
        properties: {
          page: {
            size: { orientation: PageOrientation.LANDSCAPE },
            margin: { top: 720, bottom: 720, left: 720, right: 720 },
          },
        },
        children: [
          new Paragraph({
            alignment: AlignmentType.CENTER,
            children: [new TextRun({ text: "Отчёт по анализу изображений ЛЭП", bold: true, size: 28 })],
          }),
          new Paragraph({
            alignment: AlignmentType.CENTER,
            children: [new TextRun({ text: `Задача ${task.id} · сформировано ${stamp}`, size: 18 })],
          }),

          heading("Сводка"),
          table(["Параметр", "Значение"], summaryRows(task), [40, 60]),

          heading("Статистика по классам"),
          stats.length
            ? table(["Класс", "Количество", "Доля"], stats, [50, 25, 25])
            : new Paragraph({ children: [new TextRun({ text: "Объекты не обнаружены" })] }),

          heading("Изображения с дефектами"),
          defects.length
            ? table(
                ["№", "Файл", "Дефекты", "Серьёзность"],
                defects.map(([name, found, severity], i) => [String(i + 1), name, found, severity]),
                [6, 30, 44, 20]
              )
            : new Paragraph({ children: [new TextRun({ text: "Дефекты не обнаружены" })] }),
        ],
      },
    ],
  });
}

export async function buildTaskReportDocx(input: ReportInput): Promise<Blob> {
  return Packer.toBlob(buildTaskReportDocument(input));
}
