import { describe, expect, it } from "vitest";
import { Packer } from "docx";
import type { Detection, TaskDetail, TaskImage } from "../types";
import { buildTaskReportDocument, classStatRows, defectImageRows, summaryRows, worstSeverity } from "./wordReport";

const task: TaskDetail = {
  id: "7c9e6679-7425-40de-944b-e07fc1f90ae7",
  status: "completed",
  route_name: "ВЛ-110",
  total_files: 3,
  processed_files: 2,
  failed_files: 1,
  defects_found: 4,
  created_at: null,
  completed_at: null,
  total_bytes: 1000,
  confidence_threshold: 0.35,
  preview_limit: 3,
  message: null,
  updated_at: null,
  preview_files: [],
  metadata: {
    total_files: 3,
    total_objects: 6,
    defects_found: 4,
    class_stats: { traverse: 2, bad_insulator: 4 },
    class_stats_percent: {
      traverse: { count: 2, percentage: 33.333 },
      bad_insulator: { count: 4, percentage: 66.667 },
    },
  },
};

function det(cls: string, confidence: number, severity?: string): Detection {
  return {
    class: cls,
    class_ru: "",
    confidence,
    bbox: [0, 0, 10, 10],
    ...(severity ? { defect_summary: { type: cls, severity, description: "" } } : {}),
  };
}

function image(id: string, over: Partial<TaskImage> = {}): TaskImage {
  return {
    id,
    task_id: task.id,
    file_id: `f-${id}`,
    file_name: `${id}.jpg`,
    file_size: 10,
    status: "completed",
    result_file_id: null,
    is_preview: false,
    summary: null,
    error_message: null,
    created_at: null,
    updated_at: null,
    original_url: `/api/files/f-${id}/view`,
    result_url: null,
    ...over,
  };
}

const withDefects = image("p1", {
  summary: {
    defects_count: 2,
    detections: [det("bad_insulator", 0.91, "critical"), det("damaged_insulator", 0.6, "средняя"), det("traverse", 0.5, "high")],
  },
});
const clean = image("p2", { summary: { defects_count: 0, detections: [det("traverse", 0.8)] } });
const failed = image("p3", { status: "failed", summary: { defects_count: 1, detections: [] } });

describe("report rows", () => {
  it("summarizes the task", () => {
    const rows = summaryRows(task);
    expect(rows).toContainEqual(["Маршрут", "ВЛ-110"]);
    expect(rows).toContainEqual(["Статус", "Завершена"]);
    expect(rows).toContainEqual(["С ошибкой", "1"]);
    expect(rows).toContainEqual(["Порог уверенности", "35%"]);
    expect(rows).toContainEqual(["Завершена", "—"]);
  });

  it("orders class stats by count", () => {
    expect(classStatRows(task)).toEqual([
      ["Изолятор отсутствует", "4", "66.67%"],
      ["Траверса", "2", "33.33%"],
    ]);
  });

  it("takes the worst severity among defect classes only", () => {
    expect(worstSeverity(withDefects)).toBe("critical");
    expect(worstSeverity(image("x", { summary: { detections: [det("traverse", 0.9, "critical")] } }))).toBe("none");
  });

  it("lists completed images that have defects", () => {
    expect(defectImageRows([withDefects, clean, failed])).toEqual([
      ["p1.jpg", ["Изолятор отсутствует (91%)", "Поврежденный изолятор (60%)"], "критическая"],
    ]);
  });
});

describe("buildTaskReportDocument", () => {
  it("packs into a docx archive", async () => {
    const doc = buildTaskReportDocument({ task, images: [withDefects, clean], generatedAt: new Date(2024, 0, 2, 3, 4, 5) });
    const buf = await Packer.toBuffer(doc);
    expect(buf.subarray(0, 2).toString("latin1")).toBe("PK");
  });
});
