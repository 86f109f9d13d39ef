// src/types.ts
// Контракты BFF (snake_case как на проводе) + типы редактора рамок.

export type Severity = "critical" | "high" | "medium" | "low" | "none";

export type Detection = {
  class: string;
  class_ru: string;
  confidence: number;
  /** [x1, y1, x2, y2] в пикселях исходного изображения */
  bbox: [number, number, number, number];
  bbox_size?: { width: number; height: number; area: number; is_small: boolean };
  defect_summary?: { type: string; severity: string; description: string };
};

export type PredictResponse = {
  detections: Detection[];
  statistics: Record<string, number>;
  total_objects: number;
  defects_count: number;
  has_defects: boolean;
};

export type TaskStatus = "queued" | "processing" | "completed" | "failed";

export type ManualBBox = {
  x: number;
  y: number;
  width: number;
  height: number;
  name?: string;
  is_defect: boolean;
};

export type ImageSummary = Partial<PredictResponse> & { manual_annotations?: ManualBBox[] };

export type TaskMetadata = {
  total_files: number;
  total_objects: number;
  defects_found: number;
  class_stats: Record<string, number>;
  class_stats_percent: Record<string, { count: number; percentage: number }>;
};

export type TaskListItem = {
  id: string;
  status: TaskStatus;
  route_name: string | null;
  total_files: number;
  processed_files: number;
  failed_files: number;
  defects_found: number;
  created_at: string | null;
  completed_at: string | null;
};

export type TaskImage = {
  id: string;
  task_id: string;
  file_id: string;
  file_name: string;
  file_size: number;
  status: TaskStatus;
  result_file_id: string | null;
  is_preview: boolean;
  summary: ImageSummary | null;
  error_message: string | null;
  created_at: string | null;
  updated_at: string | null;
  original_url: string;
  result_url: string | null;
};

export type TaskDetail = TaskListItem & {
  total_bytes: number;
  confidence_threshold: number;
  preview_limit: number;
  message: string | null;
  metadata: TaskMetadata | null;
  updated_at: string | null;
  preview_files: TaskImage[];
};

export type TaskImagesPage = {
  total: number;
  skip: number;
  limit: number;
  images: TaskImage[];
};

export type TaskProgressMessage = {
  task_id: string;
  status: TaskStatus;
  processed_files: number;
  total_files: number;
  failed_files: number;
  defects_found: number;
  message: string | null;
  /** задачу удалили на сервере */
  deleted?: boolean;
};

export type ModelHealth = {
  status: string;
  service?: string;
  error?: string;
  dependencies?: Record<string, { status: string; model_loaded?: boolean }>;
};

export type ModelInfo = {
  model_path: string;
  model_exists: boolean;
  classes: string[];
  num_classes: number;
  metrics?: Record<string, number | null>;
  requirements_met?: Record<string, boolean>;
  supported_formats?: string[];
  max_resolution?: number;
};

export type AnnotateResult = {
  success: boolean;
  file_id: string;
  filename: string;
  message: string;
  result_url: string;
};

/** Рамка в редакторе: нормализованные координаты 0..1 */
export type BBox = {
  id: string;
  x: number;
  y: number;
  w: number;
  h: number;
  name: string;
  isDefect: boolean;
  /** уверенность модели; у нарисованных вручную нет */
  confidence?: number;
};
