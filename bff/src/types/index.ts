/* ---------- Model service ---------- */

export type Severity = 'critical' | 'high' | 'medium' | 'low' | 'none';

export interface BBoxSize {
  width: number;
  height: number;
  area: number;
  is_small: boolean;
}

export interface DefectSummary {
  type: string;
  severity: Severity | string;
  description: string;
}

export interface Detection {
  class: string;
  class_ru: string;
  confidence: number;
  /** [x1, y1, x2, y2] в пикселях исходного изображения */
  bbox: [number, number, number, number];
  bbox_size?: BBoxSize;
  defect_summary?: DefectSummary;
  defect_features?: Record<string, unknown>;
}

export interface PredictResponse {
  detections: Detection[];
  statistics: Record<string, number>;
  total_objects: number;
  defects_count: number;
  has_defects: boolean;
}

export interface ModelHealth {
  status: string;
  model_loaded?: boolean;
  service?: string;
  error?: string;
}

export interface ModelInfo {
  model_path: string;
  model_exists: boolean;
  classes: string[];
  num_classes: number;
  metrics?: Record<string, number | null>;
  requirements_met?: Record<string, boolean>;
  supported_formats?: string[];
  max_resolution?: number;
}

/* ---------- Files / annotation services ---------- */

export type FileType = 'IMAGE' | 'ANALYSIS_ORIGINAL' | 'ANALYSIS_PREVIEW' | 'ANALYSIS_RESULT';

export interface StoredFile {
  id: string;
  original_filename?: string;
  content_type?: string;
  size?: number;
  file_type?: FileType | string;
  project_id?: string | null;
}

export interface FileList {
  files: StoredFile[];
  total: number;
}

export interface DownloadedFile {
  buffer: Buffer;
  contentType: string;
  filename?: string;
}

export interface ManualBBox {
  x: number;
  y: number;
  width: number;
  height: number;
  name?: string;
  is_defect: boolean;
}

export interface AnnotationResult {
  success: boolean;
  file_id: string;
  filename: string;
  message: string;
}

/* ---------- Tasks ---------- */

export type TaskStatus = 'queued' | 'processing' | 'completed' | 'failed';
export type ImageStatus = TaskStatus;

export interface ClassShare {
  count: number;
  percentage: number;
}

export interface TaskMetadata {
  total_files: number;
  total_objects: number;
  defects_found: number;
  class_stats: Record<string, number>;
  class_stats_percent: Record<string, ClassShare>;
}

export interface AnalysisTask {
  id: string;
  status: TaskStatus;
  routeName: string | null;
  totalFiles: number;
  totalBytes: number;
  processedFiles: number;
  failedFiles: number;
  defectsFound: number;
  confidenceThreshold: number;
  previewLimit: number;
  message: string | null;
  metadata: TaskMetadata | null;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
}

export interface ImageSummary extends Partial<PredictResponse> {
  manual_annotations?: ManualBBox[];
}

export interface AnalysisImage {
  id: string;
  taskId: string;
  fileId: string;
  fileName: string;
  fileSize: number;
  status: ImageStatus;
  resultFileId: string | null;
  isPreview: boolean;
  summary: ImageSummary | null;
  errorMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface TaskProgressMessage {
  task_id: string;
  status: TaskStatus;
  processed_files: number;
  total_files: number;
  failed_files: number;
  defects_found: number;
  message: string | null;
  /** задачу удалили; подписчикам истории пора убрать строку */
  deleted?: boolean;
}
