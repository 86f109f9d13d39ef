import type { AnalysisImage, AnalysisTask } from '../types';

const iso = (d: Date | null) => (d ? d.toISOString() : null);

export function fileViewUrl(prefix: string, fileId: string): string {
  return `${prefix}/files/${encodeURIComponent(fileId)}/view`;
}

export function toTaskListItem(task: AnalysisTask) {
  return {
    id: task.id,
    status: task.status,
    route_name: task.routeName,
    total_files: task.totalFiles,
    processed_files: task.processedFiles,
    failed_files: task.failedFiles,
    defects_found: task.defectsFound,
    created_at: iso(task.createdAt),
    completed_at: iso(task.completedAt),
  };
}

export function toImageResponse(image: AnalysisImage, prefix: string) {
  return {
    id: image.id,
    task_id: image.taskId,
    file_id: image.fileId,
    file_name: image.fileName,
    file_size: image.fileSize,
    status: image.status,
    result_file_id: image.resultFileId,
    is_preview: image.isPreview,
    summary: image.summary,
    error_message: image.errorMessage,
    created_at: iso(image.createdAt),
    updated_at: iso(image.updatedAt),
    original_url: fileViewUrl(prefix, image.fileId),
    result_url: image.resultFileId ? fileViewUrl(prefix, image.resultFileId) : null,
  };
}

export function toTaskResponse(task: AnalysisTask, previews: AnalysisImage[], prefix: string) {
  return {
    ...toTaskListItem(task),
    total_bytes: task.totalBytes,
    confidence_threshold: task.confidenceThreshold,
    preview_limit: task.previewLimit,
    message: task.message,
    metadata: task.metadata,
    updated_at: iso(task.updatedAt),
    preview_files: previews.map((img) => toImageResponse(img, prefix)),
  };
}
