import { InvalidTransitionError } from '../monitoring/error-handler';
import type { AnalysisTask, ClassShare, ImageStatus, TaskMetadata, TaskStatus } from '../types';

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  queued: ['processing', 'failed'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export const FINAL_STATUSES: readonly TaskStatus[] = ['completed', 'failed'];

export function isFinalStatus(status: TaskStatus): boolean {
  return FINAL_STATUSES.includes(status);
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return from === to || TRANSITIONS[from].includes(to);
}

export interface TaskProgressPatch {
  status?: TaskStatus;
  message?: string | null;
  processedFiles?: number;
  failedFiles?: number;
  defectsFound?: number;
  totalFiles?: number;
  metadata?: TaskMetadata | null;
}

/**
 * Применяет изменение прогресса к задаче (без мутации исходника).
 * Финальный статус проставляет completedAt.
 */
export function applyTaskProgress(task: AnalysisTask, patch: TaskProgressPatch, now: Date = new Date()): AnalysisTask {
  const next: AnalysisTask = { ...task, updatedAt: now };

  if (patch.status !== undefined && patch.status !== task.status) {
    if (!canTransition(task.status, patch.status)) {
      throw new InvalidTransitionError(task.status, patch.status);
    }
    next.status = patch.status;
    if (isFinalStatus(patch.status)) next.completedAt = now;
  }

  if (patch.message !== undefined) next.message = patch.message;
  if (patch.totalFiles !== undefined) next.totalFiles = Math.max(0, patch.totalFiles);
  if (patch.processedFiles !== undefined) next.processedFiles = Math.max(0, patch.processedFiles);
  if (patch.failedFiles !== undefined) next.failedFiles = Math.max(0, patch.failedFiles);
  if (patch.defectsFound !== undefined) next.defectsFound = Math.max(0, patch.defectsFound);
  if (patch.metadata !== undefined) next.metadata = patch.metadata;

  return next;
}

type FileCounters = Pick<AnalysisTask, 'totalFiles' | 'processedFiles' | 'failedFiles'>;

/** Счётчики после удаления снимка: снимок уходит и из total, и из своей графы. */
export function countersWithoutImage(task: FileCounters, imageStatus: ImageStatus): FileCounters {
  return {
    totalFiles: Math.max(0, task.totalFiles - 1),
    processedFiles: imageStatus === 'completed' ? Math.max(0, task.processedFiles - 1) : task.processedFiles,
    failedFiles: imageStatus === 'failed' ? Math.max(0, task.failedFiles - 1) : task.failedFiles,
  };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function buildTaskMetadata(
  totalFiles: number,
  defectsFound: number,
  classStats: Record<string, number>,
): TaskMetadata {
  const totalObjects = Object.values(classStats).reduce((sum, n) => sum + n, 0);
  const classStatsPercent: Record<string, ClassShare> = {};
  for (const [cls, count] of Object.entries(classStats)) {
    classStatsPercent[cls] = {
      count,
      percentage: totalObjects > 0 ? round2((count / totalObjects) * 100) : 0,
    };
  }

  return {
    total_files: totalFiles,
    total_objects: totalObjects,
    defects_found: defectsFound,
    class_stats: { ...classStats },
    class_stats_percent: classStatsPercent,
  };
}

export function mergeClassStats(into: Record<string, number>, statistics: Record<string, number> | undefined): void {
  if (!statistics) return;
  for (const [cls, count] of Object.entries(statistics)) {
    if (typeof count !== 'number' || !Number.isFinite(count)) continue;
    into[cls] = (into[cls] ?? 0) + count;
  }
}
