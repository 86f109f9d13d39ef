import path from 'node:path';
import type { FilesApi } from '../clients/files-client';
import type { ModelApi } from '../clients/model-client';
import { createLogger } from '../logger';
import type { AnalysisImage, AnalysisTask, PredictResponse } from '../types';
import type { Renderer } from './annotation-renderer';
import type { TaskEvents } from './task-events';
import type { TaskRepository } from './task-repository';
import { buildTaskMetadata, mergeClassStats } from './task-state';

const log = createLogger('Worker');
const PAGE_SIZE = 200;

export const MESSAGES = {
  started: 'Обработка началась',
  noFiles: 'Нет файлов для обработки',
  completed: 'Завершено',
  completedWithErrors: 'Задача завершилась с ошибками',
  progress: (done: number, total: number) => `Обработано ${done} из ${total}`,
} as const;

export interface WorkerDeps {
  repository: TaskRepository;
  model: ModelApi;
  files: FilesApi;
  renderer: Renderer;
  events: TaskEvents;
}

interface Processed {
  image: AnalysisImage;
  result: PredictResponse;
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function previewName(fileName: string): string {
  const ext = path.extname(fileName);
  return `${ext ? fileName.slice(0, -ext.length) : fileName}_preview.jpg`;
}

export class AnalysisWorker {
  constructor(private deps: WorkerDeps) {}

  private async allImages(taskId: string): Promise<AnalysisImage[]> {
    const out: AnalysisImage[] = [];
    for (let skip = 0; ; skip += PAGE_SIZE) {
      const page = await this.deps.repository.listImages(taskId, { skip, limit: PAGE_SIZE });
      out.push(...page.images);
      if (page.images.length < PAGE_SIZE || out.length >= page.total) return out;
    }
  }

  private async update(taskId: string, patch: Parameters<TaskRepository['updateTaskProgress']>[1]): Promise<AnalysisTask> {
    const task = await this.deps.repository.updateTaskProgress(taskId, patch);
    if (!task) throw new Error(`Задача ${taskId} удалена во время обработки`);
    this.deps.events.publishTask(task);
    return task;
  }

  async process(taskId: string): Promise<void> {
    const { repository, model, files } = this.deps;

    const task = await repository.getTask(taskId);
    if (!task) {
      log.warn(`task ${taskId} not found, skipping`);
      return;
    }

    const started = await this.update(taskId, { status: 'processing', message: MESSAGES.started });
    const images = await this.allImages(taskId);

    if (images.length === 0) {
      await this.update(taskId, { status: 'failed', message: MESSAGES.noFiles });
      return;
    }

    let total = images.length;
    let processed = 0;
    let failed = 0;
    let defects = 0;
    const classStats: Record<string, number> = {};
    const succeeded: Processed[] = [];

    for (const image of images) {
      // снимок могли удалить, пока шли предыдущие
      if (!(await repository.updateImage(image.id, { status: 'processing' }))) {
        total -= 1;
        log.warn(`image ${image.fileName} disappeared, skipping`);
        await this.update(taskId, { message: MESSAGES.progress(processed + failed, total) });
        continue;
      }
      try {
        const original = await files.download(image.fileId);
        const result = await model.predict({
          buffer: original.buffer,
          filename: image.fileName,
          contentType: original.contentType,
          conf: started.confidenceThreshold,
        });

        await repository.updateImage(image.id, { status: 'completed', summary: result, errorMessage: null });
        processed += 1;
        if (result.has_defects) defects += result.defects_count;
        mergeClassStats(classStats, result.statistics);
        succeeded.push({ image, result });
      } catch (error) {
        failed += 1;
        log.warn(`image ${image.fileName} failed: ${errorText(error)}`);
        await repository.updateImage(image.id, { status: 'failed', errorMessage: errorText(error) });
      }

      await this.update(taskId, {
        processedFiles: processed,
        failedFiles: failed,
        defectsFound: defects,
        message: MESSAGES.progress(processed + failed, total),
      });
    }

    await this.makePreviews(taskId, succeeded, started.previewLimit);

    const metadata = buildTaskMetadata(total, defects, classStats);
    const ok = failed === 0;
    await this.update(taskId, {
      status: ok ? 'completed' : 'failed',
      message: ok ? MESSAGES.completed : MESSAGES.completedWithErrors,
      metadata,
    });
    log.info(`task ${taskId} finished: ${processed} ok, ${failed} failed, ${defects} defects`);
  }

  /** Превью: сначала снимки с дефектами, затем остальные, не больше limit. */
  static pickPreviews<T extends { result: PredictResponse }>(items: T[], limit: number): T[] {
    const withDefects = items.filter((x) => x.result.has_defects);
    const regular = items.filter((x) => !x.result.has_defects);
    return [...withDefects, ...regular].slice(0, Math.max(0, limit));
  }

  private async makePreviews(taskId: string, succeeded: Processed[], limit: number): Promise<void> {
    const { repository, files, renderer } = this.deps;

    for (const { image, result } of AnalysisWorker.pickPreviews(succeeded, limit)) {
      try {
        const original = await files.download(image.fileId);
        const rendered = await renderer.render(original.buffer, result.detections);
        const stored = await files.upload({
          buffer: rendered,
          filename: previewName(image.fileName),
          contentType: 'image/jpeg',
          projectId: taskId,
          fileType: 'ANALYSIS_PREVIEW',
        });
        await repository.updateImage(image.id, { isPreview: true, resultFileId: stored.id });
      } catch (error) {
        log.warn(`preview for ${image.fileName} skipped: ${errorText(error)}`);
      }
    }
  }
}
