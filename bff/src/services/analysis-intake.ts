import { v4 as uuidv4 } from 'uuid';
import type { FilesApi } from '../clients/files-client';
import { validateBatch, type BatchLimits } from '../api/validation';
import { createLogger } from '../logger';
import type { AnalysisTask } from '../types';
import type { TaskEvents } from './task-events';
import type { TaskRepository } from './task-repository';

const log = createLogger('Intake');

export interface BatchFile {
  originalname: string;
  mimetype: string;
  size: number;
  buffer: Buffer;
}

export interface BatchParams {
  conf: number;
  previewLimit: number;
  routeName: string | null;
}

export interface IntakeDeps {
  repository: TaskRepository;
  files: FilesApi;
  events: TaskEvents;
  queue: { enqueue(taskId: string): void };
  limits: BatchLimits;
}

/**
 * Принимает пакет: проверяет файлы, складывает оригиналы в файловый сервис,
 * создаёт задачу и ставит её в очередь.
 */
export async function submitBatch(deps: IntakeDeps, files: BatchFile[], params: BatchParams): Promise<AnalysisTask> {
  const totalBytes = validateBatch(files, deps.limits);
  const taskId = uuidv4();

  const stored: { fileId: string; fileName: string; fileSize: number }[] = [];
  try {
    for (const file of files) {
      const result = await deps.files.upload({
        buffer: file.buffer,
        filename: file.originalname,
        contentType: file.mimetype,
        projectId: taskId,
        fileType: 'ANALYSIS_ORIGINAL',
      });
      stored.push({ fileId: result.id, fileName: file.originalname, fileSize: file.size });
    }
  } catch (error) {
    await Promise.allSettled(stored.map((s) => deps.files.delete(s.fileId)));
    throw error;
  }

  const task = await deps.repository.createTask({
    id: taskId,
    routeName: params.routeName,
    totalFiles: files.length,
    totalBytes,
    confidenceThreshold: params.conf,
    previewLimit: params.previewLimit,
    message: 'В очереди',
  });
  await deps.repository.addImages(task.id, stored);

  deps.events.publishTask(task);
  deps.queue.enqueue(task.id);
  log.info(`task ${task.id}: ${files.length} files, ${totalBytes} bytes, conf=${params.conf}`);
  return task;
}
