import { v4 as uuidv4 } from 'uuid';
import type { AnalysisImage, AnalysisTask, ImageStatus, ImageSummary } from '../types';
import { applyTaskProgress, countersWithoutImage, type TaskProgressPatch } from './task-state';

export interface CreateTaskInput {
  id?: string;
  routeName: string | null;
  totalFiles: number;
  totalBytes: number;
  confidenceThreshold: number;
  previewLimit: number;
  message?: string | null;
}

export interface NewImageInput {
  fileId: string;
  fileName: string;
  fileSize: number;
}

export interface ImagePatch {
  status?: ImageStatus;
  resultFileId?: string | null;
  isPreview?: boolean;
  summary?: ImageSummary | null;
  errorMessage?: string | null;
}

export interface ListImagesOptions {
  skip: number;
  limit: number;
  previewOnly?: boolean;
}

export interface ImagePage {
  total: number;
  images: AnalysisImage[];
}

export interface TaskRepository {
  createTask(input: CreateTaskInput): Promise<AnalysisTask>;
  addImages(taskId: string, images: NewImageInput[]): Promise<AnalysisImage[]>;
  getTask(taskId: string): Promise<AnalysisTask | null>;
  listTasks(limit: number): Promise<AnalysisTask[]>;
  listImages(taskId: string, options: ListImagesOptions): Promise<ImagePage>;
  getImage(taskId: string, imageId: string): Promise<AnalysisImage | null>;
  updateTaskProgress(taskId: string, patch: TaskProgressPatch): Promise<AnalysisTask | null>;
  updateImage(imageId: string, patch: ImagePatch): Promise<AnalysisImage | null>;
  /** Возвращает file_id, которые нужно удалить из файлового сервиса, или null если строки нет. */
  deleteImage(taskId: string, imageId: string): Promise<string[] | null>;
  deleteTask(taskId: string): Promise<string[] | null>;
}

export function imageFileIds(image: Pick<AnalysisImage, 'fileId' | 'resultFileId'>): string[] {
  return image.resultFileId ? [image.fileId, image.resultFileId] : [image.fileId];
}

export function applyImagePatch(image: AnalysisImage, patch: ImagePatch, now: Date): AnalysisImage {
  return {
    ...image,
    status: patch.status ?? image.status,
    resultFileId: patch.resultFileId !== undefined ? patch.resultFileId : image.resultFileId,
    isPreview: patch.isPreview ?? image.isPreview,
    summary: patch.summary !== undefined ? patch.summary : image.summary,
    errorMessage: patch.errorMessage !== undefined ? patch.errorMessage : image.errorMessage,
    updatedAt: now,
  };
}

/** Хранилище в памяти: локальный режим без DATABASE_URL и тесты. */
export class InMemoryTaskRepository implements TaskRepository {
  private tasks = new Map<string, AnalysisTask>();
  private images = new Map<string, AnalysisImage>();
  private lastTick = 0;

  constructor(private clock: () => Date = () => new Date()) {}

  // Строго возрастающее время создания: порядок сортировки не зависит от разрешения часов.
  private tick(): Date {
    const now = Math.max(this.clock().getTime(), this.lastTick + 1);
    this.lastTick = now;
    return new Date(now);
  }

  async createTask(input: CreateTaskInput): Promise<AnalysisTask> {
    const now = this.tick();
    const task: AnalysisTask = {
      id: input.id ?? uuidv4(),
      status: 'queued',
      routeName: input.routeName,
      totalFiles: input.totalFiles,
      totalBytes: input.totalBytes,
      processedFiles: 0,
      failedFiles: 0,
      defectsFound: 0,
      confidenceThreshold: input.confidenceThreshold,
      previewLimit: input.previewLimit,
      message: input.message ?? null,
      metadata: null,
      createdAt: now,
      updatedAt: now,
      completedAt: null,
    };
    this.tasks.set(task.id, task);
    return { ...task };
  }

  async addImages(taskId: string, inputs: NewImageInput[]): Promise<AnalysisImage[]> {
    if (!this.tasks.has(taskId)) throw new Error(`Task ${taskId} not found`);
    return inputs.map((input) => {
      const now = this.tick();
      const image: AnalysisImage = {
        id: uuidv4(),
        taskId,
        fileId: input.fileId,
        fileName: input.fileName,
        fileSize: input.fileSize,
        status: 'queued',
        resultFileId: null,
        isPreview: false,
        summary: null,
        errorMessage: null,
        createdAt: now,
        updatedAt: now,
      };
      this.images.set(image.id, image);
      return { ...image };
    });
  }

  async getTask(taskId: string): Promise<AnalysisTask | null> {
    const task = this.tasks.get(taskId);
    return task ? { ...task } : null;
  }

  async listTasks(limit: number): Promise<AnalysisTask[]> {
    return [...this.tasks.values()]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map((t) => ({ ...t }));
  }

  private imagesOf(taskId: string): AnalysisImage[] {
    return [...this.images.values()]
      .filter((img) => img.taskId === taskId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async listImages(taskId: string, options: ListImagesOptions): Promise<ImagePage> {
    const all = this.imagesOf(taskId).filter((img) => !options.previewOnly || img.isPreview);
    return {
      total: all.length,
      images: all.slice(options.skip, options.skip + options.limit).map((img) => ({ ...img })),
    };
  }

  async getImage(taskId: string, imageId: string): Promise<AnalysisImage | null> {
    const image = this.images.get(imageId);
    return image && image.taskId === taskId ? { ...image } : null;
  }

  async updateTaskProgress(taskId: string, patch: TaskProgressPatch): Promise<AnalysisTask | null> {
    const task = this.tasks.get(taskId);
    if (!task) return null;
    const next = applyTaskProgress(task, patch, this.clock());
    this.tasks.set(taskId, next);
    return { ...next };
  }

  async updateImage(imageId: string, patch: ImagePatch): Promise<AnalysisImage | null> {
    const image = this.images.get(imageId);
    if (!image) return null;
    const next = applyImagePatch(image, patch, this.clock());
    this.images.set(imageId, next);
    return { ...next };
  }

  async deleteImage(taskId: string, imageId: string): Promise<string[] | null> {
    const image = this.images.get(imageId);
    const task = this.tasks.get(taskId);
    if (!image || !task || image.taskId !== taskId) return null;

    this.images.delete(imageId);
    this.tasks.set(taskId, {
      ...task,
      ...countersWithoutImage(task, image.status),
      updatedAt: this.clock(),
    });
    return imageFileIds(image);
  }

  async deleteTask(taskId: string): Promise<string[] | null> {
    if (!this.tasks.has(taskId)) return null;
    const fileIds = this.imagesOf(taskId).flatMap((img) => {
      this.images.delete(img.id);
      return imageFileIds(img);
    });
    this.tasks.delete(taskId);
    return fileIds;
  }
}
