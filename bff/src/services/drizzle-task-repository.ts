import { and, asc, count, desc, eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { Database } from '../db/client';
import { analysisImages, analysisTasks, type ImageRow, type TaskRow } from '../db/schema';
import type { AnalysisImage, AnalysisTask } from '../types';
import { applyTaskProgress, countersWithoutImage, type TaskProgressPatch } from './task-state';
import {
  applyImagePatch,
  imageFileIds,
  type CreateTaskInput,
  type ImagePage,
  type ImagePatch,
  type ListImagesOptions,
  type NewImageInput,
  type TaskRepository,
} from './task-repository';

function toTask(row: TaskRow): AnalysisTask {
  return { ...row, metadata: row.metadata ?? null };
}

function toImage(row: ImageRow): AnalysisImage {
  return { ...row, summary: row.summary ?? null };
}

export class DrizzleTaskRepository implements TaskRepository {
  constructor(private db: Database) {}

  async createTask(input: CreateTaskInput): Promise<AnalysisTask> {
    const [row] = await this.db
      .insert(analysisTasks)
      .values({
        id: input.id ?? uuidv4(),
        status: 'queued',
        routeName: input.routeName,
        totalFiles: input.totalFiles,
        totalBytes: input.totalBytes,
        confidenceThreshold: input.confidenceThreshold,
        previewLimit: input.previewLimit,
        message: input.message ?? null,
      })
      .returning();
    if (!row) throw new Error('Task insert returned no rows');
    return toTask(row);
  }

  async addImages(taskId: string, images: NewImageInput[]): Promise<AnalysisImage[]> {
    if (images.length === 0) return [];
    // created_at задаём явно, чтобы порядок обработки совпадал с порядком загрузки
    const base = Date.now();
    const rows = await this.db
      .insert(analysisImages)
      .values(
        images.map((img, i) => ({
          id: uuidv4(),
          taskId,
          fileId: img.fileId,
          fileName: img.fileName,
          fileSize: img.fileSize,
          status: 'queued' as const,
          createdAt: new Date(base + i),
          updatedAt: new Date(base + i),
        })),
      )
      .returning();
    return rows.map(toImage);
  }

  async getTask(taskId: string): Promise<AnalysisTask | null> {
    const [row] = await this.db.select().from(analysisTasks).where(eq(analysisTasks.id, taskId)).limit(1);
    return row ? toTask(row) : null;
  }

  async listTasks(limit: number): Promise<AnalysisTask[]> {
    const rows = await this.db.select().from(analysisTasks).orderBy(desc(analysisTasks.createdAt)).limit(limit);
    return rows.map(toTask);
  }

  async listImages(taskId: string, options: ListImagesOptions): Promise<ImagePage> {
    const where = options.previewOnly
      ? and(eq(analysisImages.taskId, taskId), eq(analysisImages.isPreview, true))
      : eq(analysisImages.taskId, taskId);

    const [totalRow] = await this.db.select({ value: count() }).from(analysisImages).where(where);
    const rows = await this.db
      .select()
      .from(analysisImages)
      .where(where)
      .orderBy(asc(analysisImages.createdAt))
      .offset(options.skip)
      .limit(options.limit);

    return { total: totalRow?.value ?? 0, images: rows.map(toImage) };
  }

  async getImage(taskId: string, imageId: string): Promise<AnalysisImage | null> {
    const [row] = await this.db
      .select()
      .from(analysisImages)
      .where(and(eq(analysisImages.id, imageId), eq(analysisImages.taskId, taskId)))
      .limit(1);
    return row ? toImage(row) : null;
  }

  async updateTaskProgress(taskId: string, patch: TaskProgressPatch): Promise<AnalysisTask | null> {
    return this.db.transaction(async (tx) => {
      const [row] = await tx.select().from(analysisTasks).where(eq(analysisTasks.id, taskId)).for('update');
      if (!row) return null;

      const next = applyTaskProgress(toTask(row), patch);
      const [updated] = await tx
        .update(analysisTasks)
        .set({
          status: next.status,
          message: next.message,
          totalFiles: next.totalFiles,
          processedFiles: next.processedFiles,
          failedFiles: next.failedFiles,
          defectsFound: next.defectsFound,
          metadata: next.metadata,
          updatedAt: next.updatedAt,
          completedAt: next.completedAt,
        })
        .where(eq(analysisTasks.id, taskId))
        .returning();
      return updated ? toTask(updated) : null;
    });
  }

  async updateImage(imageId: string, patch: ImagePatch): Promise<AnalysisImage | null> {
    const [row] = await this.db.select().from(analysisImages).where(eq(analysisImages.id, imageId)).limit(1);
    if (!row) return null;

    const next = applyImagePatch(toImage(row), patch, new Date());
    const [updated] = await this.db
      .update(analysisImages)
      .set({
        status: next.status,
        resultFileId: next.resultFileId,
        isPreview: next.isPreview,
        summary: next.summary,
        errorMessage: next.errorMessage,
        updatedAt: next.updatedAt,
      })
      .where(eq(analysisImages.id, imageId))
      .returning();
    return updated ? toImage(updated) : null;
  }

  async deleteImage(taskId: string, imageId: string): Promise<string[] | null> {
    return this.db.transaction(async (tx) => {
      const [image] = await tx
        .select()
        .from(analysisImages)
        .where(and(eq(analysisImages.id, imageId), eq(analysisImages.taskId, taskId)));
      if (!image) return null;

      const [task] = await tx.select().from(analysisTasks).where(eq(analysisTasks.id, taskId)).for('update');
      if (!task) return null;

      await tx.delete(analysisImages).where(eq(analysisImages.id, imageId));
      await tx
        .update(analysisTasks)
        .set({
          ...countersWithoutImage(task, image.status),
          updatedAt: new Date(),
        })
        .where(eq(analysisTasks.id, taskId));

      return imageFileIds(image);
    });
  }

  async deleteTask(taskId: string): Promise<string[] | null> {
    return this.db.transaction(async (tx) => {
      const [task] = await tx.select({ id: analysisTasks.id }).from(analysisTasks).where(eq(analysisTasks.id, taskId));
      if (!task) return null;

      const images = await tx
        .select({ fileId: analysisImages.fileId, resultFileId: analysisImages.resultFileId })
        .from(analysisImages)
        .where(eq(analysisImages.taskId, taskId));

      // analysis_images удаляются каскадом
      await tx.delete(analysisTasks).where(eq(analysisTasks.id, taskId));
      return images.flatMap(imageFileIds);
    });
  }
}
