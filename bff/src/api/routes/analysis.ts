import { Router } from 'express';
import type { AppDeps } from '../../app';
import { createLogger } from '../../logger';
import { HttpError } from '../../monitoring/error-handler';
import { isFinalStatus } from '../../services/task-state';
import { asyncHandler } from '../async-handler';
import { fileViewUrl, toImageResponse, toTaskListItem, toTaskResponse } from '../serializers';
import { annotateBodySchema, historyQuerySchema, imagesQuerySchema, taskIdSchema } from '../validation';

const log = createLogger('Analysis');

const TASK_NOT_FOUND = 'Задача не найдена';
const IMAGE_NOT_FOUND = 'Изображение не найдено';
const TASK_BUSY = 'Снимки можно удалять только после завершения задачи';

function parseId(raw: string | undefined, notFound: string): string {
  const parsed = taskIdSchema.safeParse(raw);
  if (!parsed.success) throw new HttpError(404, notFound);
  return parsed.data;
}

export function createAnalysisRoutes(deps: AppDeps): Router {
  const router = Router();
  const prefix = deps.config.apiPrefix;

  async function removeFiles(fileIds: string[]): Promise<void> {
    const results = await Promise.allSettled(fileIds.map((id) => deps.files.delete(id)));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
        log.warn(`file ${fileIds[i]} was not deleted: ${reason}`);
      }
    });
  }

  router.get(
    '/history',
    asyncHandler(async (req, res) => {
      const { limit } = historyQuerySchema.parse(req.query);
      const tasks = await deps.repository.listTasks(limit);
      res.json(tasks.map(toTaskListItem));
    }),
  );

  router.get(
    '/tasks/:taskId',
    asyncHandler(async (req, res) => {
      const taskId = parseId(req.params.taskId, TASK_NOT_FOUND);
      const task = await deps.repository.getTask(taskId);
      if (!task) throw new HttpError(404, TASK_NOT_FOUND);

      const previews = await deps.repository.listImages(taskId, {
        skip: 0,
        limit: Math.max(1, task.previewLimit),
        previewOnly: true,
      });
      res.json(toTaskResponse(task, previews.images, prefix));
    }),
  );

  router.get(
    '/tasks/:taskId/images',
    asyncHandler(async (req, res) => {
      const taskId = parseId(req.params.taskId, TASK_NOT_FOUND);
      const query = imagesQuerySchema.parse(req.query);
      const task = await deps.repository.getTask(taskId);
      if (!task) throw new HttpError(404, TASK_NOT_FOUND);

      const page = await deps.repository.listImages(taskId, {
        skip: query.skip,
        limit: query.limit,
        previewOnly: query.preview_only,
      });
      res.json({
        total: page.total,
        skip: query.skip,
        limit: query.limit,
        images: page.images.map((img) => toImageResponse(img, prefix)),
      });
    }),
  );

  router.get(
    '/tasks/:taskId/images/:imageId',
    asyncHandler(async (req, res) => {
      const taskId = parseId(req.params.taskId, TASK_NOT_FOUND);
      const imageId = parseId(req.params.imageId, IMAGE_NOT_FOUND);
      const image = await deps.repository.getImage(taskId, imageId);
      if (!image) throw new HttpError(404, IMAGE_NOT_FOUND);
      res.json(toImageResponse(image, prefix));
    }),
  );

  router.delete(
    '/tasks/:taskId',
    asyncHandler(async (req, res) => {
      const taskId = parseId(req.params.taskId, TASK_NOT_FOUND);
      const task = await deps.repository.getTask(taskId);
      const fileIds = task ? await deps.repository.deleteTask(taskId) : null;
      if (!task || !fileIds) throw new HttpError(404, TASK_NOT_FOUND);

      deps.events.publishRemoval(task);
      await removeFiles(fileIds);
      log.info(`task ${taskId} deleted with ${fileIds.length} files`);
      res.status(204).end();
    }),
  );

  router.delete(
    '/tasks/:taskId/images/:imageId',
    asyncHandler(async (req, res) => {
      const taskId = parseId(req.params.taskId, TASK_NOT_FOUND);
      const imageId = parseId(req.params.imageId, IMAGE_NOT_FOUND);
      const task = await deps.repository.getTask(taskId);
      if (!task) throw new HttpError(404, TASK_NOT_FOUND);
      // воркер держит свой список снимков и пишет счётчики целиком
      if (!isFinalStatus(task.status)) throw new HttpError(409, TASK_BUSY);

      const fileIds = await deps.repository.deleteImage(taskId, imageId);
      if (!fileIds) throw new HttpError(404, IMAGE_NOT_FOUND);

      const shrunk = await deps.repository.getTask(taskId);
      if (shrunk) deps.events.publishTask(shrunk);
      await removeFiles(fileIds);
      res.status(204).end();
    }),
  );

  router.post(
    '/tasks/:taskId/images/:imageId/annotate',
    asyncHandler(async (req, res) => {
      const taskId = parseId(req.params.taskId, TASK_NOT_FOUND);
      const imageId = parseId(req.params.imageId, IMAGE_NOT_FOUND);
      const body = annotateBodySchema.parse(req.body);

      const image = await deps.repository.getImage(taskId, imageId);
      if (!image) throw new HttpError(404, IMAGE_NOT_FOUND);

      const result = await deps.annotation.annotate({
        fileId: image.fileId,
        bboxes: body.bboxes,
        projectId: taskId,
        fileType: 'ANALYSIS_RESULT',
      });
      if (!result.success || !result.file_id) {
        throw new HttpError(502, result.message || 'Сервис аннотаций не вернул файл');
      }

      const previousResult = image.resultFileId;
      await deps.repository.updateImage(imageId, {
        resultFileId: result.file_id,
        summary: { ...(image.summary ?? {}), manual_annotations: body.bboxes },
      });
      // старый результат больше не нужен
      if (previousResult && previousResult !== result.file_id) await removeFiles([previousResult]);

      res.json({ ...result, result_url: fileViewUrl(prefix, result.file_id) });
    }),
  );

  return router;
}
