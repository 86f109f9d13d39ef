import { Router } from 'express';
import multer from 'multer';
import type { AppDeps } from '../../app';
import { HttpError } from '../../monitoring/error-handler';
import { submitBatch } from '../../services/analysis-intake';
import { asyncHandler } from '../async-handler';
import { batchParamsSchema, pickField, predictQuerySchema } from '../validation';

export function createPredictRoutes(deps: AppDeps): Router {
  const router = Router();
  const { limits } = deps.config;

  const single = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: limits.maxImageSizeBytes, files: 1 },
  });
  const batch = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: limits.maxBatchSizeBytes, files: limits.maxBatchFiles },
  });
  const batchParams = batchParamsSchema(limits.previewLimit);

  router.get(
    '/model/info',
    asyncHandler(async (_req, res) => {
      res.json(await deps.model.modelInfo());
    }),
  );

  router.post(
    '/predict',
    single.single('file'),
    asyncHandler(async (req, res) => {
      const file = req.file;
      if (!file) throw new HttpError(400, 'Файл не передан');
      if (!file.mimetype.startsWith('image/')) throw new HttpError(400, 'Файл должен быть изображением');

      const { conf } = predictQuerySchema.parse(req.query);
      const result = await deps.model.predict({
        buffer: file.buffer,
        filename: file.originalname,
        contentType: file.mimetype,
        conf,
      });
      res.json(result);
    }),
  );

  router.post(
    '/predict/batch',
    batch.array('files'),
    asyncHandler(async (req, res) => {
      const files = Array.isArray(req.files) ? req.files : [];
      const params = batchParams.parse({
        conf: pickField(req.query, req.body, 'conf'),
        preview_limit: pickField(req.query, req.body, 'preview_limit'),
        route_name: pickField(req.query, req.body, 'route_name'),
      });

      const task = await submitBatch(
        {
          repository: deps.repository,
          files: deps.files,
          events: deps.events,
          queue: deps.queue,
          limits,
        },
        files,
        { conf: params.conf, previewLimit: params.preview_limit, routeName: params.route_name },
      );

      res.status(202).json({ task_id: task.id, status: task.status });
    }),
  );

  return router;
}
