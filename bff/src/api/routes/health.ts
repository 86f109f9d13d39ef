import { Router } from 'express';
import type { ModelApi } from '../../clients/model-client';
import { asyncHandler } from '../async-handler';

export function createHealthRoutes(model: ModelApi): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      try {
        const modelHealth = await model.health();
        res.json({
          status: 'healthy',
          service: 'bff-service',
          dependencies: { 'yolov8-model-service': modelHealth },
        });
      } catch (error) {
        res.json({
          status: 'unhealthy',
          service: 'bff-service',
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }),
  );

  return router;
}
