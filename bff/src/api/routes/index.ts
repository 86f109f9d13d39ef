import type { Application } from 'express';
import type { AppDeps } from '../../app';
import { createAnalysisRoutes } from './analysis';
import { createFileRoutes } from './files';
import { createHealthRoutes } from './health';
import { createPredictRoutes } from './predict';

export function setupRoutes(app: Application, deps: AppDeps): void {
  const prefix = deps.config.apiPrefix;
  const health = createHealthRoutes(deps.model);

  app.use('/health', health);
  app.use(`${prefix}/health`, health);

  app.use(prefix || '/', createPredictRoutes(deps));
  app.use(`${prefix}/analysis`, createAnalysisRoutes(deps));
  app.use(`${prefix}/files`, createFileRoutes(deps.files, deps.config.limits.maxImageSizeBytes));

  app.get(prefix || '/', (_req, res) => {
    res.json({
      service: 'bff-service',
      status: 'running',
      endpoints: {
        health: '/health',
        modelInfo: `${prefix}/model/info`,
        predict: `${prefix}/predict`,
        batch: `${prefix}/predict/batch`,
        history: `${prefix}/analysis/history`,
        tasks: `${prefix}/analysis/tasks/{id}`,
        files: `${prefix}/files/{id}`,
        wsTask: `${prefix}/ws/tasks/{id}`,
        wsHistory: `${prefix}/ws/history`,
      },
    });
  });
}
