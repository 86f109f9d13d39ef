import cors from 'cors';
import express, { type Express } from 'express';
import type { AnnotationApi } from './clients/annotation-client';
import type { FilesApi } from './clients/files-client';
import type { ModelApi } from './clients/model-client';
import type { AppConfig } from './config';
import { setupRoutes } from './api/routes';
import { errorMiddleware, notFoundHandler, requestLogger } from './monitoring/error-handler';
import type { TaskEvents } from './services/task-events';
import type { TaskRepository } from './services/task-repository';

export interface AppDeps {
  config: AppConfig;
  repository: TaskRepository;
  model: ModelApi;
  files: FilesApi;
  annotation: AnnotationApi;
  events: TaskEvents;
  queue: { enqueue(taskId: string): void };
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(cors({ origin: deps.config.corsOrigins === '*' ? true : deps.config.corsOrigins, credentials: true }));
  app.use(express.json({ limit: '2mb' }));
  app.use(requestLogger());

  setupRoutes(app, deps);

  app.use(notFoundHandler());
  app.use(errorMiddleware());

  return app;
}
