import 'dotenv/config';
import { createServer } from 'node:http';
import { createApp } from './app';
import { AnnotationClient } from './clients/annotation-client';
import { FilesClient } from './clients/files-client';
import { ModelClient } from './clients/model-client';
import { loadConfig } from './config';
import { connectDatabase, type DatabaseHandle } from './db/client';
import { createLogger, setLogLevel } from './logger';
import { AnalysisQueue } from './services/analysis-queue';
import { AnalysisWorker } from './services/analysis-worker';
import { AnnotationRenderer } from './services/annotation-renderer';
import { DrizzleTaskRepository } from './services/drizzle-task-repository';
import { TaskEvents } from './services/task-events';
import { InMemoryTaskRepository, type TaskRepository } from './services/task-repository';
import { TaskSocketHub } from './services/websocket-hub';

const log = createLogger('Startup');

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  let database: DatabaseHandle | null = null;
  let repository: TaskRepository;
  if (config.databaseUrl) {
    database = await connectDatabase(config.databaseUrl);
    repository = new DrizzleTaskRepository(database.db);
    log.info('task store: postgres');
  } else {
    repository = new InMemoryTaskRepository();
    log.warn('DATABASE_URL is not set, task history is kept in memory');
  }

  const model = new ModelClient(config.services.model, {
    predictMs: config.timeouts.predictMs,
    modelInfoMs: config.timeouts.modelInfoMs,
    healthMs: config.timeouts.healthMs,
  });
  const files = new FilesClient(config.services.files);
  const annotation = new AnnotationClient(config.services.annotation);
  const events = new TaskEvents();

  const worker = new AnalysisWorker({ repository, model, files, renderer: new AnnotationRenderer(), events });
  const queue = new AnalysisQueue(worker, repository, events);

  const app = createApp({ config, repository, model, files, annotation, events, queue });
  const server = createServer(app);
  const hub = new TaskSocketHub(events, repository, config.apiPrefix);
  hub.attach(server);

  server.listen(config.port, () => {
    log.info(`BFF listening on :${config.port} (prefix "${config.apiPrefix}")`);
    log.info(`model: ${config.services.model}, files: ${config.services.files}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down`);

    await hub.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await queue.stop();
    await database?.close();
    log.info('shutdown complete');
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error('shutdown failed', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  log.error('failed to start', error);
  process.exit(1);
});
