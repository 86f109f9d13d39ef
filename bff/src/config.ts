import { z } from 'zod';

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const trimSlash = (url: string) => url.replace(/\/+$/, '');

const configSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  API_PREFIX: z
    .string()
    .default('/api')
    .transform((p) => (p === '/' ? '' : trimSlash(p.startsWith('/') ? p : `/${p}`))),
  CORS_ORIGINS: z.string().default('*'),
  YOLOV8_SERVICE_URL: z.string().url().default('http://yolov8-model-service:8000').transform(trimSlash),
  FILES_SERVICE_URL: z.string().url().default('http://files-service:8006').transform(trimSlash),
  ANNOTATION_SERVICE_URL: z.string().url().default('http://annotation-service:8007').transform(trimSlash),
  DATABASE_URL: z.string().min(1).optional(),
  MAX_BATCH_FILES: intFromEnv(500),
  MAX_BATCH_SIZE_BYTES: intFromEnv(2 * 1024 * 1024 * 1024),
  MAX_IMAGE_SIZE_BYTES: intFromEnv(50 * 1024 * 1024),
  PREVIEW_LIMIT: intFromEnv(10),
  PREDICT_TIMEOUT_MS: intFromEnv(60_000),
  MODEL_INFO_TIMEOUT_MS: intFromEnv(10_000),
  HEALTH_TIMEOUT_MS: intFromEnv(5_000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type LogLevel = z.infer<typeof configSchema>['LOG_LEVEL'];

export interface AppConfig {
  port: number;
  apiPrefix: string;
  corsOrigins: string[] | '*';
  services: {
    model: string;
    files: string;
    annotation: string;
  };
  databaseUrl?: string;
  limits: {
    maxBatchFiles: number;
    maxBatchSizeBytes: number;
    maxImageSizeBytes: number;
    previewLimit: number;
  };
  timeouts: {
    predictMs: number;
    modelInfoMs: number;
    healthMs: number;
  };
  logLevel: LogLevel;
}

/**
 * Собирает конфиг BFF из переменных окружения.
 * Пустые строки считаются отсутствующими значениями.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string' && value.trim() !== '') cleaned[key] = value.trim();
  }

  const parsed = configSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue?.path.join('.') || 'env';
    throw new Error(`Invalid configuration: ${name}: ${issue?.message ?? 'invalid value'}`);
  }

  const c = parsed.data;
  const origins = c.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean);

  return {
    port: c.PORT,
    apiPrefix: c.API_PREFIX,
    corsOrigins: origins.length === 0 || origins.includes('*') ? '*' : origins,
    services: {
      model: c.YOLOV8_SERVICE_URL,
      files: c.FILES_SERVICE_URL,
      annotation: c.ANNOTATION_SERVICE_URL,
    },
    databaseUrl: c.DATABASE_URL,
    limits: {
      maxBatchFiles: c.MAX_BATCH_FILES,
      maxBatchSizeBytes: c.MAX_BATCH_SIZE_BYTES,
      maxImageSizeBytes: c.MAX_IMAGE_SIZE_BYTES,
      previewLimit: c.PREVIEW_LIMIT,
    },
    timeouts: {
      predictMs: c.PREDICT_TIMEOUT_MS,
      modelInfoMs: c.MODEL_INFO_TIMEOUT_MS,
      healthMs: c.HEALTH_TIMEOUT_MS,
    },
    logLevel: c.LOG_LEVEL,
  };
}
