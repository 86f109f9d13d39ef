import path from 'node:path';
import { z } from 'zod';
import { HttpError } from '../monitoring/error-handler';
import type { FileType } from '../types';

export const SUPPORTED_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.tif', '.tiff', '.bmp', '.dng', '.raw', '.nef', '.cr2', '.arw'];
const ARCHIVE_SUFFIXES = ['.zip', '.tar', '.tar.gz', '.tgz'];

const confidence = (fallback: number) =>
  z.coerce
    .number({ invalid_type_error: 'conf должен быть числом' })
    .min(0, 'conf должен быть в диапазоне 0..1')
    .max(1, 'conf должен быть в диапазоне 0..1')
    .default(fallback);

export const predictQuerySchema = z.object({ conf: confidence(0.25) });

export function batchParamsSchema(previewLimit: number) {
  return z.object({
    conf: confidence(0.35),
    preview_limit: z.coerce.number().int().min(1).max(previewLimit).default(previewLimit),
    route_name: z
      .string()
      .trim()
      .max(255)
      .optional()
      .transform((v) => (v ? v : null)),
  });
}

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .optional()
  .transform((v) => v === true || v === 'true' || v === '1');

export const imagesQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  preview_only: booleanFlag,
});

export const FILE_TYPES = ['IMAGE', 'ANALYSIS_ORIGINAL', 'ANALYSIS_PREVIEW', 'ANALYSIS_RESULT'] as const satisfies readonly FileType[];

export const fileUploadSchema = z.object({
  project_id: z.string().trim().min(1, 'Не указан проект'),
  file_type: z.enum(FILE_TYPES, { errorMap: () => ({ message: `Допустимые типы: ${FILE_TYPES.join(', ')}` }) }),
});

export const taskIdSchema = z.string().uuid('Некорректный идентификатор задачи');

export const annotateBodySchema = z.object({
  bboxes: z
    .array(
      z.object({
        x: z.number().min(0),
        y: z.number().min(0),
        width: z.number().positive(),
        height: z.number().positive(),
        name: z.string().trim().max(255).optional(),
        is_defect: z.boolean().default(false),
      }),
    )
    .min(1, 'Нужна хотя бы одна рамка'),
});

/** Значение поля из query или из multipart-формы; query важнее. */
export function pickField(query: Record<string, unknown>, body: unknown, name: string): unknown {
  if (query[name] !== undefined) return query[name];
  if (!body || typeof body !== 'object') return undefined;
  const entry: [string, unknown] | undefined = Object.entries(body).find(([key]) => key === name);
  return entry?.[1];
}

export interface IncomingFile {
  originalname: string;
  size: number;
}

export interface BatchLimits {
  maxBatchFiles: number;
  maxBatchSizeBytes: number;
}

function isArchive(name: string): boolean {
  const lower = name.toLowerCase();
  return ARCHIVE_SUFFIXES.some((suffix) => lower.endsWith(suffix));
}

function formatGb(bytes: number): string {
  return `${Math.round((bytes / 1024 ** 3) * 100) / 100} ГБ`;
}

/** Проверяет пакет файлов и возвращает суммарный размер. */
export function validateBatch(files: IncomingFile[], limits: BatchLimits): number {
  if (files.length === 0) throw new HttpError(400, 'Не переданы файлы для анализа');
  if (files.length > limits.maxBatchFiles) {
    throw new HttpError(400, `Слишком много файлов: ${files.length}, максимум ${limits.maxBatchFiles}`);
  }

  let total = 0;
  for (const file of files) {
    const name = file.originalname || 'без имени';
    if (isArchive(name)) {
      throw new HttpError(400, `Архивы не поддерживаются: ${name}. Загрузите изображения напрямую`);
    }
    const ext = path.extname(name).toLowerCase();
    if (!SUPPORTED_EXTENSIONS.includes(ext)) {
      throw new HttpError(400, `Неподдерживаемый формат файла: ${name}. Допустимо: ${SUPPORTED_EXTENSIONS.join(', ')}`);
    }
    total += file.size;
  }

  if (total > limits.maxBatchSizeBytes) {
    throw new HttpError(400, `Суммарный размер файлов превышает ${formatGb(limits.maxBatchSizeBytes)}`);
  }
  return total;
}
