import type { NextFunction, Request, Response } from 'express';
import axios from 'axios';
import multer from 'multer';
import { ZodError } from 'zod';
import { createLogger } from '../logger';

const log = createLogger('HTTP');

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, detail: string) {
    super(detail);
    this.name = 'HttpError';
    this.status = status;
  }
}

export class InvalidTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Недопустимый переход статуса: ${from} → ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'ECONNRESET', 'EHOSTUNREACH']);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function upstreamDetail(data: unknown): string | null {
  if (typeof data === 'string' && data.trim()) return data.trim();
  if (data && typeof data === 'object' && 'detail' in data) {
    const detail = data.detail;
    if (typeof detail === 'string') return detail;
    if (detail !== undefined) return JSON.stringify(detail);
  }
  return null;
}

/**
 * Переводит ошибку HTTP-клиента в HttpError:
 * таймаут → 504, нет соединения → 503, статус апстрима пробрасывается как есть.
 */
export function fromUpstream(error: unknown, service: string): HttpError {
  if (error instanceof HttpError) return error;

  if (axios.isAxiosError(error)) {
    const code = error.code ?? '';
    if (TIMEOUT_CODES.has(code)) {
      return new HttpError(504, `Превышено время ожидания ответа от ${service}`);
    }
    if (error.response) {
      const detail = upstreamDetail(error.response.data) ?? `Ошибка ${service}: ${error.response.status}`;
      return new HttpError(error.response.status, detail);
    }
    if (UNREACHABLE_CODES.has(code) || error.request) {
      return new HttpError(503, `Не удалось подключиться к ${service}`);
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  return new HttpError(502, `Ошибка ${service}: ${message}`);
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

export function toHttpError(error: unknown): HttpError {
  if (error instanceof HttpError) return error;

  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const where = issue && issue.path.length ? `${issue.path.join('.')}: ` : '';
    return new HttpError(400, `${where}${issue?.message ?? 'Некорректный запрос'}`);
  }

  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') return new HttpError(413, 'Файл слишком большой');
    if (error.code === 'LIMIT_FILE_COUNT') return new HttpError(400, 'Слишком много файлов');
    return new HttpError(400, `Ошибка загрузки: ${error.message}`);
  }

  if (isBodyParseError(error)) return new HttpError(422, 'Некорректный JSON в теле запроса');

  if (error instanceof InvalidTransitionError) return new HttpError(409, error.message);

  return new HttpError(500, 'Внутренняя ошибка сервера');
}

export function errorMiddleware() {
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const httpError = toHttpError(error);
    if (httpError.status >= 500) {
      log.error(`${req.method} ${req.originalUrl} -> ${httpError.status}`, error);
    }
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(httpError.status).json({ detail: httpError.message });
  };
}

export function notFoundHandler() {
  return (req: Request, res: Response): void => {
    res.status(404).json({ detail: `Маршрут не найден: ${req.method} ${req.path}` });
  };
}

export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const started = Date.now();
    res.on('finish', () => {
      log.info(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`);
    });
    next();
  };
}
