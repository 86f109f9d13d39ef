import { Router, type Response } from 'express';
import multer from 'multer';
import type { FilesApi } from '../../clients/files-client';
import { HttpError } from '../../monitoring/error-handler';
import { asyncHandler } from '../async-handler';
import { fileUploadSchema } from '../validation';

const FILE_NOT_FOUND = 'Файл не найден';

function contentDisposition(kind: 'inline' | 'attachment', filename: string | undefined): string {
  if (!filename) return kind;
  const ascii = filename.replace(/[^\x20-\x7e]/g, '_').replace(/"/g, '');
  return `${kind}; filename="${ascii}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

function requireParam(value: string | undefined): string {
  if (!value) throw new HttpError(404, FILE_NOT_FOUND);
  return value;
}

/** Прокси к файловому сервису: загрузка, метаданные, список проекта, удаление и отдача содержимого. */
export function createFileRoutes(files: FilesApi, maxFileSizeBytes: number): Router {
  const router = Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: maxFileSizeBytes, files: 1 } });

  const serve = (kind: 'inline' | 'attachment') =>
    asyncHandler(async (req, res: Response) => {
      const file = await files.download(requireParam(req.params.fileId));
      res.setHeader('Content-Type', file.contentType);
      res.setHeader('Content-Disposition', contentDisposition(kind, file.filename));
      res.setHeader('Cache-Control', 'private, max-age=3600');
      res.send(file.buffer);
    });

  router.post(
    '/upload',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      const file = req.file;
      if (!file) throw new HttpError(400, 'Файл не передан');
      const { project_id, file_type } = fileUploadSchema.parse(req.body);

      const stored = await files.upload({
        buffer: file.buffer,
        filename: file.originalname,
        contentType: file.mimetype,
        projectId: project_id,
        fileType: file_type,
      });
      res.status(201).json(stored);
    }),
  );

  router.get(
    '/project/:projectId',
    asyncHandler(async (req, res) => {
      res.json(await files.listProject(requireParam(req.params.projectId)));
    }),
  );

  router.get('/:fileId/view', serve('inline'));
  router.get('/:fileId/download', serve('attachment'));

  router.get(
    '/:fileId',
    asyncHandler(async (req, res) => {
      res.json(await files.getMetadata(requireParam(req.params.fileId)));
    }),
  );

  router.delete(
    '/:fileId',
    asyncHandler(async (req, res) => {
      await files.delete(requireParam(req.params.fileId));
      res.status(204).end();
    }),
  );

  return router;
}
