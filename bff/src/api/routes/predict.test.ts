import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { HttpError } from '../../monitoring/error-handler';
import { detection, prediction } from '../../testing/fakes';
import { createTestHarness, type TestHarness } from '../../testing/harness';

const jpeg = (name: string) => ({ filename: name, contentType: 'image/jpeg' });

describe('predict routes', () => {
  let h: TestHarness;

  beforeEach(() => {
    h = createTestHarness();
  });

  it('reports health of the model service', async () => {
    const ok = await request(h.app).get('/api/health');
    expect(ok.status).toBe(200);
    expect(ok.body.status).toBe('healthy');
    expect(ok.body.dependencies['yolov8-model-service'].model_loaded).toBe(true);

    h.model.healthResult = new Error('connect ECONNREFUSED');
    const down = await request(h.app).get('/health');
    expect(down.status).toBe(200);
    expect(down.body).toEqual({ status: 'unhealthy', service: 'bff-service', error: 'connect ECONNREFUSED' });
  });

  it('proxies model info', async () => {
    const res = await request(h.app).get('/api/model/info');
    expect(res.status).toBe(200);
    expect(res.body.model_path).toBe('models/best.pt');
  });

  describe('POST /predict', () => {
    it('returns the model response and forwards conf', async () => {
      const result = prediction([detection('bad_insulator', 'Дефектный изолятор', 0.9)]);
      h.model.byContent.set('img-a', result);

      const res = await request(h.app).post('/api/predict?conf=0.5').attach('file', Buffer.from('img-a'), jpeg('a.jpg'));

      expect(res.status).toBe(200);
      expect(res.body).toEqual(result);
      expect(h.model.calls).toHaveLength(1);
      expect(h.model.calls[0]?.conf).toBe(0.5);
      expect(h.model.calls[0]?.filename).toBe('a.jpg');
    });

    it('uses 0.25 when conf is omitted', async () => {
      await request(h.app).post('/api/predict').attach('file', Buffer.from('img-a'), jpeg('a.jpg'));
      expect(h.model.calls[0]?.conf).toBe(0.25);
    });

    it('requires a file', async () => {
      const res = await request(h.app).post('/api/predict');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'Файл не передан' });
    });

    it('rejects non-image uploads', async () => {
      const res = await request(h.app)
        .post('/api/predict')
        .attach('file', Buffer.from('hello'), { filename: 'notes.txt', contentType: 'text/plain' });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'Файл должен быть изображением' });
    });

    it('rejects conf outside 0..1', async () => {
      const res = await request(h.app).post('/api/predict?conf=2').attach('file', Buffer.from('img-a'), jpeg('a.jpg'));
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'conf: conf должен быть в диапазоне 0..1' });
      expect(h.model.calls).toHaveLength(0);
    });

    it('passes upstream failures through', async () => {
      h.model.byContent.set('img-a', new HttpError(503, 'Не удалось подключиться к модели'));
      const res = await request(h.app).post('/api/predict').attach('file', Buffer.from('img-a'), jpeg('a.jpg'));
      expect(res.status).toBe(503);
      expect(res.body).toEqual({ detail: 'Не удалось подключиться к модели' });
    });
  });

  describe('POST /predict/batch', () => {
    it('stores originals, creates a queued task and enqueues it', async () => {
      const res = await request(h.app)
        .post('/api/predict/batch')
        .field('conf', '0.5')
        .field('route_name', 'ВЛ-110 участок 3')
        .attach('files', Buffer.from('one'), jpeg('one.jpg'))
        .attach('files', Buffer.from('two'), jpeg('two.JPG'));

      expect(res.status).toBe(202);
      expect(res.body.status).toBe('queued');
      const taskId: string = res.body.task_id;
      expect(h.enqueued).toEqual([taskId]);

      const task = await h.repository.getTask(taskId);
      expect(task?.totalFiles).toBe(2);
      expect(task?.totalBytes).toBe(6);
      expect(task?.confidenceThreshold).toBe(0.5);
      expect(task?.routeName).toBe('ВЛ-110 участок 3');
      expect(task?.previewLimit).toBe(3);

      const page = await h.repository.listImages(taskId, { skip: 0, limit: 10 });
      expect(page.images.map((img) => [img.fileId, img.fileName])).toEqual([
        ['file-1', 'one.jpg'],
        ['file-2', 'two.JPG'],
      ]);
      expect(h.files.stored.get('file-1')?.fileType).toBe('ANALYSIS_ORIGINAL');
      expect(h.files.stored.get('file-1')?.projectId).toBe(taskId);
    });

    it('publishes the queued state', async () => {
      const seen: string[] = [];
      h.events.subscribe((m) => seen.push(`${m.status}:${m.message}`));
      await request(h.app).post('/api/predict/batch').attach('files', Buffer.from('one'), jpeg('one.jpg'));
      expect(seen).toEqual(['queued:В очереди']);
    });

    it('rejects an empty batch', async () => {
      const res = await request(h.app).post('/api/predict/batch').field('conf', '0.3');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'Не переданы файлы для анализа' });
    });

    it('rejects archives without uploading anything', async () => {
      const res = await request(h.app)
        .post('/api/predict/batch')
        .attach('files', Buffer.from('one'), jpeg('one.jpg'))
        .attach('files', Buffer.from('zip'), { filename: 'photos.zip', contentType: 'application/zip' });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'Архивы не поддерживаются: photos.zip. Загрузите изображения напрямую' });
      expect(h.files.stored.size).toBe(0);
      expect(h.enqueued).toEqual([]);
    });

    it('rolls back stored originals when an upload fails', async () => {
      h.files.failUploadsAfter = 1;
      const res = await request(h.app)
        .post('/api/predict/batch')
        .attach('files', Buffer.from('one'), jpeg('one.jpg'))
        .attach('files', Buffer.from('two'), jpeg('two.jpg'));
      expect(res.status).toBe(503);
      expect(h.files.deleted).toEqual(['file-1']);
      expect(await h.repository.listTasks(10)).toEqual([]);
    });

    it('caps preview_limit at the configured maximum', async () => {
      const res = await request(h.app)
        .post('/api/predict/batch?preview_limit=10')
        .attach('files', Buffer.from('one'), jpeg('one.jpg'));
      expect(res.status).toBe(400);
      expect(res.body.detail).toBe('preview_limit: Number must be less than or equal to 3');
    });
  });
});
