import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import type { AnalysisImage, AnalysisTask, TaskProgressMessage } from '../../types';
import { createTestHarness, type TestHarness } from '../../testing/harness';

const MISSING_ID = '3f1c2b9a-7d4e-4a51-9c0b-2e6f8d7a1b3c';

describe('analysis routes', () => {
  let h: TestHarness;
  let task: AnalysisTask;
  let images: AnalysisImage[];

  beforeEach(async () => {
    h = createTestHarness();
    task = await h.repository.createTask({
      routeName: 'Линия 7',
      totalFiles: 3,
      totalBytes: 300,
      confidenceThreshold: 0.35,
      previewLimit: 2,
      message: 'В очереди',
    });
    for (const id of ['orig-a', 'orig-b', 'orig-c', 'res-a']) h.files.put(id, id);
    images = await h.repository.addImages(task.id, [
      { fileId: 'orig-a', fileName: 'a.jpg', fileSize: 100 },
      { fileId: 'orig-b', fileName: 'b.jpg', fileSize: 100 },
      { fileId: 'orig-c', fileName: 'c.jpg', fileSize: 100 },
    ]);
  });

  const firstImage = (): AnalysisImage => {
    const image = images[0];
    if (!image) throw new Error('fixture has no images');
    return image;
  };

  it('lists history newest first', async () => {
    const newer = await h.repository.createTask({
      routeName: null,
      totalFiles: 1,
      totalBytes: 1,
      confidenceThreshold: 0.35,
      previewLimit: 1,
    });

    const res = await request(h.app).get('/api/analysis/history?limit=5');

    expect(res.status).toBe(200);
    expect(res.body.map((t: { id: string }) => t.id)).toEqual([newer.id, task.id]);
    expect(res.body[1]).toMatchObject({ route_name: 'Линия 7', status: 'queued', total_files: 3, completed_at: null });
  });

  it('returns a task with its preview files', async () => {
    await h.repository.updateImage(firstImage().id, {
      status: 'completed',
      isPreview: true,
      resultFileId: 'res-a',
    });

    const res = await request(h.app).get(`/api/analysis/tasks/${task.id}`);

    expect(res.status).toBe(200);
    expect(res.body.id).toBe(task.id);
    expect(res.body.preview_limit).toBe(2);
    expect(res.body.preview_files).toHaveLength(1);
    expect(res.body.preview_files[0]).toMatchObject({
      file_name: 'a.jpg',
      original_url: '/api/files/orig-a/view',
      result_url: '/api/files/res-a/view',
      is_preview: true,
    });
  });

  it('answers 404 for malformed and unknown task ids', async () => {
    const malformed = await request(h.app).get('/api/analysis/tasks/not-a-uuid');
    expect(malformed.status).toBe(404);
    expect(malformed.body).toEqual({ detail: 'Задача не найдена' });

    const unknown = await request(h.app).get(`/api/analysis/tasks/${MISSING_ID}/images`);
    expect(unknown.status).toBe(404);
  });

  it('pages through task images in upload order', async () => {
    const res = await request(h.app).get(`/api/analysis/tasks/${task.id}/images?skip=1&limit=1`);

    expect(res.status).toBe(200);
    expect(res.body.total).toBe(3);
    expect(res.body.skip).toBe(1);
    expect(res.body.limit).toBe(1);
    expect(res.body.images.map((img: { file_name: string }) => img.file_name)).toEqual(['b.jpg']);
  });

  it('returns one image of the task', async () => {
    const res = await request(h.app).get(`/api/analysis/tasks/${task.id}/images/${firstImage().id}`);

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      id: firstImage().id,
      file_name: 'a.jpg',
      original_url: '/api/files/orig-a/view',
      result_url: null,
    });

    const other = await request(h.app).get(`/api/analysis/tasks/${MISSING_ID}/images/${firstImage().id}`);
    expect(other.status).toBe(404);
    expect(other.body).toEqual({ detail: 'Изображение не найдено' });
  });

  it('filters preview images', async () => {
    await h.repository.updateImage(firstImage().id, { isPreview: true });
    const res = await request(h.app).get(`/api/analysis/tasks/${task.id}/images?preview_only=true`);
    expect(res.body.total).toBe(1);
  });

  it('deletes a task together with its stored files', async () => {
    await h.repository.updateImage(firstImage().id, { resultFileId: 'res-a' });

    const res = await request(h.app).delete(`/api/analysis/tasks/${task.id}`);

    expect(res.status).toBe(204);
    expect(await h.repository.getTask(task.id)).toBeNull();
    expect([...h.files.deleted].sort()).toEqual(['orig-a', 'orig-b', 'orig-c', 'res-a']);
    expect(h.files.stored.size).toBe(0);
  });

  it('tells history subscribers that a task was removed', async () => {
    const seen: TaskProgressMessage[] = [];
    h.events.subscribe((m) => seen.push(m));

    await request(h.app).delete(`/api/analysis/tasks/${task.id}`).expect(204);

    expect(seen).toEqual([
      {
        task_id: task.id,
        status: 'queued',
        processed_files: 0,
        total_files: 3,
        failed_files: 0,
        defects_found: 0,
        message: 'Задача удалена',
        deleted: true,
      },
    ]);
  });

  const finishTask = async () => {
    await h.repository.updateTaskProgress(task.id, { status: 'processing' });
    await h.repository.updateTaskProgress(task.id, { status: 'completed' });
  };

  it('deletes a single image and shrinks the task', async () => {
    await finishTask();
    const seen: TaskProgressMessage[] = [];
    h.events.subscribe((m) => seen.push(m));
    const res = await request(h.app).delete(`/api/analysis/tasks/${task.id}/images/${firstImage().id}`);

    expect(res.status).toBe(204);
    expect(h.files.deleted).toEqual(['orig-a']);
    expect((await h.repository.getTask(task.id))?.totalFiles).toBe(2);
    expect(seen.at(-1)).toMatchObject({ task_id: task.id, status: 'completed', total_files: 2 });

    const again = await request(h.app).delete(`/api/analysis/tasks/${task.id}/images/${firstImage().id}`);
    expect(again.status).toBe(404);
    expect(again.body).toEqual({ detail: 'Изображение не найдено' });
  });

  it('refuses to delete an image while the task is still running', async () => {
    for (const status of ['queued', 'processing'] as const) {
      if (status === 'processing') await h.repository.updateTaskProgress(task.id, { status });

      const res = await request(h.app).delete(`/api/analysis/tasks/${task.id}/images/${firstImage().id}`);

      expect(res.status).toBe(409);
      expect(res.body).toEqual({ detail: 'Снимки можно удалять только после завершения задачи' });
    }
    expect(h.files.deleted).toEqual([]);
    expect((await h.repository.getTask(task.id))?.totalFiles).toBe(3);
    expect(await h.repository.getImage(task.id, firstImage().id)).not.toBeNull();
  });

  it('answers 404 when deleting an image of an unknown task', async () => {
    const res = await request(h.app).delete(`/api/analysis/tasks/${MISSING_ID}/images/${firstImage().id}`);
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: 'Задача не найдена' });
  });

  describe('manual annotation', () => {
    const bbox = { x: 12, y: 8, width: 40, height: 30, name: 'скол', is_defect: true };

    it('renders through the annotation service and replaces the previous result', async () => {
      await h.repository.updateImage(firstImage().id, { resultFileId: 'res-a' });

      const res = await request(h.app)
        .post(`/api/analysis/tasks/${task.id}/images/${firstImage().id}/annotate`)
        .send({ bboxes: [bbox] });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        success: true,
        file_id: 'annotated-1',
        filename: 'a.jpg',
        message: 'Image annotated successfully',
        result_url: '/api/files/annotated-1/view',
      });
      expect(h.annotation.calls).toEqual([
        { fileId: 'orig-a', bboxes: [bbox], projectId: task.id, fileType: 'ANALYSIS_RESULT' },
      ]);
      expect(h.files.deleted).toEqual(['res-a']);

      const updated = await h.repository.getImage(task.id, firstImage().id);
      expect(updated?.resultFileId).toBe('annotated-1');
      expect(updated?.summary?.manual_annotations).toEqual([bbox]);
    });

    it('defaults is_defect to false', async () => {
      await request(h.app)
        .post(`/api/analysis/tasks/${task.id}/images/${firstImage().id}/annotate`)
        .send({ bboxes: [{ x: 0, y: 0, width: 5, height: 5 }] });
      expect(h.annotation.calls[0]?.bboxes).toEqual([{ x: 0, y: 0, width: 5, height: 5, is_defect: false }]);
    });

    it('requires at least one box', async () => {
      const res = await request(h.app)
        .post(`/api/analysis/tasks/${task.id}/images/${firstImage().id}/annotate`)
        .send({ bboxes: [] });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'bboxes: Нужна хотя бы одна рамка' });
      expect(h.annotation.calls).toEqual([]);
    });

    it('rejects a failed annotation result', async () => {
      h.annotation.result = { success: false, file_id: '', filename: '', message: 'bbox out of image' };
      const res = await request(h.app)
        .post(`/api/analysis/tasks/${task.id}/images/${firstImage().id}/annotate`)
        .send({ bboxes: [bbox] });
      expect(res.status).toBe(502);
      expect(res.body).toEqual({ detail: 'bbox out of image' });
    });
  });
});

describe('file routes', () => {
  it('streams a stored file inline or as an attachment', async () => {
    const h = createTestHarness();
    h.files.put('pic-1', 'pixels');

    const view = await request(h.app).get('/api/files/pic-1/view');
    expect(view.status).toBe(200);
    expect(view.headers['content-type']).toBe('image/jpeg');
    expect(view.headers['content-disposition']).toBe(`inline; filename="pic-1.jpg"; filename*=UTF-8''pic-1.jpg`);
    expect(Buffer.from(view.body).toString()).toBe('pixels');

    const download = await request(h.app).get('/api/files/pic-1/download');
    expect(download.headers['content-disposition']?.startsWith('attachment;')).toBe(true);
  });

  it('uploads a file into a project and lists it', async () => {
    const h = createTestHarness();

    const uploaded = await request(h.app)
      .post('/api/files/upload')
      .field('project_id', 'route-7')
      .field('file_type', 'IMAGE')
      .attach('file', Buffer.from('pixels'), { filename: 'tower.jpg', contentType: 'image/jpeg' });

    expect(uploaded.status).toBe(201);
    expect(uploaded.body).toEqual({ id: 'file-1', original_filename: 'tower.jpg', file_type: 'IMAGE', project_id: 'route-7' });
    expect(h.files.stored.get('file-1')?.buffer.toString()).toBe('pixels');

    const listed = await request(h.app).get('/api/files/project/route-7');
    expect(listed.status).toBe(200);
    expect(listed.body).toEqual({
      files: [{ id: 'file-1', original_filename: 'tower.jpg', file_type: 'IMAGE', project_id: 'route-7' }],
      total: 1,
    });
  });

  it('rejects an upload with an unknown file type', async () => {
    const h = createTestHarness();
    const res = await request(h.app)
      .post('/api/files/upload')
      .field('project_id', 'route-7')
      .field('file_type', 'VIDEO')
      .attach('file', Buffer.from('pixels'), { filename: 'tower.jpg', contentType: 'image/jpeg' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      detail: 'file_type: Допустимые типы: IMAGE, ANALYSIS_ORIGINAL, ANALYSIS_PREVIEW, ANALYSIS_RESULT',
    });
    expect(h.files.stored.size).toBe(0);
  });

  it('returns file metadata and deletes the file', async () => {
    const h = createTestHarness();
    h.files.put('pic-1', 'pixels');

    const meta = await request(h.app).get('/api/files/pic-1');
    expect(meta.status).toBe(200);
    expect(meta.body).toEqual({ id: 'pic-1', original_filename: 'pic-1.jpg', content_type: 'image/jpeg', size: 6 });

    const removed = await request(h.app).delete('/api/files/pic-1');
    expect(removed.status).toBe(204);
    expect(h.files.deleted).toEqual(['pic-1']);

    const gone = await request(h.app).get('/api/files/pic-1');
    expect(gone.status).toBe(404);
    expect(gone.body).toEqual({ detail: 'Файл не найден' });
  });

  it('returns 404 for a missing file', async () => {
    const h = createTestHarness();
    const res = await request(h.app).get('/api/files/nope/view');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: 'Файл не найден' });
  });
});
