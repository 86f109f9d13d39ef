import { describe, expect, it } from 'vitest';
import { InMemoryTaskRepository } from './task-repository';

const fixedClock = () => new Date('2024-05-01T10:00:00Z');

async function seed(repo: InMemoryTaskRepository, files = 3) {
  const task = await repo.createTask({
    routeName: 'ВЛ 110 кВ',
    totalFiles: files,
    totalBytes: files * 100,
    confidenceThreshold: 0.35,
    previewLimit: 2,
  });
  const images = await repo.addImages(
    task.id,
    Array.from({ length: files }, (_, i) => ({ fileId: `orig-${i}`, fileName: `img_${i}.jpg`, fileSize: 100 })),
  );
  return { task, images };
}

describe('InMemoryTaskRepository', () => {
  it('lists tasks newest first even within one millisecond', async () => {
    const repo = new InMemoryTaskRepository(fixedClock);
    const first = await repo.createTask({ routeName: null, totalFiles: 0, totalBytes: 0, confidenceThreshold: 0.3, previewLimit: 1 });
    const second = await repo.createTask({ routeName: null, totalFiles: 0, totalBytes: 0, confidenceThreshold: 0.3, previewLimit: 1 });

    const list = await repo.listTasks(10);
    expect(list.map((t) => t.id)).toEqual([second.id, first.id]);
    expect(await repo.listTasks(1)).toHaveLength(1);
  });

  it('pages images in upload order and filters previews', async () => {
    const repo = new InMemoryTaskRepository(fixedClock);
    const { task, images } = await seed(repo);
    await repo.updateImage(images[2]?.id ?? '', { isPreview: true, resultFileId: 'prev-2' });

    const page = await repo.listImages(task.id, { skip: 1, limit: 1 });
    expect(page.total).toBe(3);
    expect(page.images.map((i) => i.fileName)).toEqual(['img_1.jpg']);

    const previews = await repo.listImages(task.id, { skip: 0, limit: 10, previewOnly: true });
    expect(previews.total).toBe(1);
    expect(previews.images[0]?.resultFileId).toBe('prev-2');
  });

  it('only finds an image through its own task', async () => {
    const repo = new InMemoryTaskRepository(fixedClock);
    const a = await seed(repo, 1);
    const b = await seed(repo, 1);
    const imageOfA = a.images[0]?.id ?? '';

    expect(await repo.getImage(a.task.id, imageOfA)).not.toBeNull();
    expect(await repo.getImage(b.task.id, imageOfA)).toBeNull();
  });

  it('adjusts counters when a completed image is deleted', async () => {
    const repo = new InMemoryTaskRepository(fixedClock);
    const { task, images } = await seed(repo);
    const [done, pending] = images;
    if (!done || !pending) throw new Error('seed failed');

    await repo.updateTaskProgress(task.id, { status: 'processing', processedFiles: 1 });
    await repo.updateImage(done.id, { status: 'completed', resultFileId: 'res-0' });

    expect(await repo.deleteImage(task.id, done.id)).toEqual(['orig-0', 'res-0']);
    let current = await repo.getTask(task.id);
    expect(current?.totalFiles).toBe(2);
    expect(current?.processedFiles).toBe(0);

    expect(await repo.deleteImage(task.id, pending.id)).toEqual(['orig-1']);
    current = await repo.getTask(task.id);
    expect(current?.totalFiles).toBe(1);
    expect(current?.processedFiles).toBe(0);
  });

  it('adjusts failed counter when a failed image is deleted', async () => {
    const repo = new InMemoryTaskRepository(fixedClock);
    const { task, images } = await seed(repo, 2);
    const [ok, broken] = images;
    if (!ok || !broken) throw new Error('seed failed');

    await repo.updateTaskProgress(task.id, { status: 'processing', processedFiles: 1, failedFiles: 1 });
    await repo.updateTaskProgress(task.id, { status: 'failed' });
    await repo.updateImage(ok.id, { status: 'completed' });
    await repo.updateImage(broken.id, { status: 'failed', errorMessage: 'model down' });

    expect(await repo.deleteImage(task.id, broken.id)).toEqual(['orig-1']);
    const current = await repo.getTask(task.id);
    expect(current?.totalFiles).toBe(1);
    expect(current?.processedFiles).toBe(1);
    expect(current?.failedFiles).toBe(0);
  });

  it('deletes a task with its images and reports every file', async () => {
    const repo = new InMemoryTaskRepository(fixedClock);
    const { task, images } = await seed(repo, 2);
    await repo.updateImage(images[1]?.id ?? '', { resultFileId: 'res-1' });

    expect(await repo.deleteTask(task.id)).toEqual(['orig-0', 'orig-1', 'res-1']);
    expect(await repo.getTask(task.id)).toBeNull();
    expect((await repo.listImages(task.id, { skip: 0, limit: 10 })).total).toBe(0);
    expect(await repo.deleteTask(task.id)).toBeNull();
  });

  it('returns null for unknown rows', async () => {
    const repo = new InMemoryTaskRepository(fixedClock);
    expect(await repo.updateTaskProgress('missing', { message: 'x' })).toBeNull();
    expect(await repo.updateImage('missing', { status: 'failed' })).toBeNull();
  });
});
