import { describe, expect, it } from 'vitest';
import type { TaskProgressMessage } from '../types';
import { AnalysisQueue, type TaskProcessor } from './analysis-queue';
import { TaskEvents } from './task-events';
import { InMemoryTaskRepository } from './task-repository';

async function newTask(repo: InMemoryTaskRepository) {
  return repo.createTask({ routeName: null, totalFiles: 1, totalBytes: 1, confidenceThreshold: 0.35, previewLimit: 1 });
}

describe('AnalysisQueue', () => {
  it('runs tasks one at a time in order', async () => {
    const repo = new InMemoryTaskRepository();
    const order: string[] = [];
    let active = 0;
    let maxActive = 0;

    const processor: TaskProcessor = {
      async process(taskId) {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        order.push(taskId);
        active -= 1;
      },
    };
    const queue = new AnalysisQueue(processor, repo, new TaskEvents());

    queue.enqueue('t1');
    queue.enqueue('t2');
    queue.enqueue('t3');
    await queue.idle();

    expect(order).toEqual(['t1', 't2', 't3']);
    expect(maxActive).toBe(1);
    expect(queue.size()).toBe(0);
  });

  it('marks the task failed when processing throws', async () => {
    const repo = new InMemoryTaskRepository();
    const events = new TaskEvents();
    const seen: TaskProgressMessage[] = [];
    events.subscribe((m) => seen.push(m));
    const task = await newTask(repo);

    const queue = new AnalysisQueue(
      {
        async process() {
          throw new Error('files service is down');
        },
      },
      repo,
      events,
    );
    queue.enqueue(task.id);
    await queue.idle();

    const failed = await repo.getTask(task.id);
    expect(failed?.status).toBe('failed');
    expect(failed?.message).toBe('files service is down');
    expect(seen.map((m) => m.status)).toEqual(['failed']);
  });

  it('refuses work after stop', async () => {
    const queue = new AnalysisQueue({ process: async () => undefined }, new InMemoryTaskRepository(), new TaskEvents());
    await queue.stop();
    expect(() => queue.enqueue('late')).toThrow('Очередь остановлена');
  });
});
