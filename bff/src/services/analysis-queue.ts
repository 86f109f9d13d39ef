import { createLogger } from '../logger';
import type { TaskEvents } from './task-events';
import type { TaskRepository } from './task-repository';
import { isFinalStatus } from './task-state';

const log = createLogger('Queue');

export interface TaskProcessor {
  process(taskId: string): Promise<void>;
}

/**
 * Очередь задач анализа в процессе BFF.
 * Задачи выполняются строго по одной в порядке постановки.
 */
export class AnalysisQueue {
  private pending: string[] = [];
  private running: Promise<void> | null = null;
  private stopped = false;

  constructor(
    private processor: TaskProcessor,
    private repository: TaskRepository,
    private events: TaskEvents,
  ) {}

  enqueue(taskId: string): void {
    if (this.stopped) throw new Error('Очередь остановлена');
    this.pending.push(taskId);
    log.info(`task ${taskId} queued (${this.pending.length} pending)`);
    if (!this.running) this.running = this.drain();
  }

  size(): number {
    return this.pending.length;
  }

  /** Ждёт, пока очередь опустеет. */
  async idle(): Promise<void> {
    while (this.running) await this.running;
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.pending = [];
    await this.idle();
  }

  private async drain(): Promise<void> {
    try {
      for (let taskId = this.pending.shift(); taskId; taskId = this.pending.shift()) {
        await this.runOne(taskId);
      }
    } finally {
      this.running = null;
    }
  }

  private async runOne(taskId: string): Promise<void> {
    try {
      await this.processor.process(taskId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error(`task ${taskId} crashed: ${message}`);
      await this.markFailed(taskId, message);
    }
  }

  private async markFailed(taskId: string, message: string): Promise<void> {
    try {
      const task = await this.repository.getTask(taskId);
      if (!task || isFinalStatus(task.status)) return;
      const failed = await this.repository.updateTaskProgress(taskId, { status: 'failed', message });
      if (failed) this.events.publishTask(failed);
    } catch (error) {
      log.error(`could not mark task ${taskId} as failed`, error);
    }
  }
}
