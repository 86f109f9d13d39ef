import { EventEmitter } from 'node:events';
import type { AnalysisTask, TaskProgressMessage } from '../types';

type Listener = (message: TaskProgressMessage) => void;

const EVENT = 'progress';

export function toProgressMessage(task: AnalysisTask, message?: string | null): TaskProgressMessage {
  return {
    task_id: task.id,
    status: task.status,
    processed_files: task.processedFiles,
    total_files: task.totalFiles,
    failed_files: task.failedFiles,
    defects_found: task.defectsFound,
    message: message !== undefined ? message : task.message,
  };
}

/** Шина прогресса задач: воркер публикует, WebSocket-хаб раздаёт. */
export class TaskEvents {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  publish(message: TaskProgressMessage): void {
    this.emitter.emit(EVENT, message);
  }

  publishTask(task: AnalysisTask, message?: string | null): void {
    this.publish(toProgressMessage(task, message));
  }

  publishRemoval(task: AnalysisTask): void {
    this.publish({ ...toProgressMessage(task, 'Задача удалена'), deleted: true });
  }

  subscribe(listener: Listener): () => void {
    this.emitter.on(EVENT, listener);
    return () => {
      this.emitter.off(EVENT, listener);
    };
  }
}
