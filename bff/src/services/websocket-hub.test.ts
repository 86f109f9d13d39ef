import { createServer, type Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { WebSocket } from 'ws';
import type { TaskProgressMessage } from '../types';
import { TaskEvents } from './task-events';
import { InMemoryTaskRepository } from './task-repository';
import { POLICY_VIOLATION, TaskSocketHub } from './websocket-hub';

function progress(taskId: string, processed: number): TaskProgressMessage {
  return {
    task_id: taskId,
    status: 'processing',
    processed_files: processed,
    total_files: 5,
    failed_files: 0,
    defects_found: 0,
    message: `Обработано ${processed} из 5`,
  };
}

function nextMessage(ws: WebSocket): Promise<string> {
  return new Promise((resolve, reject) => {
    ws.once('message', (data) => resolve(data.toString()));
    ws.once('error', reject);
  });
}

function opened(ws: WebSocket): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.once('open', () => resolve());
    ws.once('error', reject);
  });
}

describe('TaskSocketHub', () => {
  let server: Server;
  let hub: TaskSocketHub;
  let events: TaskEvents;
  let repository: InMemoryTaskRepository;
  let base: string;
  const sockets: WebSocket[] = [];

  const connect = (path: string) => {
    const ws = new WebSocket(`${base}${path}`);
    sockets.push(ws);
    return ws;
  };

  beforeEach(async () => {
    server = createServer();
    events = new TaskEvents();
    repository = new InMemoryTaskRepository();
    hub = new TaskSocketHub(events, repository, '/api');
    hub.attach(server);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a port');
    base = `ws://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    for (const ws of sockets.splice(0)) ws.terminate();
    await hub.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('closes a socket with an invalid task id using 1008', async () => {
    const ws = connect('/api/ws/tasks/not-a-uuid');
    const code = await new Promise<number>((resolve) => ws.once('close', (c) => resolve(c)));
    expect(code).toBe(POLICY_VIOLATION);
  });

  it('refuses a broken percent-escape in the task id and keeps serving', async () => {
    const broken = connect('/api/ws/tasks/%E0%A4%A');
    const code = await new Promise<number>((resolve) => broken.once('close', (c) => resolve(c)));
    expect(code).toBe(POLICY_VIOLATION);

    const next = connect('/api/ws/history');
    await opened(next);
    expect(hub.connectionCount()).toBe(1);
  });

  it('decodes an escaped task id before validating it', async () => {
    const task = await repository.createTask({
      routeName: null,
      totalFiles: 1,
      totalBytes: 0,
      confidenceThreshold: 0.35,
      previewLimit: 1,
    });
    const ws = connect(`/api/ws/tasks/${task.id.replace(/-/g, '%2D')}`);
    const snapshot = nextMessage(ws);
    await opened(ws);
    expect(JSON.parse(await snapshot).task_id).toBe(task.id);
  });

  it('sends the current state, then only this task updates', async () => {
    const task = await repository.createTask({
      routeName: null,
      totalFiles: 5,
      totalBytes: 0,
      confidenceThreshold: 0.35,
      previewLimit: 1,
      message: 'В очереди',
    });
    const ws = connect(`/api/ws/tasks/${task.id}`);
    const snapshot = nextMessage(ws);
    await opened(ws);

    expect(JSON.parse(await snapshot)).toEqual({
      task_id: task.id,
      status: 'queued',
      processed_files: 0,
      total_files: 5,
      failed_files: 0,
      defects_found: 0,
      message: 'В очереди',
    });

    const update = nextMessage(ws);
    events.publish(progress('11111111-1111-4111-8111-111111111111', 1));
    events.publish(progress(task.id, 2));
    expect(JSON.parse(await update)).toEqual(progress(task.id, 2));
  });

  it('fans every task out to history subscribers', async () => {
    const ws = connect('/api/ws/history');
    await opened(ws);

    const first = nextMessage(ws);
    events.publish(progress('22222222-2222-4222-8222-222222222222', 3));
    expect(JSON.parse(await first).processed_files).toBe(3);
    expect(hub.connectionCount()).toBe(1);
  });

  it('answers ping with pong', async () => {
    const ws = connect('/api/ws/history');
    await opened(ws);
    const reply = nextMessage(ws);
    ws.send('ping');
    expect(await reply).toBe('pong');
  });

  it('rejects unknown paths', async () => {
    const ws = connect('/api/ws/unknown');
    const status = await new Promise<number | undefined>((resolve) => {
      ws.once('unexpected-response', (_req, res) => resolve(res.statusCode));
      ws.once('error', () => resolve(undefined));
    });
    expect(status).toBe(404);
  });
});
