import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocket, WebSocketServer } from 'ws';
import { validate as isUuid } from 'uuid';
import { createLogger } from '../logger';
import type { TaskProgressMessage } from '../types';
import type { TaskRepository } from './task-repository';
import { toProgressMessage, type TaskEvents } from './task-events';

const log = createLogger('WS');

export const POLICY_VIOLATION = 1008;

type Route = { kind: 'task'; taskId: string } | { kind: 'history' } | null;

/** Битое %-кодирование оставляем как есть: такой id не пройдёт проверку UUID. */
function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export class TaskSocketHub {
  private wss = new WebSocketServer({ noServer: true });
  private byTask = new Map<string, Set<WebSocket>>();
  private history = new Set<WebSocket>();
  private unsubscribe: (() => void) | null = null;
  private server: Server | null = null;
  private upgradeListener = (req: IncomingMessage, socket: Duplex, head: Buffer) => this.onUpgrade(req, socket, head);

  constructor(
    private events: TaskEvents,
    private repository: TaskRepository,
    private prefix: string,
  ) {}

  attach(server: Server): void {
    this.server = server;
    server.on('upgrade', this.upgradeListener);
    this.unsubscribe = this.events.subscribe((message) => this.broadcast(message));
  }

  private route(url: string | undefined): Route {
    const path = (url ?? '').split('?')[0] ?? '';
    if (path === `${this.prefix}/ws/history`) return { kind: 'history' };
    const taskPrefix = `${this.prefix}/ws/tasks/`;
    if (path.startsWith(taskPrefix)) {
      const taskId = safeDecode(path.slice(taskPrefix.length));
      if (taskId && !taskId.includes('/')) return { kind: 'task', taskId };
    }
    return null;
  }

  private onUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const route = this.route(req.url);
    if (!route) {
      socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }

    this.wss.handleUpgrade(req, socket, head, (ws) => {
      if (route.kind === 'history') {
        this.addSocket(this.history, ws);
        return;
      }
      if (!isUuid(route.taskId)) {
        ws.close(POLICY_VIOLATION, 'Invalid task id');
        return;
      }
      let set = this.byTask.get(route.taskId);
      if (!set) {
        set = new Set();
        this.byTask.set(route.taskId, set);
      }
      this.addSocket(set, ws, route.taskId);
      void this.sendSnapshot(ws, route.taskId);
    });
  }

  private addSocket(set: Set<WebSocket>, ws: WebSocket, taskId?: string): void {
    set.add(ws);
    ws.on('message', (data) => {
      if (data.toString() === 'ping' && ws.readyState === WebSocket.OPEN) ws.send('pong');
    });
    ws.on('close', () => {
      set.delete(ws);
      if (taskId && set.size === 0) this.byTask.delete(taskId);
    });
    ws.on('error', (error) => log.warn('socket error', error.message));
  }

  private async sendSnapshot(ws: WebSocket, taskId: string): Promise<void> {
    try {
      const task = await this.repository.getTask(taskId);
      if (task && ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(toProgressMessage(task)));
    } catch (error) {
      log.warn(`snapshot for ${taskId} failed`, error);
    }
  }

  private send(set: Set<WebSocket> | undefined, payload: string): void {
    if (!set) return;
    for (const ws of set) {
      if (ws.readyState !== WebSocket.OPEN) {
        set.delete(ws);
        continue;
      }
      ws.send(payload);
    }
  }

  broadcast(message: TaskProgressMessage): void {
    const payload = JSON.stringify(message);
    this.send(this.byTask.get(message.task_id), payload);
    this.send(this.history, payload);
  }

  connectionCount(): number {
    let total = this.history.size;
    for (const set of this.byTask.values()) total += set.size;
    return total;
  }

  async close(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.server?.off('upgrade', this.upgradeListener);
    for (const ws of this.wss.clients) ws.terminate();
    this.byTask.clear();
    this.history.clear();
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
  }
}
