import { EventEmitter } from 'node:events';
import type { Task, TaskStatus } from '../domain/entities/Task.js';

export type TaskEventPayload = {
  task: Task;
  status: TaskStatus;
  stage: string | null;
  errorMessage: string | null;
  timestamp: string;
};

type TaskListener = (payload: TaskEventPayload) => void;

export class TaskEventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  onTask(listener: TaskListener): void {
    this.emitter.on('task', listener);
  }

  offTask(listener: TaskListener): void {
    this.emitter.off('task', listener);
  }

  emitTask(payload: TaskEventPayload): void {
    this.emitter.emit('task', payload);
  }
}
