import type { TaskResult } from '../domain/entities/Task.js';
import { NotFoundError, ValidationError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

type Waiter = (result: TaskResult) => void;

type Slot = {
  result: TaskResult | null;
  waiters: Waiter[];
  settledAt: number | null;
};

/**
 * TaskResultRegistry - one single-assignment completion slot per submitted task id
 * A result stays in its slot until a poll claims it or it outlives the TTL
 */
export class TaskResultRegistry {
  private slots = new Map<string, Slot>();

  register(taskId: string): void {
    if (this.slots.has(taskId)) {
      throw new ValidationError(`Task id ${taskId} is already in use`, { taskId });
    }
    this.slots.set(taskId, { result: null, waiters: [], settledAt: null });
  }

  has(taskId: string): boolean {
    return this.slots.has(taskId);
  }

  settle(result: TaskResult): void {
    const slot = this.slots.get(result.id);
    if (!slot) {
      logger.debug('Dropping result for unregistered task', { taskId: result.id });
      return;
    }
    if (slot.result) {
      logger.warn('Ignoring second result for task', { taskId: result.id });
      return;
    }

    if (slot.waiters.length > 0) {
      this.slots.delete(result.id);
      slot.waiters.forEach((waiter) => waiter(result));
      return;
    }

    slot.result = result;
    slot.settledAt = Date.now();
  }

  /**
   * Resolves with the result, or null when timeoutMs passes first.
   * A timed-out wait leaves the slot in place for a later poll
   */
  wait(taskId: string, timeoutMs: number): Promise<TaskResult | null> {
    const slot = this.slots.get(taskId);
    if (!slot) {
      return Promise.reject(new NotFoundError('Task', taskId));
    }

    if (slot.result) {
      this.slots.delete(taskId);
      return Promise.resolve(slot.result);
    }

    if (timeoutMs <= 0) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      const waiter: Waiter = (result) => {
        clearTimeout(timer);
        resolve(result);
      };
      const timer = setTimeout(() => {
        slot.waiters = slot.waiters.filter((candidate) => candidate !== waiter);
        resolve(null);
      }, timeoutMs);
      slot.waiters.push(waiter);
    });
  }

  /**
   * Drops unclaimed results settled before the cutoff
   */
  pruneSettledBefore(cutoff: Date): number {
    let pruned = 0;
    for (const [taskId, slot] of this.slots) {
      if (slot.settledAt !== null && slot.settledAt < cutoff.getTime()) {
        this.slots.delete(taskId);
        pruned += 1;
      }
    }
    if (pruned > 0) {
      logger.info('Pruned unclaimed task results', { pruned });
    }
    return pruned;
  }

  pendingCount(): number {
    let pending = 0;
    for (const slot of this.slots.values()) {
      if (!slot.result) pending += 1;
    }
    return pending;
  }
}
