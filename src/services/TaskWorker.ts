import type { HardwareCollector } from '../infra/collectors/HardwareCollector.js';
import {
  createTask,
  isTaskKind,
  taskFailed,
  taskSucceeded,
  type BanCurrentPayload,
  type CollectPayload,
  type ComparePayload,
  type StatsPayload,
  type Task,
  type TaskPayload,
  type TaskResult,
  type TaskStatus,
} from '../domain/entities/Task.js';
import {
  CollectionError,
  PersistenceError,
  UnknownTaskKindError,
  formatFailureReason,
} from '../domain/errors.js';
import type { AntiCheatService } from './AntiCheatService.js';
import type { BanRegistry } from './BanRegistry.js';
import type { DriftCheckService } from './DriftCheckService.js';
import type { ReportStore } from './ReportStore.js';
import type { SettingsService } from './SettingsService.js';
import type { StatsTracker } from './StatsTracker.js';
import type { StoreLock } from './StoreLock.js';
import type { TaskEventBus } from './TaskEventBus.js';
import type { TaskResultRegistry } from './TaskResultRegistry.js';
import { logger } from '../infra/logger.js';

export interface TaskWorkerDeps {
  collector: HardwareCollector;
  reportStore: ReportStore;
  driftCheck: DriftCheckService;
  statsTracker: StatsTracker;
  banRegistry: BanRegistry;
  antiCheat: AntiCheatService;
  settings: SettingsService;
  lock: StoreLock;
  results: TaskResultRegistry;
  events: TaskEventBus;
}

export interface TaskProgress {
  working: boolean;
  taskId: string | null;
  kind: string | null;
  stage: string | null;
  queued: number;
}

type WorkerState = 'idle' | 'running' | 'stopped';

/**
 * TaskWorker - single FIFO execution context for fingerprint-affecting tasks
 * One task runs at a time; every submitted task gets exactly one result
 */
export class TaskWorker {
  private queue: Task[] = [];
  private state: WorkerState = 'idle';
  private draining = false;
  private current: { task: Task; stage: string | null } | null = null;

  constructor(private deps: TaskWorkerDeps) {}

  start(): void {
    if (this.state === 'running') return;
    if (this.state === 'stopped') {
      logger.warn('Restarting stopped task worker');
    }
    this.state = 'running';
    logger.info('Task worker started', { queued: this.queue.length });
    this.scheduleDrain();
  }

  /**
   * Cooperative: an in-flight handler finishes, queued tasks fail with "worker stopped"
   */
  stop(): void {
    if (this.state === 'stopped') return;
    this.state = 'stopped';

    const abandoned = this.queue.splice(0);
    for (const task of abandoned) {
      this.finish(task, taskFailed(task, 'worker stopped'));
    }
    logger.info('Task worker stopped', { abandoned: abandoned.length });
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  /**
   * Non-blocking: enqueues and returns the task id immediately
   */
  submit(kind: string, id?: string): string {
    const task = createTask({ kind, id });
    this.deps.results.register(task.id);

    if (this.state === 'stopped') {
      this.finish(task, taskFailed(task, 'worker stopped'));
      return task.id;
    }

    this.queue.push(task);
    this.emit(task, 'queued');
    logger.debug('Task submitted', { taskId: task.id, kind: task.kind });
    this.scheduleDrain();
    return task.id;
  }

  poll(taskId: string, timeoutMs: number): Promise<TaskResult | null> {
    return this.deps.results.wait(taskId, timeoutMs);
  }

  getProgress(): TaskProgress {
    return {
      working: this.current !== null,
      taskId: this.current?.task.id ?? null,
      kind: this.current?.task.kind ?? null,
      stage: this.current?.stage ?? null,
      queued: this.queue.length,
    };
  }

  private scheduleDrain(): void {
    if (this.state !== 'running' || this.draining) return;
    this.draining = true;

    setImmediate(async () => {
      try {
        await this.drain();
      } catch (error) {
        logger.error('Task worker loop failed', { error: formatFailureReason(error) });
      } finally {
        this.draining = false;
      }
      if (this.queue.length > 0) {
        this.scheduleDrain();
      }
    });
  }

  private async drain(): Promise<void> {
    while (this.state === 'running') {
      const task = this.queue.shift();
      if (!task) return;
      await this.execute(task);
    }
  }

  private async execute(task: Task): Promise<void> {
    this.current = { task, stage: null };
    this.emit(task, 'running');

    let result: TaskResult;
    try {
      const payload = await this.dispatch(task);
      result = taskSucceeded(task, payload);
    } catch (error) {
      const reason = formatFailureReason(error);
      logger.error('Task execution failed', { taskId: task.id, kind: task.kind, error: reason });
      result = taskFailed(task, reason);
    } finally {
      this.current = null;
    }

    this.finish(task, result);
  }

  private finish(task: Task, result: TaskResult): void {
    this.deps.results.settle(result);
    if (result.status === 'success') {
      this.emit(task, 'succeeded');
    } else {
      this.emit(task, 'failed', result.errorMessage);
    }
  }

  private dispatch(task: Task): Promise<TaskPayload> {
    if (!isTaskKind(task.kind)) {
      throw new UnknownTaskKindError(task.kind);
    }

    const { lock, antiCheat } = this.deps;
    switch (task.kind) {
      case 'collect':
        return lock.runExclusive(() => this.handleCollect());
      case 'compareOnly':
        return lock.runExclusive(() => this.handleCompare());
      case 'banCurrent':
        return lock.runExclusive(() => this.handleBanCurrent());
      case 'runAntiCheatCheck':
        return lock.runExclusive(() => antiCheat.run((stage) => this.setStage(stage)));
      case 'fetchStats':
        return lock.runExclusive(() => this.handleFetchStats());
    }
  }

  private async handleCollect(): Promise<CollectPayload> {
    const { collector, reportStore, settings } = this.deps;

    this.setStage('collecting');
    const snapshot = await collector.collect();
    if (!snapshot) {
      throw new CollectionError('Failed to collect hardware data');
    }

    const fingerprint = reportStore.generateFingerprint(snapshot);
    let saved = false;
    if (fingerprint.status === 'valid' && settings.get('autoSaveReports')) {
      this.setStage('saving');
      saved = reportStore.save(snapshot);
    }

    return { snapshot, fingerprint, saved };
  }

  private async handleCompare(): Promise<ComparePayload> {
    this.setStage('comparing');
    const { drift, saved } = await this.deps.driftCheck.check({
      saveOnChange: false,
      saveOnFirstRun: this.deps.settings.get('autoSaveReports'),
    });

    return {
      status: drift.status,
      message: drift.message,
      fingerprint: drift.fingerprint,
      baselineHash: drift.status === 'no_baseline' ? null : drift.baselineHash,
      saved,
    };
  }

  private async handleBanCurrent(): Promise<BanCurrentPayload> {
    const { collector, reportStore, banRegistry } = this.deps;

    this.setStage('collecting');
    const snapshot = await collector.collect();
    if (!snapshot) {
      throw new CollectionError('Failed to collect current hardware data');
    }

    const fingerprint = reportStore.generateFingerprint(snapshot);
    if (fingerprint.status === 'invalid') {
      throw new CollectionError('No identifying hardware fields were collected');
    }

    this.setStage('saving');
    if (!reportStore.save(snapshot)) {
      throw new PersistenceError('Failed to save report');
    }

    this.setStage('banning');
    const outcome = banRegistry.ban(fingerprint.hash);
    return { fingerprint, banned: outcome.ok, message: outcome.message };
  }

  private async handleFetchStats(): Promise<StatsPayload> {
    const { statsTracker, settings } = this.deps;
    return {
      trackingEnabled: settings.get('statsTracking'),
      stats: statsTracker.getStats(),
      changeFrequency: statsTracker.changeFrequency(),
      changeRate: statsTracker.changeRate(),
      monthlySummary: statsTracker.monthlySummary(),
    };
  }

  private setStage(stage: string): void {
    if (!this.current) return;
    this.current.stage = stage;
    this.emit(this.current.task, 'running');
  }

  private emit(task: Task, status: TaskStatus, errorMessage: string | null = null): void {
    this.deps.events.emitTask({
      task,
      status,
      stage: this.current?.task.id === task.id ? this.current.stage : null,
      errorMessage,
      timestamp: new Date().toISOString(),
    });
  }
}
