import type { HistoryReport, Report } from '../domain/entities/Report.js';
import type { Settings } from '../domain/entities/Settings.js';
import type { TaskResult } from '../domain/entities/Task.js';
import type { BanEntry } from '../infra/repositories/BanRepository.js';
import type { MonitoringScheduler, MonitoringStatus } from '../scheduler/MonitoringScheduler.js';
import type { BanOutcome, BanRegistry } from './BanRegistry.js';
import type { ReportStore } from './ReportStore.js';
import type { SettingsService } from './SettingsService.js';
import type { StoreLock } from './StoreLock.js';
import type { TaskProgress, TaskWorker } from './TaskWorker.js';
import { logger } from '../infra/logger.js';

export type SettingsView = Settings & { bannedFingerprints: string[] };

/**
 * SentinelService - caller-facing surface over the worker, scheduler and stores
 */
export class SentinelService {
  private started = false;

  constructor(
    private worker: TaskWorker,
    private scheduler: MonitoringScheduler,
    private reportStore: ReportStore,
    private banRegistry: BanRegistry,
    private settings: SettingsService,
    private lock: StoreLock
  ) {}

  /**
   * Starts the worker, then background monitoring and the startup comparison when enabled
   */
  start(): void {
    if (this.started) return;
    this.started = true;

    this.settings.ensureDefaults();
    this.worker.start();

    const { backgroundMonitoring, compareOnStartup } = this.settings.getSettings();
    if (backgroundMonitoring) {
      this.scheduler.start();
    }
    if (compareOnStartup) {
      const taskId = this.worker.submit('compareOnly');
      logger.info('Startup comparison submitted', { taskId });
    }

    logger.info('Sentinel started', { backgroundMonitoring, compareOnStartup });
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;
    this.scheduler.stop();
    this.worker.stop();
    logger.info('Sentinel stopped');
  }

  submit(kind: string, id?: string): string {
    return this.worker.submit(kind, id);
  }

  poll(taskId: string, timeoutMs: number): Promise<TaskResult | null> {
    return this.worker.poll(taskId, timeoutMs);
  }

  getProgress(): TaskProgress {
    return this.worker.getProgress();
  }

  isBanned(fingerprint: string): boolean {
    return this.banRegistry.isBanned(fingerprint);
  }

  ban(fingerprint: string): Promise<BanOutcome> {
    return this.lock.runExclusive(() => this.banRegistry.ban(fingerprint));
  }

  unban(fingerprint: string): Promise<BanOutcome> {
    return this.lock.runExclusive(() => this.banRegistry.unban(fingerprint));
  }

  clearAllBans(): Promise<number> {
    return this.lock.runExclusive(() => this.banRegistry.clearAll());
  }

  listBans(): BanEntry[] {
    return this.banRegistry.list();
  }

  monitoringStatus(): MonitoringStatus {
    return this.scheduler.status();
  }

  startMonitoring(): MonitoringStatus {
    this.settings.updateSettings({ backgroundMonitoring: true });
    this.scheduler.start();
    return this.scheduler.status();
  }

  stopMonitoring(): MonitoringStatus {
    this.settings.updateSettings({ backgroundMonitoring: false });
    this.scheduler.stop();
    return this.scheduler.status();
  }

  pauseMonitoring(): MonitoringStatus {
    this.scheduler.pause();
    return this.scheduler.status();
  }

  resumeMonitoring(): MonitoringStatus {
    this.scheduler.resume();
    return this.scheduler.status();
  }

  getSettings(): SettingsView {
    return {
      ...this.settings.getSettings(),
      bannedFingerprints: this.banRegistry.list().map((entry) => entry.fingerprint),
    };
  }

  /**
   * Applies a partial update; flipping backgroundMonitoring starts or stops the scheduler
   */
  updateSettings(patch: unknown): SettingsView {
    const updated = this.settings.updateSettings(patch);

    if (updated.backgroundMonitoring && !this.scheduler.isActive()) {
      this.scheduler.start();
    } else if (!updated.backgroundMonitoring && this.scheduler.isActive()) {
      this.scheduler.stop();
    }

    return this.getSettings();
  }

  loadCurrentReport(): Report | null {
    return this.reportStore.loadCurrent();
  }

  listReportHistory(limit?: number): HistoryReport[] {
    return this.reportStore.listHistory(limit);
  }
}
