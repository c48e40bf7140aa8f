import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import { MIN_MONITORING_INTERVAL_SECONDS } from '../domain/entities/Settings.js';
import { formatFailureReason } from '../domain/errors.js';
import type { DriftCheckService } from '../services/DriftCheckService.js';
import type { SettingsService } from '../services/SettingsService.js';
import type { StoreLock } from '../services/StoreLock.js';

export const MONITORING_ERROR_BACKOFF_SECONDS = 60;

export interface MonitoringStatus {
  active: boolean;
  paused: boolean;
  lastCheck: string | null;
  intervalSeconds: number;
  nextCheckAt: string | null;
}

/**
 * MonitoringScheduler - periodic drift checks using node-cron
 * Ticks every second and runs a pass once the configured interval has elapsed.
 * Passes bypass the TaskWorker queue but share its StoreLock
 */
export class MonitoringScheduler {
  private task: ScheduledTask | null = null;
  private isPaused = false;
  private inFlight = false;
  private lastCheck: Date | null = null;
  private nextDueAt: number | null = null;

  constructor(
    private driftCheck: DriftCheckService,
    private settings: SettingsService,
    private lock: StoreLock,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Start ticking; the first pass is due one interval from now
   */
  start(): void {
    if (this.task) return;

    this.nextDueAt = this.now().getTime() + this.intervalSeconds() * 1000;
    this.task = cron.schedule('* * * * * *', async () => {
      await this.tick();
    });

    logger.info('MonitoringScheduler started', { intervalSeconds: this.intervalSeconds() });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.nextDueAt = null;
      logger.info('MonitoringScheduler stopped');
    }
  }

  pause(): void {
    this.isPaused = true;
    logger.info('MonitoringScheduler paused');
  }

  resume(): void {
    this.isPaused = false;
    logger.info('MonitoringScheduler resumed');
  }

  isActive(): boolean {
    return this.task !== null;
  }

  status(): MonitoringStatus {
    return {
      active: this.task !== null,
      paused: this.isPaused,
      lastCheck: this.lastCheck?.toISOString() ?? null,
      intervalSeconds: this.intervalSeconds(),
      nextCheckAt: this.nextDueAt === null ? null : new Date(this.nextDueAt).toISOString(),
    };
  }

  /**
   * One timer tick. Returns true when a pass ran
   */
  async tick(): Promise<boolean> {
    if (!this.task || this.isPaused || this.inFlight) return false;
    if (this.nextDueAt === null || this.now().getTime() < this.nextDueAt) return false;

    this.inFlight = true;
    try {
      await this.runPass();
      this.reschedule(this.intervalSeconds());
    } catch (error) {
      logger.error('Monitoring pass failed', { error: formatFailureReason(error) });
      this.reschedule(MONITORING_ERROR_BACKOFF_SECONDS);
    } finally {
      this.inFlight = false;
    }
    return true;
  }

  private async runPass(): Promise<void> {
    const { drift, saved } = await this.lock.runExclusive(() =>
      this.driftCheck.check({ saveOnChange: true, saveOnFirstRun: true })
    );
    this.lastCheck = this.now();

    if (drift.status === 'changed') {
      logger.warn('Hardware fingerprint changed', {
        previous: drift.baselineHash,
        current: drift.fingerprint.hash,
        saved,
      });
    } else {
      logger.debug('Monitoring pass completed', { status: drift.status, saved });
    }
  }

  // stop() during a pass leaves nothing scheduled
  private reschedule(delaySeconds: number): void {
    if (!this.task) return;
    this.nextDueAt = this.now().getTime() + delaySeconds * 1000;
  }

  private intervalSeconds(): number {
    return Math.max(MIN_MONITORING_INTERVAL_SECONDS, this.settings.get('monitoringIntervalSeconds'));
  }
}
