import type { HardwareCollector } from '../infra/collectors/HardwareCollector.js';
import type { DriftResult } from '../domain/entities/Report.js';
import type { Snapshot } from '../domain/entities/Snapshot.js';
import type { ReportStore } from './ReportStore.js';
import type { SettingsService } from './SettingsService.js';
import type { StatsTracker } from './StatsTracker.js';
import { CollectionError } from '../domain/errors.js';

export interface DriftCheckPolicy {
  saveOnChange: boolean;
  saveOnFirstRun: boolean;
}

export interface DriftCheckOutcome {
  snapshot: Snapshot;
  drift: DriftResult;
  saved: boolean;
}

/**
 * DriftCheckService - collect, compare, record stats, conditionally save
 * Shared by the TaskWorker and the MonitoringScheduler; callers hold StoreLock
 */
export class DriftCheckService {
  constructor(
    private collector: HardwareCollector,
    private reportStore: ReportStore,
    private statsTracker: StatsTracker,
    private settings: SettingsService
  ) {}

  async check(policy: DriftCheckPolicy): Promise<DriftCheckOutcome> {
    const snapshot = await this.collector.collect();
    if (!snapshot) {
      throw new CollectionError('Failed to collect hardware data for comparison');
    }

    const drift = this.reportStore.compare(snapshot);

    if (this.settings.get('statsTracking')) {
      this.statsTracker.recordCheck(drift.fingerprint.hash, drift.status === 'changed');
    }

    const shouldSave =
      (drift.status === 'changed' && policy.saveOnChange) ||
      (drift.status === 'no_baseline' && policy.saveOnFirstRun);
    const saved = shouldSave ? this.reportStore.save(snapshot) : false;

    return { snapshot, drift, saved };
  }
}
