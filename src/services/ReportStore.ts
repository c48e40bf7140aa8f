import type { ReportRepository } from '../infra/repositories/ReportRepository.js';
import type { SettingsService } from './SettingsService.js';
import type { Fingerprint } from '../domain/entities/Fingerprint.js';
import {
  createReport,
  DRIFT_MESSAGES,
  type DriftResult,
  type HistoryReport,
  type Report,
} from '../domain/entities/Report.js';
import type { Snapshot } from '../domain/entities/Snapshot.js';
import { CollectionError, PersistenceError, formatFailureReason } from '../domain/errors.js';
import { computeFingerprint } from './FingerprintEngine.js';
import { logger } from '../infra/logger.js';

/**
 * ReportStore - current Report, capped history, drift comparison
 * Not locked itself; callers hold StoreLock around compare-then-save sequences
 */
export class ReportStore {
  constructor(
    private reportRepo: ReportRepository,
    private settings: SettingsService,
    private now: () => Date = () => new Date()
  ) {}

  generateFingerprint(snapshot: Snapshot): Fingerprint {
    return computeFingerprint(snapshot);
  }

  /**
   * Returns false when nothing was committed; the previous current Report stays in place.
   * An invalid fingerprint is never stored, so it can never become a baseline
   */
  save(snapshot: Snapshot): boolean {
    const fingerprint = this.generateFingerprint(snapshot);
    if (fingerprint.status === 'invalid') {
      logger.warn('Refusing to save report without identifying hardware fields');
      return false;
    }

    try {
      const { backupReports, maxReports } = this.settings.getSettings();
      const createdAt = this.now();
      const report = createReport({ snapshot, fingerprint, createdAt });

      this.reportRepo.save(report, {
        keep: backupReports,
        maxHistory: maxReports,
        modifiedAt: createdAt,
      });

      logger.info('Report saved', {
        fingerprint: report.fingerprint.hash,
        history: backupReports,
      });
      return true;
    } catch (error) {
      logger.error('Failed to save report', { error: formatFailureReason(error) });
      return false;
    }
  }

  /**
   * Null on a read failure as well as on an empty store; compare() does not use it
   */
  loadCurrent(): Report | null {
    try {
      return this.reportRepo.getCurrent();
    } catch (error) {
      logger.error('Failed to load current report', { error: formatFailureReason(error) });
      return null;
    }
  }

  listHistory(limit = 20): HistoryReport[] {
    return this.reportRepo.listHistory(Math.min(Math.max(limit, 1), 100));
  }

  compare(snapshot: Snapshot): DriftResult {
    const fingerprint = this.generateFingerprint(snapshot);
    if (fingerprint.status === 'invalid') {
      throw new CollectionError('No identifying hardware fields were collected', {
        fingerprint: fingerprint.hash,
      });
    }

    const current = this.readBaseline();
    if (!current) {
      logger.info('No previous report found for comparison');
      return { status: 'no_baseline', message: DRIFT_MESSAGES.no_baseline, fingerprint };
    }

    const baselineHash = current.fingerprint.hash;
    if (baselineHash === fingerprint.hash) {
      logger.info('Fingerprint comparison: no changes detected');
      return { status: 'unchanged', message: DRIFT_MESSAGES.unchanged, fingerprint, baselineHash };
    }

    logger.warn('Fingerprint comparison: changes detected', {
      previous: baselineHash,
      current: fingerprint.hash,
    });
    return { status: 'changed', message: DRIFT_MESSAGES.changed, fingerprint, baselineHash };
  }

  private readBaseline(): Report | null {
    try {
      return this.reportRepo.getCurrent();
    } catch (error) {
      throw new PersistenceError('Failed to read current report', {
        error: formatFailureReason(error),
      });
    }
  }
}
