import type { StatsRepository } from '../infra/repositories/StatsRepository.js';
import {
  createEmptyStats,
  type MonthlySummary,
  type Stats,
  type StatsRetention,
} from '../domain/entities/Stats.js';
import { formatFailureReason } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function dayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function monthKey(date: Date): string {
  return date.toISOString().slice(0, 7);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * StatsTracker - check/change counters and histograms
 * Retention trims detail collections; totals are never reduced
 */
export class StatsTracker {
  private stats: Stats;

  constructor(
    private statsRepo: StatsRepository,
    private retention: StatsRetention,
    private now: () => Date = () => new Date()
  ) {
    this.stats = statsRepo.load() ?? createEmptyStats();
  }

  recordCheck(fingerprint: string, changed: boolean): void {
    const now = this.now();
    const timestamp = now.toISOString();
    const day = dayKey(now);
    const month = monthKey(now);
    const stats = this.stats;

    stats.totalChecks += 1;
    stats.lastCheck = timestamp;
    if (stats.firstCheck === null) {
      stats.firstCheck = timestamp;
    }

    stats.dailyChecks[day] = (stats.dailyChecks[day] ?? 0) + 1;

    const bucket = (stats.monthlyStats[month] ??= {
      checks: 0,
      changes: 0,
      uniqueFingerprints: 0,
      fingerprints: [],
    });
    bucket.checks += 1;
    const monthFingerprints = bucket.fingerprints ?? [];
    if (!monthFingerprints.includes(fingerprint)) {
      monthFingerprints.push(fingerprint);
    }
    bucket.fingerprints = monthFingerprints;
    bucket.uniqueFingerprints = Math.max(bucket.uniqueFingerprints, monthFingerprints.length);

    stats.seenFingerprints[fingerprint] = timestamp;

    if (changed) {
      stats.totalChanges += 1;
      stats.lastChange = timestamp;
      bucket.changes += 1;
      stats.changeHistory.push({
        timestamp,
        fingerprint,
        checkNumber: stats.totalChecks,
      });
      logger.warn('Fingerprint change recorded', { totalChanges: stats.totalChanges });
    }

    this.applyRetention(now);
    this.persist();
  }

  getStats(): Stats {
    return structuredClone(this.stats);
  }

  /**
   * Average changes per calendar month between first and last check
   */
  changeFrequency(): number {
    const { firstCheck, lastCheck, totalChanges } = this.stats;
    if (!firstCheck || !lastCheck || totalChanges === 0) {
      return 0;
    }

    const first = new Date(firstCheck);
    const last = new Date(lastCheck);
    const months =
      (last.getUTCFullYear() - first.getUTCFullYear()) * 12 +
      (last.getUTCMonth() - first.getUTCMonth());

    return round2(totalChanges / Math.max(1, months));
  }

  changeRate(): number {
    const { totalChecks, totalChanges } = this.stats;
    return totalChecks > 0 ? round2((totalChanges / totalChecks) * 100) : 0;
  }

  monthlySummary(): Record<string, MonthlySummary> {
    const summary: Record<string, MonthlySummary> = {};
    for (const [month, bucket] of Object.entries(this.stats.monthlyStats)) {
      summary[month] = {
        checks: bucket.checks,
        changes: bucket.changes,
        uniqueFingerprints: bucket.uniqueFingerprints,
        changeRate: bucket.checks > 0 ? round2((bucket.changes / bucket.checks) * 100) : 0,
      };
    }
    return summary;
  }

  private applyRetention(now: Date): void {
    const stats = this.stats;
    const { maxChangeEvents, maxDistinctFingerprints, dailyRetentionDays } = this.retention;

    if (stats.changeHistory.length > maxChangeEvents) {
      stats.changeHistory = stats.changeHistory.slice(-maxChangeEvents);
    }

    const seen = Object.entries(stats.seenFingerprints);
    if (seen.length > maxDistinctFingerprints) {
      seen.sort(([, a], [, b]) => b.localeCompare(a));
      stats.seenFingerprints = Object.fromEntries(seen.slice(0, maxDistinctFingerprints));
    }

    const oldestDay = dayKey(new Date(now.getTime() - (dailyRetentionDays - 1) * DAY_MS));
    for (const day of Object.keys(stats.dailyChecks)) {
      if (day < oldestDay) {
        delete stats.dailyChecks[day];
      }
    }

    // Closed months keep only their distinct count
    const currentMonth = monthKey(now);
    for (const [month, bucket] of Object.entries(stats.monthlyStats)) {
      if (month !== currentMonth && bucket.fingerprints !== null) {
        bucket.uniqueFingerprints = Math.max(bucket.uniqueFingerprints, bucket.fingerprints.length);
        bucket.fingerprints = null;
      }
    }
  }

  private persist(): void {
    try {
      this.statsRepo.save(this.stats);
    } catch (error) {
      logger.error('Failed to persist statistics', { error: formatFailureReason(error) });
    }
  }
}
