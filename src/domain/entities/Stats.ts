import { z } from 'zod';

/**
 * Stats entity - cumulative fingerprint check/change history
 * Counters only ever increase; retention trims the detail collections only
 */
export interface ChangeEvent {
  timestamp: string; // ISO 8601
  fingerprint: string;
  checkNumber: number;
}

export interface MonthBucket {
  checks: number;
  changes: number;
  uniqueFingerprints: number;
  fingerprints: string[] | null; // null once the month has been rolled up
}

export interface Stats {
  totalChecks: number;
  totalChanges: number;
  firstCheck: string | null;
  lastCheck: string | null;
  lastChange: string | null;
  dailyChecks: Record<string, number>; // YYYY-MM-DD (UTC)
  monthlyStats: Record<string, MonthBucket>; // YYYY-MM (UTC)
  changeHistory: ChangeEvent[];
  seenFingerprints: Record<string, string>; // hash -> last seen
}

export interface MonthlySummary {
  checks: number;
  changes: number;
  uniqueFingerprints: number;
  changeRate: number; // percent
}

export interface StatsRetention {
  maxChangeEvents: number;
  maxDistinctFingerprints: number;
  dailyRetentionDays: number;
}

export const statsSchema = z.object({
  totalChecks: z.number().int().nonnegative(),
  totalChanges: z.number().int().nonnegative(),
  firstCheck: z.string().nullable(),
  lastCheck: z.string().nullable(),
  lastChange: z.string().nullable(),
  dailyChecks: z.record(z.number().int().nonnegative()),
  monthlyStats: z.record(
    z.object({
      checks: z.number().int().nonnegative(),
      changes: z.number().int().nonnegative(),
      uniqueFingerprints: z.number().int().nonnegative(),
      fingerprints: z.array(z.string()).nullable(),
    })
  ),
  changeHistory: z.array(
    z.object({
      timestamp: z.string(),
      fingerprint: z.string(),
      checkNumber: z.number().int().positive(),
    })
  ),
  seenFingerprints: z.record(z.string()),
});

export function createEmptyStats(): Stats {
  return {
    totalChecks: 0,
    totalChanges: 0,
    firstCheck: null,
    lastCheck: null,
    lastChange: null,
    dailyChecks: {},
    monthlyStats: {},
    changeHistory: [],
    seenFingerprints: {},
  };
}
