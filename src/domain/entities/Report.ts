import type { Fingerprint } from './Fingerprint.js';
import type { Snapshot } from './Snapshot.js';

/**
 * Report entity - a persisted Snapshot with its Fingerprint
 * One current Report exists at a time; history keeps a capped trail
 */
export interface Report {
  snapshot: Snapshot;
  fingerprint: Fingerprint;
  createdAt: Date;
}

export interface HistoryReport extends Report {
  id: number;
  modifiedAt: Date;
}

/**
 * Outcome of comparing a fresh Snapshot against the current Report
 * no_baseline is the expected first-run state and never counts as a change
 */
export type DriftStatus = 'no_baseline' | 'unchanged' | 'changed';

export type DriftResult =
  | { status: 'no_baseline'; message: string; fingerprint: Fingerprint }
  | { status: 'unchanged'; message: string; fingerprint: Fingerprint; baselineHash: string }
  | { status: 'changed'; message: string; fingerprint: Fingerprint; baselineHash: string };

export const DRIFT_MESSAGES: Record<DriftStatus, string> = {
  no_baseline: 'No previous report found',
  unchanged: 'Fingerprint matches previous report',
  changed: 'Fingerprint has changed from previous report',
};

export function createReport(params: {
  snapshot: Snapshot;
  fingerprint: Fingerprint;
  createdAt?: Date;
}): Report {
  return {
    snapshot: params.snapshot,
    fingerprint: params.fingerprint,
    createdAt: params.createdAt ?? new Date(),
  };
}
