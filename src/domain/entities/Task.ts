import { randomUUID } from 'node:crypto';
import type { Fingerprint } from './Fingerprint.js';
import type { DriftStatus } from './Report.js';
import type { Snapshot } from './Snapshot.js';
import type { MonthlySummary, Stats } from './Stats.js';

/**
 * Task entity - unit of work submitted to the TaskWorker
 * Each Task is answered by exactly one TaskResult carrying the same id
 */
export const TASK_KINDS = [
  'collect',
  'compareOnly',
  'banCurrent',
  'runAntiCheatCheck',
  'fetchStats',
] as const;

export type TaskKind = (typeof TASK_KINDS)[number];
export type TaskStatus = 'queued' | 'running' | 'succeeded' | 'failed';

export function isTaskKind(value: string): value is TaskKind {
  return TASK_KINDS.some((kind) => kind === value);
}

export interface Task {
  id: string;
  kind: string; // unchecked until dispatch so unknown kinds still get a result
  submittedAt: Date;
}

export interface CollectPayload {
  snapshot: Snapshot;
  fingerprint: Fingerprint;
  saved: boolean;
}

export interface ComparePayload {
  status: DriftStatus;
  message: string;
  fingerprint: Fingerprint;
  baselineHash: string | null;
  saved: boolean;
}

export interface BanCurrentPayload {
  fingerprint: Fingerprint;
  banned: boolean;
  message: string;
}

export type AntiCheatStage =
  | 'initializing'
  | 'scanning'
  | 'fingerprinting'
  | 'checking_ban_list'
  | 'finalizing';

export interface AntiCheatPayload {
  banned: boolean;
  verdict: 'banned' | 'clean';
  fingerprint: Fingerprint;
  scanType: 'fresh_scan';
  message: string;
  stages: AntiCheatStage[];
}

export interface StatsPayload {
  trackingEnabled: boolean;
  stats: Stats;
  changeFrequency: number;
  changeRate: number;
  monthlySummary: Record<string, MonthlySummary>;
}

export interface TaskPayloads {
  collect: CollectPayload;
  compareOnly: ComparePayload;
  banCurrent: BanCurrentPayload;
  runAntiCheatCheck: AntiCheatPayload;
  fetchStats: StatsPayload;
}

export type TaskPayload = TaskPayloads[TaskKind];

export type TaskResult =
  | { id: string; kind: string; status: 'success'; payload: TaskPayload; completedAt: Date }
  | { id: string; kind: string; status: 'error'; errorMessage: string; completedAt: Date };

export function generateTaskId(kind: string, submittedAt: Date): string {
  return `${kind}_${submittedAt.getTime()}_${randomUUID().slice(0, 8)}`;
}

/**
 * Factory function to create a new Task
 */
export function createTask(params: { kind: string; id?: string; submittedAt?: Date }): Task {
  const submittedAt = params.submittedAt ?? new Date();
  return {
    id: params.id ?? generateTaskId(params.kind, submittedAt),
    kind: params.kind,
    submittedAt,
  };
}

export function taskSucceeded(task: Task, payload: TaskPayload): TaskResult {
  return { id: task.id, kind: task.kind, status: 'success', payload, completedAt: new Date() };
}

export function taskFailed(task: Task, errorMessage: string): TaskResult {
  return { id: task.id, kind: task.kind, status: 'error', errorMessage, completedAt: new Date() };
}
