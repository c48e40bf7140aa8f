import type { TaskResult } from '../domain/entities/Task.js';
import type { TaskEventPayload } from '../services/TaskEventBus.js';
import type { HistoryReport, Report } from '../domain/entities/Report.js';
import type { BanEntry } from '../infra/repositories/BanRepository.js';

export function mapTaskResultToResponse(result: TaskResult) {
  const base = {
    id: result.id,
    kind: result.kind,
    status: result.status,
    completedAt: result.completedAt.toISOString(),
  };
  return result.status === 'success'
    ? { ...base, payload: result.payload }
    : { ...base, errorMessage: result.errorMessage };
}

export function mapTaskEventToResponse(event: TaskEventPayload) {
  return {
    taskId: event.task.id,
    kind: event.task.kind,
    status: event.status,
    stage: event.stage,
    errorMessage: event.errorMessage,
    submittedAt: event.task.submittedAt.toISOString(),
    timestamp: event.timestamp,
  };
}

export function mapReportToResponse(report: Report) {
  return {
    fingerprint: report.fingerprint,
    createdAt: report.createdAt.toISOString(),
    snapshot: report.snapshot,
  };
}

export function mapHistoryReportToResponse(report: HistoryReport) {
  return {
    id: report.id,
    ...mapReportToResponse(report),
    modifiedAt: report.modifiedAt.toISOString(),
  };
}

export function mapBanToResponse(entry: BanEntry) {
  return {
    fingerprint: entry.fingerprint,
    bannedAt: entry.bannedAt.toISOString(),
  };
}
