import type { Env } from './infra/env.js';
import type { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import type { HardwareCollector } from './infra/collectors/HardwareCollector.js';
import { ReportRepository } from './infra/repositories/ReportRepository.js';
import { StatsRepository } from './infra/repositories/StatsRepository.js';
import { BanRepository } from './infra/repositories/BanRepository.js';
import { AppConfigRepository } from './infra/repositories/AppConfigRepository.js';
import { SettingsService } from './services/SettingsService.js';
import { ReportStore } from './services/ReportStore.js';
import { StatsTracker } from './services/StatsTracker.js';
import { BanRegistry } from './services/BanRegistry.js';
import { StoreLock } from './services/StoreLock.js';
import { DriftCheckService } from './services/DriftCheckService.js';
import { AntiCheatService } from './services/AntiCheatService.js';
import { TaskEventBus } from './services/TaskEventBus.js';
import { TaskResultRegistry } from './services/TaskResultRegistry.js';
import { TaskWorker } from './services/TaskWorker.js';
import { SentinelService } from './services/SentinelService.js';
import { MonitoringScheduler } from './scheduler/MonitoringScheduler.js';

export interface SentinelContainer {
  settings: SettingsService;
  reportStore: ReportStore;
  statsTracker: StatsTracker;
  banRegistry: BanRegistry;
  lock: StoreLock;
  taskEventBus: TaskEventBus;
  results: TaskResultRegistry;
  worker: TaskWorker;
  scheduler: MonitoringScheduler;
  sentinel: SentinelService;
}

/**
 * Wires repositories and services around one database and one collector
 */
export function createSentinel(deps: {
  env: Pick<
    Env,
    'STATS_MAX_CHANGE_EVENTS' | 'STATS_MAX_DISTINCT_FINGERPRINTS' | 'STATS_DAILY_RETENTION_DAYS'
  >;
  db: DatabaseAdapter;
  collector: HardwareCollector;
  now?: () => Date;
}): SentinelContainer {
  const { env, db, collector } = deps;
  const now = deps.now ?? (() => new Date());

  // Repositories
  const reportRepo = new ReportRepository(db);
  const statsRepo = new StatsRepository(db);
  const banRepo = new BanRepository(db);
  const configRepo = new AppConfigRepository(db);

  // Services
  const settings = new SettingsService(configRepo);
  const reportStore = new ReportStore(reportRepo, settings, now);
  const statsTracker = new StatsTracker(
    statsRepo,
    {
      maxChangeEvents: env.STATS_MAX_CHANGE_EVENTS,
      maxDistinctFingerprints: env.STATS_MAX_DISTINCT_FINGERPRINTS,
      dailyRetentionDays: env.STATS_DAILY_RETENTION_DAYS,
    },
    now
  );
  const banRegistry = new BanRegistry(banRepo, settings, now);
  const lock = new StoreLock();
  const driftCheck = new DriftCheckService(collector, reportStore, statsTracker, settings);
  const antiCheat = new AntiCheatService(collector, banRegistry);
  const taskEventBus = new TaskEventBus();
  const results = new TaskResultRegistry();

  const worker = new TaskWorker({
    collector,
    reportStore,
    driftCheck,
    statsTracker,
    banRegistry,
    antiCheat,
    settings,
    lock,
    results,
    events: taskEventBus,
  });
  const scheduler = new MonitoringScheduler(driftCheck, settings, lock, now);
  const sentinel = new SentinelService(worker, scheduler, reportStore, banRegistry, settings, lock);

  return {
    settings,
    reportStore,
    statsTracker,
    banRegistry,
    lock,
    taskEventBus,
    results,
    worker,
    scheduler,
    sentinel,
  };
}
