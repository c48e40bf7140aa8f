import { Router } from 'express';
import { createTaskRouter } from './taskRoutes.js';
import { createTaskEventsRouter } from './taskEventsRoutes.js';
import { createBanRouter } from './banRoutes.js';
import { createMonitoringRouter } from './monitoringRoutes.js';
import { createStatsRouter } from './statsRoutes.js';
import { createReportRouter } from './reportRoutes.js';
import { createSettingsRouter } from './settingsRoutes.js';
import type { SentinelService } from '../services/SentinelService.js';
import type { TaskEventBus } from '../services/TaskEventBus.js';

/**
 * Main API router - composes all route handlers
 * Dependencies are injected from server.ts
 */
export function createApiRouter(deps: {
  sentinel: SentinelService;
  taskEventBus: TaskEventBus;
  defaultPollTimeoutMs: number;
}): Router {
  const router = Router();

  router.use('/tasks/events', createTaskEventsRouter(deps.taskEventBus));
  router.use('/tasks', createTaskRouter(deps));
  router.use('/bans', createBanRouter(deps.sentinel));
  router.use('/monitoring', createMonitoringRouter(deps.sentinel));
  router.use('/stats', createStatsRouter(deps));
  router.use('/reports', createReportRouter(deps.sentinel));
  router.use('/settings', createSettingsRouter(deps.sentinel));

  return router;
}
