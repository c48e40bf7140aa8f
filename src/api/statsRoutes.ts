import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { SentinelService } from '../services/SentinelService.js';
import { mapTaskResultToResponse } from './taskMapper.js';

/**
 * GET /api/stats runs a fetchStats task so the read is ordered with other worker tasks
 */
export function createStatsRouter(deps: {
  sentinel: SentinelService;
  defaultPollTimeoutMs: number;
}): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const taskId = deps.sentinel.submit('fetchStats');
      const result = await deps.sentinel.poll(taskId, deps.defaultPollTimeoutMs);
      if (!result) {
        res.status(202).json({ taskId, status: 'pending' });
        return;
      }
      res.json(mapTaskResultToResponse(result));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
