import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { SentinelService } from '../services/SentinelService.js';
import { ValidationError } from '../domain/errors.js';
import { mapTaskResultToResponse } from './taskMapper.js';

export const MAX_POLL_TIMEOUT_MS = 60_000;

const submitSchema = z.object({
  kind: z.string().min(1),
  id: z.string().min(1).max(128).optional(),
});

const pollQuerySchema = z.object({
  timeoutMs: z.coerce.number().int().min(0).max(MAX_POLL_TIMEOUT_MS).optional(),
});

/**
 * Task routes - non-blocking submission and long-poll result delivery
 */
export function createTaskRouter(deps: {
  sentinel: SentinelService;
  defaultPollTimeoutMs: number;
}): Router {
  const router = Router();

  /**
   * POST /api/tasks  { kind, id? }
   */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    const parsed = submitSchema.safeParse(req.body);
    if (!parsed.success) {
      return next(new ValidationError('Invalid task payload', parsed.error.flatten()));
    }

    try {
      const taskId = deps.sentinel.submit(parsed.data.kind, parsed.data.id);
      res.status(202).json({ taskId });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/tasks/progress
   */
  router.get('/progress', (_req: Request, res: Response) => {
    res.json(deps.sentinel.getProgress());
  });

  /**
   * GET /api/tasks/:taskId/result?timeoutMs=...
   * 202 while the task has not finished within the timeout
   */
  router.get('/:taskId/result', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = pollQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return next(new ValidationError('Invalid poll query', parsed.error.flatten()));
    }

    try {
      const { taskId } = req.params;
      const timeoutMs = parsed.data.timeoutMs ?? deps.defaultPollTimeoutMs;
      const result = await deps.sentinel.poll(taskId, timeoutMs);

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
