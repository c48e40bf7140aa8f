import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { SentinelService } from '../services/SentinelService.js';
import { NotFoundError, ValidationError } from '../domain/errors.js';
import { mapHistoryReportToResponse, mapReportToResponse } from './taskMapper.js';

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export function createReportRouter(sentinel: SentinelService): Router {
  const router = Router();

  router.get('/current', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = sentinel.loadCurrentReport();
      if (!report) {
        throw new NotFoundError('Report', 'current');
      }
      res.json(mapReportToResponse(report));
    } catch (error) {
      next(error);
    }
  });

  router.get('/history', (req: Request, res: Response, next: NextFunction) => {
    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return next(new ValidationError('Invalid history query', parsed.error.flatten()));
    }

    try {
      const reports = sentinel.listReportHistory(parsed.data.limit);
      res.json({ reports: reports.map(mapHistoryReportToResponse) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
