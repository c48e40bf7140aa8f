import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { SentinelService } from '../services/SentinelService.js';

export function createSettingsRouter(sentinel: SentinelService): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json(sentinel.getSettings());
  });

  router.put('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(sentinel.updateSettings(req.body));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
