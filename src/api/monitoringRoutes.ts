import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { SentinelService } from '../services/SentinelService.js';

export function createMonitoringRouter(sentinel: SentinelService): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json(sentinel.monitoringStatus());
  });

  router.post('/start', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(sentinel.startMonitoring());
    } catch (error) {
      next(error);
    }
  });

  router.post('/stop', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(sentinel.stopMonitoring());
    } catch (error) {
      next(error);
    }
  });

  router.post('/pause', (_req: Request, res: Response) => {
    res.json(sentinel.pauseMonitoring());
  });

  router.post('/resume', (_req: Request, res: Response) => {
    res.json(sentinel.resumeMonitoring());
  });

  return router;
}
