import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { SentinelService } from '../services/SentinelService.js';
import { ValidationError } from '../domain/errors.js';
import { mapBanToResponse } from './taskMapper.js';

const banSchema = z.object({
  fingerprint: z.string().trim().min(1),
});

/**
 * Ban routes - direct deny-list edits, serialized with the worker through StoreLock
 */
export function createBanRouter(sentinel: SentinelService): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ bans: sentinel.listBans().map(mapBanToResponse) });
  });

  router.get('/:fingerprint', (req: Request, res: Response) => {
    const { fingerprint } = req.params;
    res.json({ fingerprint, banned: sentinel.isBanned(fingerprint) });
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = banSchema.safeParse(req.body);
    if (!parsed.success) {
      return next(new ValidationError('Invalid ban payload', parsed.error.flatten()));
    }

    try {
      const outcome = await sentinel.ban(parsed.data.fingerprint);
      res.status(outcome.ok ? 201 : 200).json(outcome);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:fingerprint', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await sentinel.unban(req.params.fingerprint);
      res.json(outcome);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const cleared = await sentinel.clearAllBans();
      res.json({ cleared });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
