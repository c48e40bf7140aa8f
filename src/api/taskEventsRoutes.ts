import { Router } from 'express';
import type { Request, Response } from 'express';
import type { TaskEventBus, TaskEventPayload } from '../services/TaskEventBus.js';
import { mapTaskEventToResponse } from './taskMapper.js';

const HEARTBEAT_MS = 30_000;

export function createTaskEventsRouter(taskEventBus: TaskEventBus): Router {
  const router = Router();

  router.get('/stream', (req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    res.write('event: ready\n');
    res.write('data: {}\n\n');

    const onTask = (payload: TaskEventPayload) => {
      res.write('event: task\n');
      res.write(`data: ${JSON.stringify(mapTaskEventToResponse(payload))}\n\n`);
    };

    const heartbeat = setInterval(() => {
      res.write(': keep-alive\n\n');
    }, HEARTBEAT_MS);

    taskEventBus.onTask(onTask);

    req.on('close', () => {
      clearInterval(heartbeat);
      taskEventBus.offTask(onTask);
    });
  });

  return router;
}
