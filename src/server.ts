import express from 'express';
import { mkdirSync } from 'node:fs';
import cors from 'cors';
import cron from 'node-cron';
import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { SystemHardwareCollector } from './infra/collectors/SystemHardwareCollector.js';
import { createSentinel } from './bootstrap.js';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import type { Request, Response, NextFunction } from 'express';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

// Initialize logger
const loggerInstance = createLogger(env);
setLogger(loggerInstance);

mkdirSync(env.DATA_DIR, { recursive: true });

const db = new DatabaseAdapter(env);
const collector = new SystemHardwareCollector({ timeoutMs: env.COLLECTOR_TIMEOUT_MS });
const { sentinel, results, taskEventBus } = createSentinel({ env, db, collector });

const app = express();

// Middleware
app.use(cors());
app.use(express.json());

// Request logging middleware
app.use((req: Request, _res: Response, next: NextFunction) => {
  loggerInstance.debug('Incoming request', {
    method: req.method,
    path: req.path,
    ip: req.ip,
  });
  next();
});

app.get('/health', (_req: Request, res: Response) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

app.get('/ready', (_req: Request, res: Response) => {
  try {
    db.queryOne('SELECT 1 as ok');
    if (!db.isOpen()) {
      res.status(503).json({ status: 'not-ready' });
      return;
    }
    res.json({
      status: 'ready',
      worker: sentinel.getProgress(),
      pendingResults: results.pendingCount(),
    });
  } catch (error) {
    loggerInstance.warn('Readiness check failed', { error });
    res.status(503).json({ status: 'not-ready' });
  }
});

app.use(
  '/api',
  createApiRouter({
    sentinel,
    taskEventBus,
    defaultPollTimeoutMs: env.TASK_POLL_TIMEOUT_MS,
  })
);

// 404 handler
app.use(notFoundHandler);

// Global error handler
app.use(createErrorHandler(env));

sentinel.start();

// Unclaimed task results expire after TASK_RESULT_TTL_MINUTES
const resultPruning = cron.schedule('* * * * *', () => {
  const cutoff = new Date(Date.now() - env.TASK_RESULT_TTL_MINUTES * 60 * 1000);
  results.pruneSettledBefore(cutoff);
});

const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
  });
});

// Graceful shutdown
function shutdown(signal: string): void {
  loggerInstance.info(`${signal} received, shutting down gracefully`);
  resultPruning.stop();
  sentinel.stop();
  server.close(() => {
    db.close();
    loggerInstance.info('Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export { app };
