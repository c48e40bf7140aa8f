import type { Request, Response, NextFunction } from 'express';
import {
  CollectionError,
  DatabaseError,
  NotFoundError,
  PersistenceError,
  UnknownTaskKindError,
  ValidationError,
  isAppError,
} from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { Env } from '../infra/env.js';

export interface ErrorBody {
  error: string;
  message: string;
  details?: unknown;
}

export interface ErrorResponse {
  status: number;
  level: 'warn' | 'error';
  body: ErrorBody;
}

function withDetails(code: string, message: string, details: unknown): ErrorBody {
  return details === undefined ? { error: code, message } : { error: code, message, details };
}

/**
 * Status, log level and JSON body for anything a route throws.
 * Collection and storage failures answer without details: those carry host paths and SQL
 */
export function toErrorResponse(err: Error, env: Pick<Env, 'NODE_ENV'>): ErrorResponse {
  if (err instanceof ValidationError || err instanceof UnknownTaskKindError || err instanceof NotFoundError) {
    return { status: err.statusCode, level: 'warn', body: withDetails(err.code, err.message, err.details) };
  }
  if (err instanceof CollectionError) {
    return { status: 502, level: 'warn', body: { error: err.code, message: err.message } };
  }
  if (err instanceof PersistenceError || err instanceof DatabaseError) {
    return { status: 500, level: 'error', body: { error: err.code, message: err.message } };
  }
  if (isAppError(err)) {
    return {
      status: err.statusCode,
      level: err.statusCode >= 500 ? 'error' : 'warn',
      body: withDetails(err.code, err.message, err.details),
    };
  }
  if (err.name === 'SyntaxError' && 'body' in err) {
    return {
      status: 400,
      level: 'warn',
      body: { error: 'INVALID_JSON', message: 'Invalid JSON in request body' },
    };
  }
  return {
    status: 500,
    level: 'error',
    body: {
      error: 'INTERNAL_SERVER_ERROR',
      message: env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
    },
  };
}

export function createErrorHandler(env: Pick<Env, 'NODE_ENV'>) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const { status, level, body } = toErrorResponse(err, env);

    logger.log(level, 'Request failed', {
      method: req.method,
      path: req.path,
      status,
      code: body.error,
      message: err.message,
      details: isAppError(err) ? err.details : undefined,
      stack: level === 'error' ? err.stack : undefined,
    });

    res.status(status).json(body);
  };
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: 'The requested resource was not found',
  });
}
