import Database from 'better-sqlite3';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { DatabaseError, formatFailureReason, isAppError } from '../domain/errors.js';
import { logger } from './logger.js';
import type { Env } from './env.js';

const SCHEMA_PATH = fileURLToPath(new URL('./db/schema.sql', import.meta.url));

function openDatabase(path: string): Database.Database {
  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(readFileSync(SCHEMA_PATH, 'utf-8'));
  return db;
}

/**
 * SQLite access for the repositories: current report, history, stats, bans, app_config.
 * Every statement failure surfaces as a DatabaseError
 */
export class DatabaseAdapter {
  private readonly db: Database.Database;

  constructor(env: Pick<Env, 'SQLITE_DB_PATH'>) {
    try {
      this.db = openDatabase(env.SQLITE_DB_PATH);
    } catch (error) {
      throw new DatabaseError('Failed to open database', {
        path: env.SQLITE_DB_PATH,
        error: formatFailureReason(error),
      });
    }
    logger.info('Database opened', { path: env.SQLITE_DB_PATH });
  }

  query<T>(sql: string, params: unknown[] = []): T[] {
    return this.guard(sql, () => this.db.prepare<unknown[], T>(sql).all(...params));
  }

  queryOne<T>(sql: string, params: unknown[] = []): T | null {
    return this.guard(sql, () => this.db.prepare<unknown[], T>(sql).get(...params) ?? null);
  }

  /**
   * Returns the number of affected rows
   */
  execute(sql: string, params: unknown[] = []): number {
    return this.guard(sql, () => this.db.prepare(sql).run(...params).changes);
  }

  /**
   * Rolls back on any throw. An AppError raised inside reaches the caller unchanged
   */
  transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (error) {
      if (isAppError(error)) throw error;
      logger.error('Transaction rolled back', { error: formatFailureReason(error) });
      throw new DatabaseError('Transaction rolled back', { error: formatFailureReason(error) });
    }
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    this.db.close();
    logger.info('Database closed');
  }

  private guard<T>(sql: string, run: () => T): T {
    try {
      return run();
    } catch (error) {
      const reason = formatFailureReason(error);
      logger.error('Statement failed', { sql, error: reason });
      throw new DatabaseError('Statement failed', { sql, error: reason });
    }
  }
}
