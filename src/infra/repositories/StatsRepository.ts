import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import { statsSchema, type Stats } from '../../domain/entities/Stats.js';
import { logger } from '../logger.js';

export class StatsRepository {
  constructor(private db: DatabaseAdapter) {}

  /**
   * Returns null when nothing was stored yet or the stored document is unreadable
   */
  load(): Stats | null {
    const row = this.db.queryOne<{ document: string }>('SELECT document FROM stats WHERE id = 1');
    if (!row) return null;

    try {
      return statsSchema.parse(JSON.parse(row.document));
    } catch (error) {
      logger.error('Stored statistics are unreadable, starting fresh', { error });
      return null;
    }
  }

  save(stats: Stats): void {
    this.db.execute(
      `
      INSERT INTO stats (id, document, updated_at)
      VALUES (1, ?, ?)
      ON CONFLICT(id) DO UPDATE SET document = excluded.document, updated_at = excluded.updated_at
      `,
      [JSON.stringify(stats), new Date().toISOString()]
    );
  }
}
