import type { DatabaseAdapter } from '../DatabaseAdapter.js';

/**
 * Key/value store for runtime settings; values are JSON-encoded
 */
export class AppConfigRepository {
  constructor(private db: DatabaseAdapter) {}

  get(key: string): unknown {
    const row = this.db.queryOne<{ value: string }>('SELECT value FROM app_config WHERE key = ?', [
      key,
    ]);
    if (!row) return undefined;
    try {
      return JSON.parse(row.value);
    } catch {
      return row.value;
    }
  }

  set(key: string, value: unknown): void {
    this.db.execute(
      `
      INSERT INTO app_config (key, value, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
      `,
      [key, JSON.stringify(value), new Date().toISOString()]
    );
  }

  setMany(entries: Array<[string, unknown]>): void {
    this.db.transaction(() => {
      for (const [key, value] of entries) {
        this.set(key, value);
      }
    });
  }
}
