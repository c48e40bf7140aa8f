import type { DatabaseAdapter } from '../DatabaseAdapter.js';

export interface BanEntry {
  fingerprint: string;
  bannedAt: Date;
}

type BanRow = {
  fingerprint: string;
  banned_at: string;
};

export class BanRepository {
  constructor(private db: DatabaseAdapter) {}

  has(fingerprint: string): boolean {
    const row = this.db.queryOne<{ found: number }>(
      'SELECT 1 AS found FROM banned_fingerprints WHERE fingerprint = ?',
      [fingerprint]
    );
    return row !== null;
  }

  /**
   * Returns false when the fingerprint was already present
   */
  insert(fingerprint: string, bannedAt: Date): boolean {
    const changes = this.db.execute(
      'INSERT OR IGNORE INTO banned_fingerprints (fingerprint, banned_at) VALUES (?, ?)',
      [fingerprint, bannedAt.toISOString()]
    );
    return changes > 0;
  }

  /**
   * Returns false when the fingerprint was not present
   */
  delete(fingerprint: string): boolean {
    return this.db.execute('DELETE FROM banned_fingerprints WHERE fingerprint = ?', [fingerprint]) > 0;
  }

  list(): BanEntry[] {
    const rows = this.db.query<BanRow>(
      'SELECT fingerprint, banned_at FROM banned_fingerprints ORDER BY banned_at ASC, fingerprint ASC'
    );
    return rows.map((row) => ({ fingerprint: row.fingerprint, bannedAt: new Date(row.banned_at) }));
  }

  clear(): number {
    return this.db.execute('DELETE FROM banned_fingerprints');
  }
}
