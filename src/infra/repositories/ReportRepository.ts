import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { FingerprintStatus } from '../../domain/entities/Fingerprint.js';
import type { HistoryReport, Report } from '../../domain/entities/Report.js';
import { parseSnapshot } from '../../domain/entities/Snapshot.js';
import { logger } from '../logger.js';

type ReportRow = {
  fingerprint: string;
  fingerprint_status: FingerprintStatus;
  component_count: number;
  snapshot: string;
  created_at: string;
};

type HistoryRow = ReportRow & {
  id: number;
  modified_at: string;
};

/**
 * Repository for current and historical Reports
 * The current row and the history trail are written in one transaction
 */
export class ReportRepository {
  constructor(private db: DatabaseAdapter) {}

  getCurrent(): Report | null {
    const row = this.db.queryOne<ReportRow>('SELECT * FROM current_report WHERE id = 1');
    return row ? this.mapRowToReport(row) : null;
  }

  /**
   * Overwrite the current report; optionally append to history and evict
   * everything beyond maxHistory, newest modification first
   * Returns the number of evicted history rows
   */
  save(
    report: Report,
    history: { keep: boolean; maxHistory: number; modifiedAt: Date }
  ): number {
    return this.db.transaction(() => {
      const values = [
        report.fingerprint.hash,
        report.fingerprint.status,
        report.fingerprint.componentCount,
        JSON.stringify(report.snapshot),
        report.createdAt.toISOString(),
      ];

      this.db.execute(
        `
        INSERT INTO current_report (id, fingerprint, fingerprint_status, component_count, snapshot, created_at)
        VALUES (1, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          fingerprint = excluded.fingerprint,
          fingerprint_status = excluded.fingerprint_status,
          component_count = excluded.component_count,
          snapshot = excluded.snapshot,
          created_at = excluded.created_at
        `,
        values
      );

      if (!history.keep) {
        return 0;
      }

      this.db.execute(
        `
        INSERT INTO report_history (fingerprint, fingerprint_status, component_count, snapshot, created_at, modified_at)
        VALUES (?, ?, ?, ?, ?, ?)
        `,
        [...values, history.modifiedAt.toISOString()]
      );

      const evicted = this.db.execute(
        `
        DELETE FROM report_history
        WHERE id NOT IN (
          SELECT id FROM report_history
          ORDER BY modified_at DESC, id DESC
          LIMIT ?
        )
        `,
        [history.maxHistory]
      );

      if (evicted > 0) {
        logger.info('Evicted old reports from history', { evicted, maxHistory: history.maxHistory });
      }
      return evicted;
    });
  }

  listHistory(limit: number): HistoryReport[] {
    const rows = this.db.query<HistoryRow>(
      `
      SELECT * FROM report_history
      ORDER BY modified_at DESC, id DESC
      LIMIT ?
      `,
      [limit]
    );
    return rows.map((row) => ({
      ...this.mapRowToReport(row),
      id: row.id,
      modifiedAt: new Date(row.modified_at),
    }));
  }

  countHistory(): number {
    const row = this.db.queryOne<{ count: number }>('SELECT COUNT(*) AS count FROM report_history');
    return row?.count ?? 0;
  }

  private mapRowToReport(row: ReportRow): Report {
    return {
      snapshot: parseSnapshot(JSON.parse(row.snapshot)),
      fingerprint: {
        hash: row.fingerprint,
        status: row.fingerprint_status,
        componentCount: row.component_count,
      },
      createdAt: new Date(row.created_at),
    };
  }
}
