import { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import type { HardwareCollector } from '../../../src/infra/collectors/HardwareCollector.js';
import { createSnapshot, raw, structured, type Snapshot } from '../../../src/domain/entities/Snapshot.js';

export const TEST_RETENTION = {
  STATS_MAX_CHANGE_EVENTS: 500,
  STATS_MAX_DISTINCT_FINGERPRINTS: 500,
  STATS_DAILY_RETENTION_DAYS: 90,
};

export function memoryDb(): DatabaseAdapter {
  return new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' });
}

export function hostSnapshot(ids: {
  disks?: string[];
  bios?: string;
  board?: string;
  uuid?: string;
}): Snapshot {
  return createSnapshot({
    platform: 'test',
    collectedAt: '2024-01-01T00:00:00.000Z',
    components: {
      disk: structured(...(ids.disks ?? []).map((serial, i) => ({ Name: `disk${i}`, SerialNumber: serial }))),
      bios: ids.bios ? structured({ SerialNumber: ids.bios }) : raw('Error: bios query failed'),
      motherboard: ids.board ? structured({ SerialNumber: ids.board }) : raw('Error: board query failed'),
      system: ids.uuid ? structured({ UUID: ids.uuid }) : raw('Error: system query failed'),
    },
  });
}

/**
 * Collector whose next answer the test sets directly
 */
export class FakeCollector implements HardwareCollector {
  calls = 0;
  error: Error | null = null;

  constructor(public snapshot: Snapshot | null) {}

  async collect(): Promise<Snapshot | null> {
    this.calls += 1;
    if (this.error) throw this.error;
    return this.snapshot;
  }
}

/**
 * Collector that can be held mid-collection; `log` records entry and exit order
 */
export class GatedCollector implements HardwareCollector {
  log: string[] = [];
  private gate: Promise<void> | null = null;

  constructor(public snapshot: Snapshot) {}

  hold(): () => void {
    let open: () => void = () => {};
    this.gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    return () => {
      this.gate = null;
      open();
    };
  }

  async collect(): Promise<Snapshot | null> {
    this.log.push('start');
    if (this.gate) await this.gate;
    this.log.push('end');
    return this.snapshot;
  }
}

/**
 * Mutable clock for services that take a `now` function
 */
export class FakeClock {
  constructor(private current: Date) {}

  now = (): Date => new Date(this.current.getTime());

  set(iso: string): void {
    this.current = new Date(iso);
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}
